import logger from './logger';

export const DAV_NAMESPACE = 'DAV:';
export const CUSTOM_NAMESPACE = 'SAR:';
export const XML_CONTENT_TYPE = 'application/xml; charset=utf-8';
export const DIRECTORY_CONTENT_TYPE = 'httpd/unix-directory';

export type DepthValue = '0' | '1' | 'infinity';

/**
 * Maps a numeric depth to its header token. Only 0, 1 and -1 are meaningful;
 * any other number is sent as "1".
 */
export function depthToString(depth: number): DepthValue {
    switch (depth) {
        case 0:
            return '0';
        case 1:
            return '1';
        case -1:
            return 'infinity';
        default:
            logger.debug(`Unrecognized depth ${depth}, sending "1"`);
            return '1';
    }
}

export function parseDepth(value: string): number {
    switch (value.trim().toLowerCase()) {
        case '0':
            return 0;
        case '1':
            return 1;
        case 'infinity':
            return -1;
        default:
            return 1;
    }
}

export function isAbsoluteUrl(url: string): boolean {
    return /^[a-zA-Z][a-zA-Z0-9+.-]*:/.test(url);
}

/** Joins two URL or path fragments with exactly one slash between them. */
export function joinPaths(base: string, path: string): string {
    if (base === '') return path;
    if (path === '') return base;
    return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export function normalizePath(path: string): string {
    if (path === '') return '/';

    const normalized: string[] = [];
    for (const segment of path.split('/')) {
        if (segment === '' || segment === '.') continue;
        if (segment === '..') {
            normalized.pop();
        } else {
            normalized.push(segment);
        }
    }

    const result = `/${normalized.join('/')}`;
    return path.endsWith('/') && result !== '/' ? `${result}/` : result;
}

export function getParentPath(path: string): string {
    if (path === '' || path === '/') return '/';
    const trimmed = path.endsWith('/') ? path.slice(0, -1) : path;
    const lastSlash = trimmed.lastIndexOf('/');
    return lastSlash <= 0 ? '/' : trimmed.slice(0, lastSlash + 1);
}

export function getFileName(path: string): string {
    if (path === '' || path === '/') return '';
    const trimmed = path.endsWith('/') ? path.slice(0, -1) : path;
    return trimmed.slice(trimmed.lastIndexOf('/') + 1);
}

export function ensureCollectionPath(path: string): string {
    if (path === '') return '/';
    return path.endsWith('/') ? path : `${path}/`;
}

export function escapeXml(content: string): string {
    return content
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

export function basicAuth(username: string, password: string): string {
    return `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
}

export function isSuccessStatus(statusCode: number): boolean {
    return statusCode >= 200 && statusCode < 300;
}

/** Extracts the code from a status line such as "HTTP/1.1 404 Not Found"; 500 when unreadable. */
export function parseStatusCode(statusLine: string): number {
    const parts = statusLine.trim().split(/\s+/);
    if (parts.length < 2) return 500;
    const code = Number.parseInt(parts[1], 10);
    return Number.isNaN(code) ? 500 : code;
}

/** Parses ISO 8601 and RFC 1123 dates; undefined when neither applies. */
export function parseDate(value: string | undefined): Date | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    const parsed = new Date(value.trim());
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

export function formatDate(date: Date): string {
    return date.toISOString();
}
