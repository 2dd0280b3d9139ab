import mimeTable from './mime-types.json';

const DEFAULT_MIME_TYPE = 'application/octet-stream';

const table: Readonly<Record<string, string>> = mimeTable;

export function getMimeType(filename: string): string {
    const base = filename.split(/[\\/]/).pop() ?? '';
    const dot = base.lastIndexOf('.');
    if (dot < 0 || dot === base.length - 1) {
        return DEFAULT_MIME_TYPE;
    }
    const extension = base.slice(dot + 1).toLowerCase();
    return table[extension] ?? DEFAULT_MIME_TYPE;
}
