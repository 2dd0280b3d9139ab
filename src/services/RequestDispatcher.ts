import http from 'http';
import https from 'https';
import { Readable } from 'stream';
import { Headers, Response } from 'node-fetch';
import { AuthenticationNegotiator } from '../auth/AuthenticationNegotiator';
import { ClientConfig } from '../config';
import { AuthenticationError, MalformedResponseError, NetworkError, ProtocolError, WebDAVError } from '../errorHandler';
import { ACCEPT_ENCODING, contentEncodingOf, decodeBuffer } from '../util/compression';
import { isAbsoluteUrl, isSuccessStatus, joinPaths } from '../util/davUtils';
import fetchWithTimeout from '../util/fetchWithTimeout';
import logger from '../util/logger';
import type { Multistatus } from '../models/multistatus';
import { parseMultistatus } from '../xml/multistatusParser';
import { parseErrorBody } from '../xml/propertyParsers';

export type RequestBody = string | Buffer | Readable;

export interface DispatchRequest {
    method: string;
    url: string;
    headers?: Record<string, string>;
    body?: RequestBody;
    signal?: AbortSignal;
}

export type DispatchOutcome =
    | { kind: 'success'; status: number; headers: Headers; body: Buffer }
    | { kind: 'protocolError'; status: number; headers: Headers; body: Buffer }
    | { kind: 'networkError'; cause: unknown };

export type SuccessOutcome = Extract<DispatchOutcome, { kind: 'success' }>;

const MULTISTATUS = 207;
const UNAUTHORIZED = 401;

function isReplayable(body: RequestBody | undefined): boolean {
    return body === undefined || typeof body === 'string' || Buffer.isBuffer(body);
}

export function headersToRecord(headers: Headers): Record<string, string> {
    const record: Record<string, string> = {};
    headers.forEach((value, name) => {
        record[name.toLowerCase()] = value;
    });
    return record;
}

/** Name=value pairs per host, replayed as a Cookie header. */
class CookieJar {
    private readonly cookies = new Map<string, Map<string, string>>();

    store(url: string, headers: Headers): void {
        // raw() keeps the casing the header was first added with
        const setCookies = Object.entries(headers.raw())
            .filter(([name]) => name.toLowerCase() === 'set-cookie')
            .flatMap(([, values]) => values);
        if (setCookies.length === 0) return;
        const host = new URL(url).host;
        const jar = this.cookies.get(host) ?? new Map<string, string>();
        for (const setCookie of setCookies) {
            const pair = setCookie.split(';')[0];
            const eq = pair.indexOf('=');
            if (eq <= 0) continue;
            jar.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
        }
        this.cookies.set(host, jar);
    }

    headerFor(url: string): string | undefined {
        const jar = this.cookies.get(new URL(url).host);
        if (jar === undefined || jar.size === 0) return undefined;
        return [...jar.entries()].map(([name, value]) => `${name}=${value}`).join('; ');
    }

    clear(): void {
        this.cookies.clear();
    }
}

/**
 * The single place requests leave the client. Resolves URLs, merges headers,
 * answers one 401 challenge and classifies what comes back.
 */
export class RequestDispatcher {
    private baseUrl?: string;
    private compression: boolean;
    private cookiesIgnored: boolean;
    private readonly cookieJar = new CookieJar();
    private readonly httpAgent = new http.Agent({ keepAlive: true });
    private readonly httpsAgent = new https.Agent({ keepAlive: true });

    constructor(
        private readonly config: ClientConfig,
        private readonly negotiator: AuthenticationNegotiator
    ) {
        this.baseUrl = config.baseUrl;
        this.compression = config.compression;
        this.cookiesIgnored = config.ignoreCookies;
    }

    setBaseUrl(baseUrl: string | undefined): void {
        this.baseUrl = baseUrl;
    }

    getBaseUrl(): string | undefined {
        return this.baseUrl;
    }

    setCompression(enabled: boolean): void {
        this.compression = enabled;
    }

    isCompressionEnabled(): boolean {
        return this.compression;
    }

    ignoreCookies(): void {
        this.cookiesIgnored = true;
        this.cookieJar.clear();
    }

    /** Drops pooled connections. Later requests open new ones. */
    close(): void {
        this.httpAgent.destroy();
        this.httpsAgent.destroy();
        this.cookieJar.clear();
    }

    resolveUrl(url: string): string {
        if (isAbsoluteUrl(url) || this.baseUrl === undefined) return url;
        return joinPaths(this.baseUrl, url);
    }

    /** Resolves an href from a response body against the URL it was returned for. */
    resolveHref(href: string, requestUrl: string): string {
        if (isAbsoluteUrl(href)) return href;
        const base = this.resolveUrl(requestUrl);
        return isAbsoluteUrl(base) ? new URL(href, base).toString() : href;
    }

    buildHeaders(url: string, extra: Record<string, string> = {}): Record<string, string> {
        const headers: Record<string, string> = { ...this.config.defaultHeaders };
        if (this.compression) {
            headers['Accept-Encoding'] = ACCEPT_ENCODING;
        }
        Object.assign(headers, this.negotiator.headersForRequest(url));
        const cookie = this.cookiesIgnored ? undefined : this.cookieJar.headerFor(url);
        if (cookie !== undefined) {
            headers.Cookie = cookie;
        }
        return { ...headers, ...extra };
    }

    /** Runs the exchange and reports the outcome without throwing for HTTP statuses. */
    async execute(request: DispatchRequest): Promise<DispatchOutcome> {
        const url = this.resolveUrl(request.url);
        let response: Response;
        try {
            response = await this.exchange(request, url);
        } catch (error) {
            if (error instanceof WebDAVError) throw error;
            return { kind: 'networkError', cause: error };
        }

        let body: Buffer;
        try {
            body = decodeBuffer(await response.buffer(), contentEncodingOf(response.headers.get('content-encoding')));
        } catch (error) {
            return { kind: 'networkError', cause: error };
        }

        const status = response.status;
        if (status === MULTISTATUS || isSuccessStatus(status)) {
            return { kind: 'success', status, headers: response.headers, body };
        }
        return { kind: 'protocolError', status, headers: response.headers, body };
    }

    /**
     * Like `execute` but throws the typed error for anything that is not a
     * success. A 207 is always a success here.
     */
    async send(request: DispatchRequest): Promise<SuccessOutcome> {
        const url = this.resolveUrl(request.url);
        const outcome = await this.execute(request);
        switch (outcome.kind) {
            case 'success':
                return outcome;
            case 'networkError':
                throw this.networkError(request.method, url, outcome.cause);
            case 'protocolError':
                throw this.protocolError(request.method, url, outcome.status, outcome.body.toString('utf8'));
        }
    }

    /**
     * Sends a multi-resource request and decodes the multistatus body, even
     * when every entry in it reports a failure. A 2xx with an empty body
     * yields no responses.
     */
    async sendMultistatus(request: DispatchRequest): Promise<Multistatus> {
        const outcome = await this.send(request);
        const body = outcome.body.toString('utf8');
        if (outcome.status !== MULTISTATUS && body.trim() === '') {
            return { responses: [] };
        }
        try {
            return parseMultistatus(body);
        } catch (error) {
            throw this.malformed(error, request.method, request.url);
        }
    }

    /**
     * Sends the request and returns the response with its body unread, for
     * streaming downloads. Non-success statuses throw like `send`.
     */
    async open(request: DispatchRequest): Promise<Response> {
        const url = this.resolveUrl(request.url);
        let response: Response;
        try {
            response = await this.exchange(request, url);
        } catch (error) {
            if (error instanceof WebDAVError) throw error;
            throw this.networkError(request.method, url, error);
        }
        if (response.status === MULTISTATUS || isSuccessStatus(response.status)) {
            return response;
        }
        const body = await response.text().catch((error: unknown) => {
            logger.debug(`Could not read error body of ${request.method} ${url}`, { error });
            return '';
        });
        throw this.protocolError(request.method, url, response.status, body);
    }

    /** Wraps a parse failure with the operation it belongs to. */
    malformed(error: unknown, method: string, url: string): WebDAVError {
        const resolved = this.resolveUrl(url);
        if (error instanceof MalformedResponseError) return error.withContext(method, resolved);
        if (error instanceof WebDAVError) return error;
        const message = error instanceof Error ? error.message : String(error);
        return new MalformedResponseError(message, method, resolved);
    }

    private async exchange(request: DispatchRequest, url: string): Promise<Response> {
        const headers = this.buildHeaders(url, request.headers);
        let response = await this.fetchOnce(request, url, headers);
        if (response.status !== UNAUTHORIZED) return response;

        if (!isReplayable(request.body)) {
            response.body.resume();
            throw new AuthenticationError(
                'Authentication required for streamed upload; enable preemptive authentication',
                request.method,
                url
            );
        }

        const authorization = await this.negotiator.respondToChallenge(url, headersToRecord(response.headers));
        if (authorization === undefined) {
            return response;
        }

        response.body.resume();
        logger.debug(`Retrying ${request.method} ${url} after authentication challenge`);
        response = await this.fetchOnce(request, url, { ...headers, Authorization: authorization });
        return response;
    }

    private async fetchOnce(request: DispatchRequest, url: string, headers: Record<string, string>): Promise<Response> {
        const response = await fetchWithTimeout(url, {
            method: request.method,
            headers,
            body: request.body,
            compress: false,
            redirect: 'follow',
            agent: (parsed: URL) => (parsed.protocol === 'http:' ? this.httpAgent : this.httpsAgent),
            timeout: this.config.timeoutMs,
            signal: request.signal,
        });
        if (!this.cookiesIgnored) {
            this.cookieJar.store(url, response.headers);
        }
        return response;
    }

    private networkError(method: string, url: string, cause: unknown): NetworkError {
        const reason = cause instanceof Error ? cause.message : String(cause);
        logger.error(`${method} ${url} failed: ${reason}`, { error: cause });
        return new NetworkError(`Network error during ${method}: ${reason}`, method, url, cause);
    }

    private protocolError(method: string, url: string, status: number, body: string): WebDAVError {
        const { conditions, description } = parseErrorBody(body);
        if (status === UNAUTHORIZED) {
            logger.error(`${method} ${url} rejected credentials`);
            return new AuthenticationError(`Authentication failed for ${method}`, method, url);
        }
        logger.error(`${method} ${url} failed with status ${status}`, { conditions });
        return new ProtocolError(description || `${method} failed with status ${status}`, method, url, status, {
            body,
            conditions,
            description,
        });
    }
}
