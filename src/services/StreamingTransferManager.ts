import fs from 'fs';
import { PassThrough, Readable, Transform, TransformCallback, addAbortSignal, pipeline } from 'stream';
import { pipeline as pipelineAsync } from 'stream/promises';
import { NetworkError, WebDAVError } from '../errorHandler';
import { contentEncodingOf, createDecoder } from '../util/compression';
import logger from '../util/logger';
import { getMimeType } from '../util/mimeTypes';
import { RequestDispatcher } from './RequestDispatcher';

/** Called with bytes transferred so far and the expected total, or -1 when unknown. */
export type ProgressListener = (transferred: number, total: number) => void;

export type ByteSource = Readable | AsyncIterable<Buffer | Uint8Array | string>;

export interface UploadOptions {
    contentType?: string;
    headers?: Record<string, string>;
    onProgress?: ProgressListener;
    signal?: AbortSignal;
}

export interface DownloadOptions {
    headers?: Record<string, string>;
    onProgress?: ProgressListener;
    signal?: AbortSignal;
}

/** Counts bytes as they pass and reports after each chunk. */
class ProgressCounter extends Transform {
    private transferred = 0;

    constructor(
        private readonly total: number,
        private readonly listener?: ProgressListener
    ) {
        super();
    }

    _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
        this.transferred += chunk.length;
        callback(null, chunk);
        this.listener?.(this.transferred, this.total);
    }
}

function toReadable(source: ByteSource): Readable {
    return source instanceof Readable ? source : Readable.from(source);
}

function declaredLength(header: string | null): number {
    if (header === null) return -1;
    const length = Number.parseInt(header, 10);
    return Number.isNaN(length) ? -1 : length;
}

/**
 * Moves bodies between the caller and the server without holding them in
 * memory. A failed download leaves whatever was written in place; removing
 * the partial file is up to the caller.
 */
export class StreamingTransferManager {
    constructor(private readonly dispatcher: RequestDispatcher) {}

    async upload(url: string, source: ByteSource, length: number, options: UploadOptions = {}): Promise<void> {
        const counter = new ProgressCounter(length, options.onProgress);
        const body = pipeline(toReadable(source), counter, (error) => {
            if (error) logger.debug(`Upload source for ${url} ended with an error`, { error });
        });
        const headers: Record<string, string> = {
            'Content-Type': options.contentType ?? 'application/octet-stream',
            ...options.headers,
        };
        if (length >= 0) {
            headers['Content-Length'] = String(length);
        }

        try {
            await this.dispatcher.send({ method: 'PUT', url, headers, body, signal: options.signal });
            logger.info(`Uploaded ${length >= 0 ? length : 'unknown'} bytes to ${url}`);
        } catch (error) {
            body.destroy();
            logger.error(`Failed to upload stream: ${url}`, { error });
            throw error;
        }
    }

    async uploadFile(url: string, localPath: string, options: UploadOptions = {}): Promise<void> {
        const stats = await fs.promises.stat(localPath);
        await this.upload(url, fs.createReadStream(localPath), stats.size, {
            ...options,
            contentType: options.contentType ?? getMimeType(localPath),
        });
    }

    /**
     * Response body as a stream, decompressed when the server encoded it.
     * Aborting `signal` destroys the stream and the connection under it.
     */
    async download(url: string, options: DownloadOptions = {}): Promise<Readable> {
        const response = await this.dispatcher.open({ method: 'GET', url, headers: options.headers, signal: options.signal });
        const total = declaredLength(response.headers.get('content-length'));
        const counter = new ProgressCounter(total, options.onProgress);
        const decoder = createDecoder(contentEncodingOf(response.headers.get('content-encoding')));
        const output = new PassThrough();
        if (options.signal) {
            addAbortSignal(options.signal, output);
        }
        const onDone = (error: NodeJS.ErrnoException | null) => {
            if (error) logger.debug(`Download stream for ${url} ended with an error`, { error });
        };
        if (decoder === undefined) {
            pipeline(response.body, counter, output, onDone);
        } else {
            pipeline(response.body, counter, decoder, output, onDone);
        }
        return output;
    }

    async downloadBuffer(url: string, options: DownloadOptions = {}): Promise<Buffer> {
        const stream = await this.download(url, options);
        const chunks: Buffer[] = [];
        try {
            for await (const chunk of stream) {
                chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
            }
        } catch (error) {
            throw this.streamFailure('GET', url, error, options.signal);
        }
        return Buffer.concat(chunks);
    }

    /**
     * Streams a resource into a file and resolves to its path. Progress counts
     * bytes as received, before decompression. Errors from the file itself are
     * rethrown as they are.
     */
    async downloadToPath(url: string, localPath: string, options: DownloadOptions = {}): Promise<string> {
        const response = await this.dispatcher.open({ method: 'GET', url, headers: options.headers, signal: options.signal });
        const total = declaredLength(response.headers.get('content-length'));
        const counter = new ProgressCounter(total, options.onProgress);
        const decoder = createDecoder(contentEncodingOf(response.headers.get('content-encoding')));
        const file = fs.createWriteStream(localPath);
        let fileError: unknown;
        file.once('error', (error) => {
            fileError = error;
        });

        try {
            if (decoder === undefined) {
                await pipelineAsync(response.body, counter, file, { signal: options.signal });
            } else {
                await pipelineAsync(response.body, counter, decoder, file, { signal: options.signal });
            }
        } catch (error) {
            if (error === fileError) {
                logger.error(`Failed to write ${localPath} for ${url}`, { error });
                throw error;
            }
            throw this.streamFailure('GET', url, error, options.signal);
        }
        logger.info(`File downloaded successfully: ${url} -> ${localPath}`);
        return localPath;
    }

    private streamFailure(method: string, url: string, error: unknown, signal?: AbortSignal): WebDAVError {
        if (error instanceof WebDAVError) return error;
        const resolved = this.dispatcher.resolveUrl(url);
        if (signal?.aborted) {
            logger.info(`Transfer aborted: ${method} ${resolved}`);
            return new NetworkError(`Transfer aborted during ${method}`, method, resolved, error);
        }
        const reason = error instanceof Error ? error.message : String(error);
        logger.error(`Transfer interrupted: ${method} ${resolved}`, { error });
        return new NetworkError(`Transfer interrupted during ${method}: ${reason}`, method, resolved, error);
    }
}
