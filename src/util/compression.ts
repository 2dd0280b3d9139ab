import { Transform } from 'stream';
import zlib from 'zlib';
import logger from './logger';

export type ContentEncoding = 'gzip' | 'deflate' | 'identity';

export const ACCEPT_ENCODING = 'gzip, deflate';

export function contentEncodingOf(header: string | null | undefined): ContentEncoding {
    const value = (header ?? '').toLowerCase();
    if (value.includes('gzip')) return 'gzip';
    if (value.includes('deflate')) return 'deflate';
    return 'identity';
}

/**
 * Decodes a whole body. Deflate is read as raw deflate first and as
 * zlib-wrapped deflate second; undecodable bytes are returned unchanged.
 */
export function decodeBuffer(body: Buffer, encoding: ContentEncoding): Buffer {
    if (encoding === 'identity' || body.length === 0) return body;
    try {
        if (encoding === 'gzip') return zlib.gunzipSync(body);
        try {
            return zlib.inflateRawSync(body);
        } catch {
            return zlib.inflateSync(body);
        }
    } catch (error) {
        logger.warn(`Could not decode ${encoding} body, using raw bytes`, { error });
        return body;
    }
}

export function createDecoder(encoding: ContentEncoding): Transform | undefined {
    switch (encoding) {
        case 'gzip':
            return zlib.createGunzip();
        case 'deflate':
            return zlib.createInflateRaw();
        default:
            return undefined;
    }
}
