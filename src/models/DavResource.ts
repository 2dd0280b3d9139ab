import { DIRECTORY_CONTENT_TYPE, formatDate, getFileName, isAbsoluteUrl } from '../util/davUtils';

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

export interface DavResourceInit {
    href: string;
    status?: number;
    contentType?: string;
    contentLength?: number;
    contentLanguage?: string;
    etag?: string;
    displayName?: string;
    resourceTypes?: string[];
    lastModified?: Date;
    creationDate?: Date;
    customProperties?: Record<string, string>;
}

export interface DavResourceJSON {
    href: string;
    status: number;
    contentType: string;
    contentLength: number;
    contentLanguage?: string;
    etag?: string;
    displayName?: string;
    resourceTypes: string[];
    lastModified?: string;
    creationDate?: string;
    customProperties: Record<string, string>;
}

/**
 * A resource as described by one multistatus response. Built fresh from each
 * parsed body and never mutated afterwards.
 */
export class DavResource {
    readonly href: string;
    readonly status: number;
    readonly contentType: string;
    readonly contentLength: number;
    readonly contentLanguage?: string;
    readonly etag?: string;
    readonly displayName?: string;
    readonly resourceTypes: readonly string[];
    readonly lastModified?: Date;
    readonly creationDate?: Date;
    readonly customProperties: Readonly<Record<string, string>>;

    constructor(init: DavResourceInit) {
        this.href = init.href;
        this.status = init.status ?? 200;
        this.contentType = init.contentType ?? DEFAULT_CONTENT_TYPE;
        this.contentLength = init.contentLength ?? -1;
        this.contentLanguage = init.contentLanguage;
        this.etag = init.etag;
        this.displayName = init.displayName;
        this.resourceTypes = Object.freeze([...(init.resourceTypes ?? [])]);
        this.lastModified = init.lastModified;
        this.creationDate = init.creationDate;
        this.customProperties = Object.freeze({ ...init.customProperties });
        Object.freeze(this);
    }

    /** Servers mark collections either by resource type or by content type. */
    get isDirectory(): boolean {
        return this.resourceTypes.includes('collection') || this.contentType === DIRECTORY_CONTENT_TYPE;
    }

    get isFile(): boolean {
        return !this.isDirectory;
    }

    get path(): string {
        if (isAbsoluteUrl(this.href)) {
            try {
                return new URL(this.href).pathname;
            } catch {
                return this.href;
            }
        }
        return this.href.split(/[?#]/)[0];
    }

    get name(): string {
        return getFileName(this.path);
    }

    getCustomProperty(name: string): string | undefined {
        return this.customProperties[name];
    }

    equals(other: DavResource): boolean {
        return this.href === other.href;
    }

    toJSON(): DavResourceJSON {
        return {
            href: this.href,
            status: this.status,
            contentType: this.contentType,
            contentLength: this.contentLength,
            contentLanguage: this.contentLanguage,
            etag: this.etag,
            displayName: this.displayName,
            resourceTypes: [...this.resourceTypes],
            lastModified: this.lastModified && formatDate(this.lastModified),
            creationDate: this.creationDate && formatDate(this.creationDate),
            customProperties: { ...this.customProperties },
        };
    }

    static fromJSON(json: DavResourceJSON): DavResource {
        return new DavResource({
            ...json,
            lastModified: json.lastModified ? new Date(json.lastModified) : undefined,
            creationDate: json.creationDate ? new Date(json.creationDate) : undefined,
        });
    }
}
