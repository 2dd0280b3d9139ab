import type { XmlNode } from '../xml/xmlNode';
import type { DavResource } from './DavResource';

export interface DavStatus {
    /** Status line as sent, e.g. "HTTP/1.1 403 Forbidden". */
    readonly line: string;
    readonly code: number;
}

export interface DavProperty {
    readonly name: string;
    readonly namespace?: string;
    /** Trimmed inner text, or "collection" for a collection resourcetype. */
    readonly value: string;
    readonly node: XmlNode;
}

export interface Propstat {
    readonly status: DavStatus;
    readonly properties: readonly DavProperty[];
    readonly error: readonly string[];
    readonly description?: string;
}

/**
 * One resource's outcome. Either `status` is set (whole-resource result) or
 * `propstats` holds one entry per property group.
 */
export interface DavResponse {
    readonly href: string;
    readonly hrefs: readonly string[];
    readonly status?: DavStatus;
    readonly propstats: readonly Propstat[];
    readonly error: readonly string[];
    readonly description?: string;
    readonly location?: string;
}

export interface Multistatus {
    readonly responses: readonly DavResponse[];
    readonly syncToken?: string;
    readonly description?: string;
}

export interface SyncResult {
    readonly resources: DavResource[];
    /** Hrefs the server reported as removed (404 without propstat). */
    readonly removed: string[];
    readonly syncToken?: string;
}
