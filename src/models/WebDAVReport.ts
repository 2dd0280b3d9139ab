/**
 * A REPORT request the caller can define. `parseResponse` receives the raw
 * body of a 2xx or 207 answer.
 */
export interface WebDAVReport<T> {
    toXml(): string;
    parseResponse(body: string): T;
    /** Overrides the Depth passed to `report()`. */
    depth?(): string | undefined;
    headers?(): Record<string, string>;
}
