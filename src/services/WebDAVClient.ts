import { promises as fs } from 'fs';
import { Readable } from 'stream';
import { AuthHandler } from '../auth/AuthHandler';
import { AuthenticationNegotiator, AuthState } from '../auth/AuthenticationNegotiator';
import { ClientConfig, ClientConfigOverrides, createConfig, loadConfigFromEnv } from '../config';
import { DavAce, DavAcl } from '../models/DavAce';
import { DavPrincipal } from '../models/DavPrincipal';
import { DavQuota } from '../models/DavQuota';
import { DavResource } from '../models/DavResource';
import type { Activelock, LockOptions } from '../models/lock';
import type { Multistatus, SyncResult } from '../models/multistatus';
import type { WebDAVReport } from '../models/WebDAVReport';
import { depthToString, getFileName, isAbsoluteUrl, XML_CONTENT_TYPE } from '../util/davUtils';
import logger from '../util/logger';
import { getMimeType } from '../util/mimeTypes';
import { successfulProperties, toResources, toSyncResult } from '../xml/multistatusParser';
import {
    bind,
    DEFAULT_PROPFIND_PROPERTIES,
    DEFAULT_SYNC_PROPERTIES,
    propfindAllprop,
    propfindAllpropInclude,
    propfindPropname,
    propfindProps,
    proppatch,
    searchRequest,
    syncCollection,
    unbind,
} from '../xml/requestBodies';
import { AccessControlService } from './AccessControlService';
import { DEFAULT_LOCK_OWNER, DEFAULT_LOCK_TIMEOUT, ifHeader, LockVersionManager } from './LockVersionManager';
import { RequestBody, RequestDispatcher } from './RequestDispatcher';
import { ByteSource, ProgressListener, StreamingTransferManager } from './StreamingTransferManager';
import { VersioningService } from './VersioningService';

export interface WebDAVClientOptions extends ClientConfigOverrides {
    username?: string;
    password?: string;
    domain?: string;
    workstation?: string;
    preemptive?: boolean;
}

export interface SyncCollectionOptions {
    /** 1 for direct members, -1 for the whole subtree. */
    depth?: number;
    limit?: number;
    properties?: readonly string[];
}

function overwriteHeader(overwrite: boolean): string {
    return overwrite ? 'T' : 'F';
}

/**
 * WebDAV client covering RFC 4918 plus the ACL, versioning, search, sync and
 * binding extensions. Relative URLs resolve against the configured base URL.
 */
export class WebDAVClient {
    private readonly negotiator = new AuthenticationNegotiator();
    private readonly dispatcher: RequestDispatcher;
    private readonly transfers: StreamingTransferManager;
    private readonly locks: LockVersionManager;
    private readonly versioning: VersioningService;
    private readonly accessControl: AccessControlService;
    private username?: string;

    constructor(config: ClientConfig = createConfig()) {
        this.dispatcher = new RequestDispatcher(config, this.negotiator);
        this.transfers = new StreamingTransferManager(this.dispatcher);
        this.locks = new LockVersionManager(this.dispatcher, () => this.username ?? DEFAULT_LOCK_OWNER);
        this.versioning = new VersioningService(this.dispatcher);
        this.accessControl = new AccessControlService(this.dispatcher);
    }

    static create(options: WebDAVClientOptions = {}): WebDAVClient {
        const { username, password, domain, workstation, preemptive, ...overrides } = options;
        const client = new WebDAVClient(createConfig(overrides));
        client.applyCredentials(username, password, domain, workstation, preemptive);
        return client;
    }

    /** Reads `DAVKIT_*` settings (and `.env`); credentials come from `DAVKIT_USERNAME` / `DAVKIT_PASSWORD`. */
    static fromEnv(options: WebDAVClientOptions = {}): WebDAVClient {
        const { username, password, domain, workstation, preemptive, ...overrides } = options;
        const client = new WebDAVClient(loadConfigFromEnv(overrides));
        client.applyCredentials(
            username ?? process.env.DAVKIT_USERNAME,
            password ?? process.env.DAVKIT_PASSWORD,
            domain ?? process.env.DAVKIT_DOMAIN,
            workstation ?? process.env.DAVKIT_WORKSTATION,
            preemptive ?? process.env.DAVKIT_PREEMPTIVE === 'true'
        );
        return client;
    }

    private applyCredentials(username?: string, password?: string, domain?: string, workstation?: string, preemptive?: boolean): void {
        if (username === undefined || password === undefined) return;
        this.setCredentialsWithDomain(username, password, domain, workstation, preemptive);
    }

    // Configuration and authentication

    getBaseUrl(): string | undefined {
        return this.dispatcher.getBaseUrl();
    }

    setBaseUrl(baseUrl: string): void {
        this.dispatcher.setBaseUrl(baseUrl);
    }

    setCredentials(username: string, password: string, preemptive = false): void {
        this.negotiator.setCredentials(username, password, preemptive);
        this.username = username;
    }

    setCredentialsWithDomain(username: string, password: string, domain?: string, workstation?: string, preemptive = false): void {
        this.negotiator.setCredentialsWithDomain(username, password, domain, workstation, preemptive);
        this.username = username;
    }

    setAuthenticationHandler(handler: AuthHandler, preemptive = false): void {
        this.negotiator.setAuthenticationHandler(handler, preemptive);
        this.username = undefined;
    }

    clearAuthentication(): void {
        this.negotiator.clearAuthentication();
        this.username = undefined;
    }

    getAuthState(): AuthState {
        return this.negotiator.state;
    }

    enablePreemptiveAuthentication(hostname: string, ports?: readonly number[]): void {
        this.negotiator.enablePreemptiveAuthentication(hostname, ports);
    }

    disablePreemptiveAuthentication(): void {
        this.negotiator.disablePreemptiveAuthentication();
    }

    enableCompression(): void {
        this.dispatcher.setCompression(true);
    }

    disableCompression(): void {
        this.dispatcher.setCompression(false);
    }

    isCompressionEnabled(): boolean {
        return this.dispatcher.isCompressionEnabled();
    }

    ignoreCookies(): void {
        this.dispatcher.ignoreCookies();
    }

    /** Headers the next request to `url` would carry before caller additions. */
    headersFor(url: string): Record<string, string> {
        const resolved = this.dispatcher.resolveUrl(url);
        return this.dispatcher.buildHeaders(resolved);
    }

    shutdown(): void {
        this.dispatcher.close();
        logger.debug('Client connections closed');
    }

    // Listing and properties

    list(url: string): Promise<DavResource[]> {
        return this.listWithDepth(url, 1);
    }

    listWithDepth(url: string, depth: number): Promise<DavResource[]> {
        return this.listWithAllProp(url, depth);
    }

    /** `resourcetype` is always requested alongside the given names. */
    listWithProps(url: string, depth: number, properties: Iterable<string>, includeAllProp = false): Promise<DavResource[]> {
        const names = [...properties, 'resourcetype'];
        return this.propfindResources(url, depth, includeAllProp ? propfindAllpropInclude(names) : propfindProps(names));
    }

    /** Allprop, or the common property set when `allProp` is false. */
    listWithAllProp(url: string, depth: number, allProp = true): Promise<DavResource[]> {
        return this.propfindResources(url, depth, allProp ? propfindAllprop() : propfindProps(DEFAULT_PROPFIND_PROPERTIES));
    }

    propfind(url: string, depth: number, properties: Iterable<string>): Promise<DavResource[]> {
        return this.listWithProps(url, depth, properties);
    }

    /** The decoded envelope, with every propstat kept as the server grouped it. */
    propfindMultistatus(url: string, depth: number, properties?: Iterable<string>): Promise<Multistatus> {
        return this.dispatcher.sendMultistatus({
            method: 'PROPFIND',
            url,
            headers: { 'Content-Type': XML_CONTENT_TYPE, Depth: depthToString(depth) },
            body: properties === undefined ? propfindAllprop() : propfindProps(properties),
        });
    }

    /** Names of the properties each resource defines, from a propname PROPFIND. */
    async listPropertyNames(url: string, depth = 0): Promise<Map<string, string[]>> {
        const multistatus = await this.dispatcher.sendMultistatus({
            method: 'PROPFIND',
            url,
            headers: { 'Content-Type': XML_CONTENT_TYPE, Depth: depthToString(depth) },
            body: propfindPropname(),
        });
        const names = new Map<string, string[]>();
        for (const response of multistatus.responses) {
            names.set(response.href, [...successfulProperties(response).keys()]);
        }
        return names;
    }

    private async propfindResources(url: string, depth: number, body: string): Promise<DavResource[]> {
        return toResources(
            await this.dispatcher.sendMultistatus({
                method: 'PROPFIND',
                url,
                headers: { 'Content-Type': XML_CONTENT_TYPE, Depth: depthToString(depth) },
                body,
            })
        );
    }

    patch(url: string, setProperties: Record<string, string>): Promise<DavResource[]> {
        return this.patchWithRemove(url, setProperties, []);
    }

    patchWithRemove(url: string, setProperties: Record<string, string>, removeProperties: Iterable<string>): Promise<DavResource[]> {
        return this.proppatch(url, proppatch(setProperties, removeProperties), {});
    }

    patchWithHeaders(url: string, setProperties: Record<string, string>, headers: Record<string, string>): Promise<DavResource[]> {
        return this.proppatch(url, proppatch(setProperties), headers);
    }

    private async proppatch(url: string, body: string, headers: Record<string, string>): Promise<DavResource[]> {
        const multistatus = await this.dispatcher.sendMultistatus({
            method: 'PROPPATCH',
            url,
            headers: { 'Content-Type': XML_CONTENT_TYPE, ...headers },
            body,
        });
        return toResources(multistatus);
    }

    // Reports, search and sync

    async report<T>(url: string, depth: number, report: WebDAVReport<T>): Promise<T> {
        const outcome = await this.dispatcher.send({
            method: 'REPORT',
            url,
            headers: {
                'Content-Type': XML_CONTENT_TYPE,
                Depth: report.depth?.() ?? depthToString(depth),
                ...report.headers?.(),
            },
            body: report.toXml(),
        });
        try {
            return report.parseResponse(outcome.body.toString('utf8'));
        } catch (error) {
            throw this.dispatcher.malformed(error, 'REPORT', url);
        }
    }

    /**
     * Changes since `syncToken` (empty for an initial sync). The Depth header
     * is always 0; the requested depth becomes the sync-level.
     */
    async syncCollection(url: string, syncToken: string, options: SyncCollectionOptions = {}): Promise<SyncResult> {
        const syncLevel = options.depth === -1 ? 'infinite' : '1';
        const multistatus = await this.dispatcher.sendMultistatus({
            method: 'REPORT',
            url,
            headers: { 'Content-Type': XML_CONTENT_TYPE, Depth: '0' },
            body: syncCollection(syncToken, syncLevel, options.properties ?? DEFAULT_SYNC_PROPERTIES, options.limit),
        });
        return toSyncResult(multistatus);
    }

    /** `language` "davbasic" runs a basicsearch `contains`; anything else is sent as SQL. */
    async search(url: string, language: string, query: string): Promise<DavResource[]> {
        const multistatus = await this.dispatcher.sendMultistatus({
            method: 'SEARCH',
            url,
            headers: { 'Content-Type': XML_CONTENT_TYPE },
            body: searchRequest(language, query, this.pathOf(url)),
        });
        return toResources(multistatus);
    }

    // Content

    get(url: string): Promise<Buffer> {
        return this.getWithHeaders(url, {});
    }

    async getWithHeaders(url: string, headers: Record<string, string>): Promise<Buffer> {
        const outcome = await this.dispatcher.send({ method: 'GET', url, headers });
        return outcome.body;
    }

    getVersion(url: string, version: string): Promise<Buffer> {
        return this.locks.resolveVersion(url, version);
    }

    /** Aborting `signal` destroys the returned stream and its connection. */
    getStream(url: string, headers: Record<string, string> = {}, signal?: AbortSignal): Promise<Readable> {
        return this.transfers.download(url, { headers, signal });
    }

    downloadToFile(url: string, localPath: string, onProgress?: ProgressListener, signal?: AbortSignal): Promise<string> {
        return this.transfers.downloadToPath(url, localPath, { onProgress, signal });
    }

    put(url: string, data: Buffer | string): Promise<void> {
        return this.putWithContentType(url, data, 'application/octet-stream');
    }

    putWithContentType(url: string, data: Buffer | string, contentType: string): Promise<void> {
        return this.putWithHeaders(url, data, { 'Content-Type': contentType });
    }

    async putWithHeaders(url: string, data: Buffer | string, headers: Record<string, string>): Promise<void> {
        const body = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
        await this.putBody(url, body, { 'Content-Length': String(body.length), ...headers });
    }

    putFile(url: string, localPath: string, contentType?: string): Promise<void> {
        return this.putFileWithLock(url, localPath, contentType, false);
    }

    putFileWithExpect(url: string, localPath: string, contentType?: string): Promise<void> {
        return this.putFileWithLock(url, localPath, contentType, true);
    }

    /** Reads the file into memory; use `putFileStream` for large files. */
    async putFileWithLock(url: string, localPath: string, contentType: string | undefined, expectContinue: boolean, lockToken?: string): Promise<void> {
        const data = await fs.readFile(localPath);
        const headers: Record<string, string> = {
            'Content-Type': contentType ?? getMimeType(localPath),
            'Content-Length': String(data.length),
        };
        if (expectContinue) headers.Expect = '100-continue';
        if (lockToken) headers.If = ifHeader(lockToken);
        await this.putBody(url, data, headers);
    }

    /** PUT with a caller-declared length; the body is not replayable after a 401. */
    putStream(
        url: string,
        source: ByteSource,
        length: number,
        contentType = 'application/octet-stream',
        onProgress?: ProgressListener,
        signal?: AbortSignal
    ): Promise<void> {
        return this.transfers.upload(url, source, length, { contentType, onProgress, signal });
    }

    putFileStream(url: string, localPath: string, contentType?: string, onProgress?: ProgressListener, signal?: AbortSignal): Promise<void> {
        return this.transfers.uploadFile(url, localPath, { contentType, onProgress, signal });
    }

    private async putBody(url: string, body: RequestBody, headers: Record<string, string>): Promise<void> {
        try {
            await this.dispatcher.send({ method: 'PUT', url, headers, body });
            logger.info(`File uploaded successfully: ${url}`);
        } catch (error) {
            logger.error(`Failed to upload file: ${url}`, { error });
            throw error;
        }
    }

    // Namespace operations

    delete(url: string): Promise<void> {
        return this.deleteWithHeaders(url, {});
    }

    async deleteWithHeaders(url: string, headers: Record<string, string>): Promise<void> {
        await this.dispatcher.send({ method: 'DELETE', url, headers });
        logger.info(`Deleted ${url}`);
    }

    async createDirectory(url: string): Promise<void> {
        await this.dispatcher.send({ method: 'MKCOL', url });
        logger.info(`Directory created successfully: ${url}`);
    }

    move(sourceUrl: string, destinationUrl: string): Promise<void> {
        return this.moveWithOverwrite(sourceUrl, destinationUrl, true);
    }

    moveWithOverwrite(sourceUrl: string, destinationUrl: string, overwrite: boolean): Promise<void> {
        return this.moveWithLock(sourceUrl, destinationUrl, overwrite);
    }

    moveWithLock(sourceUrl: string, destinationUrl: string, overwrite: boolean, lockToken?: string): Promise<void> {
        const headers: Record<string, string> = { Overwrite: overwriteHeader(overwrite) };
        if (lockToken) headers.If = ifHeader(lockToken);
        return this.moveWithHeaders(sourceUrl, destinationUrl, headers);
    }

    async moveWithHeaders(sourceUrl: string, destinationUrl: string, headers: Record<string, string>): Promise<void> {
        await this.dispatcher.send({
            method: 'MOVE',
            url: sourceUrl,
            headers: { Destination: this.dispatcher.resolveUrl(destinationUrl), ...headers },
        });
        logger.info(`File moved successfully: ${sourceUrl} -> ${destinationUrl}`);
    }

    copy(sourceUrl: string, destinationUrl: string): Promise<void> {
        return this.copyWithOverwrite(sourceUrl, destinationUrl, true);
    }

    copyWithOverwrite(sourceUrl: string, destinationUrl: string, overwrite: boolean): Promise<void> {
        return this.copyWithHeaders(sourceUrl, destinationUrl, { Overwrite: overwriteHeader(overwrite) });
    }

    async copyWithHeaders(sourceUrl: string, destinationUrl: string, headers: Record<string, string>): Promise<void> {
        await this.dispatcher.send({
            method: 'COPY',
            url: sourceUrl,
            headers: { Destination: this.dispatcher.resolveUrl(destinationUrl), ...headers },
        });
        logger.info(`File copied successfully: ${sourceUrl} -> ${destinationUrl}`);
    }

    /**
     * HEAD probe. Every failure, a network failure included, reads as
     * `false`, so "absent" and "could not tell" look the same.
     */
    async exists(url: string): Promise<boolean> {
        try {
            const outcome = await this.dispatcher.execute({ method: 'HEAD', url });
            return outcome.kind === 'success';
        } catch (error) {
            logger.debug(`exists() probe for ${url} failed`, { error });
            return false;
        }
    }

    /**
     * Creates a new binding named after the last segment of `targetUrl`, in
     * its parent collection, pointing at `sourceUrl`.
     */
    async bind(sourceUrl: string, targetUrl: string, overwrite: boolean): Promise<void> {
        const target = this.dispatcher.resolveUrl(targetUrl);
        const segment = getFileName(this.pathOf(target));
        const collection = isAbsoluteUrl(target) ? new URL('./', target).toString() : target.slice(0, target.length - segment.length);
        await this.dispatcher.send({
            method: 'BIND',
            url: collection,
            headers: { 'Content-Type': XML_CONTENT_TYPE, Overwrite: overwriteHeader(overwrite) },
            body: bind(segment, this.dispatcher.resolveUrl(sourceUrl)),
        });
    }

    /** Removes the binding `segment` from the collection at `url`. */
    async unbind(url: string, segment: string): Promise<void> {
        await this.dispatcher.send({
            method: 'UNBIND',
            url,
            headers: { 'Content-Type': XML_CONTENT_TYPE },
            body: unbind(segment),
        });
    }

    // Locking

    lock(url: string): Promise<string> {
        return this.lockWithTimeout(url, DEFAULT_LOCK_TIMEOUT);
    }

    lockWithTimeout(url: string, timeoutSeconds: number, options?: LockOptions): Promise<string> {
        return this.locks.acquireLock(url, timeoutSeconds, options);
    }

    refreshLock(url: string, token: string, resource?: string): Promise<string> {
        return this.locks.refreshLock(url, token, resource);
    }

    unlock(url: string, token: string): Promise<void> {
        return this.locks.releaseLock(url, token);
    }

    discoverLocks(url: string): Promise<Activelock[]> {
        return this.locks.discoverLocks(url);
    }

    isLocked(url: string): Promise<boolean> {
        return this.locks.isLocked(url);
    }

    getLockToken(url: string): Promise<string | undefined> {
        return this.locks.getLockToken(url);
    }

    // Access control

    getAcl(url: string): Promise<DavAcl> {
        return this.accessControl.getAcl(url);
    }

    setAcl(url: string, aces: readonly DavAce[]): Promise<void> {
        return this.accessControl.setAcl(url, aces);
    }

    getPrincipals(url: string): Promise<DavPrincipal[]> {
        return this.accessControl.getPrincipals(url);
    }

    getPrincipalCollectionSet(url: string): Promise<string[]> {
        return this.accessControl.getPrincipalCollectionSet(url);
    }

    getCurrentUserPrivileges(url: string): Promise<string[]> {
        return this.accessControl.getCurrentUserPrivileges(url);
    }

    hasPrivilege(url: string, privilege: string): Promise<boolean> {
        return this.accessControl.hasPrivilege(url, privilege);
    }

    validatePrivileges(url: string, privileges: readonly string[]): Promise<Record<string, boolean>> {
        return this.accessControl.validatePrivileges(url, privileges);
    }

    getSupportedReports(url: string): Promise<string[]> {
        return this.accessControl.getSupportedReports(url);
    }

    getQuota(url: string): Promise<DavQuota> {
        return this.accessControl.getQuota(url);
    }

    // Versioning

    versionsList(url: string, depth = 1, properties?: readonly string[]): Promise<DavResource[]> {
        return this.versioning.versionsList(url, depth, properties);
    }

    getVersionHistory(url: string): Promise<string[]> {
        return this.versioning.getVersionHistory(url);
    }

    versionControl(url: string, version?: string): Promise<void> {
        return this.versioning.versionControl(url, version);
    }

    checkout(url: string, activity?: string): Promise<string> {
        return this.versioning.checkout(url, activity);
    }

    checkin(url: string, keepCheckedOut = false): Promise<string> {
        return this.versioning.checkin(url, keepCheckedOut);
    }

    uncheckout(url: string): Promise<void> {
        return this.versioning.uncheckout(url);
    }

    baselineControl(url: string, baseline?: string): Promise<void> {
        return this.versioning.baselineControl(url, baseline);
    }

    makeBaseline(url: string): Promise<string> {
        return this.versioning.makeBaseline(url);
    }

    private pathOf(url: string): string {
        const resolved = this.dispatcher.resolveUrl(url);
        return isAbsoluteUrl(resolved) ? new URL(resolved).pathname : resolved;
    }
}
