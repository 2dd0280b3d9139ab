import { MalformedResponseError } from '../errorHandler';
import type { Activelock, LockOptions } from '../models/lock';
import { depthToString, joinPaths, XML_CONTENT_TYPE } from '../util/davUtils';
import logger from '../util/logger';
import { parseMultistatus, successfulProperties } from '../xml/multistatusParser';
import { parseLockDiscovery, parseLockToken } from '../xml/propertyParsers';
import { lockInfo, propfindProps } from '../xml/requestBodies';
import { queryOwnProperties } from './propertyQuery';
import { RequestDispatcher } from './RequestDispatcher';

export const DEFAULT_LOCK_TIMEOUT = 3600;
export const DEFAULT_LOCK_OWNER = 'davkit';
/** RFC 3253 header selecting a version of a version-controlled resource by label. */
export const VERSION_LABEL_HEADER = 'Label';

/** `(<token>)`, or the tagged form `<resource> (<token>)`. */
export function ifHeader(token: string, resource?: string): string {
    return resource ? `<${resource}> (<${token}>)` : `(<${token}>)`;
}

function stripAngles(value: string): string {
    return value.trim().replace(/^<(.*)>$/, '$1');
}

export class LockVersionManager {
    constructor(
        private readonly dispatcher: RequestDispatcher,
        private readonly defaultOwner: () => string = () => DEFAULT_LOCK_OWNER
    ) {}

    /**
     * Takes a write lock and returns its token.
     * @throws MalformedResponseError when the server grants the lock without a token.
     */
    async acquireLock(url: string, timeoutSeconds = DEFAULT_LOCK_TIMEOUT, options: LockOptions = {}): Promise<string> {
        const headers: Record<string, string> = {
            'Content-Type': XML_CONTENT_TYPE,
            Timeout: `Second-${timeoutSeconds}`,
        };
        if (options.depth !== undefined) {
            headers.Depth = depthToString(options.depth);
        }
        const outcome = await this.dispatcher.send({
            method: 'LOCK',
            url,
            headers,
            body: lockInfo(options.owner ?? this.defaultOwner(), options.scope),
        });

        const headerToken = outcome.headers.get('lock-token');
        const token = parseLockToken(outcome.body.toString('utf8')) ?? (headerToken ? stripAngles(headerToken) : undefined);
        if (token === undefined) {
            throw new MalformedResponseError('LOCK response carries no lock token', 'LOCK', this.dispatcher.resolveUrl(url));
        }
        logger.info(`Locked ${url}`);
        return token;
    }

    /** Extends a lock. The caller's token is returned when the server sends no new one. */
    async refreshLock(url: string, token: string, resource?: string): Promise<string> {
        const outcome = await this.dispatcher.send({
            method: 'LOCK',
            url,
            headers: {
                If: ifHeader(token, resource),
                Timeout: `Second-${DEFAULT_LOCK_TIMEOUT}`,
            },
        });
        const refreshed = parseLockToken(outcome.body.toString('utf8'));
        if (refreshed === undefined) {
            logger.debug(`LOCK refresh of ${url} returned no token, keeping the current one`);
        }
        return refreshed ?? token;
    }

    async releaseLock(url: string, token: string): Promise<void> {
        await this.dispatcher.send({
            method: 'UNLOCK',
            url,
            headers: { 'Lock-Token': `<${token}>` },
        });
        logger.info(`Unlocked ${url}`);
    }

    async discoverLocks(url: string): Promise<Activelock[]> {
        const discovery = (await queryOwnProperties(this.dispatcher, url, ['lockdiscovery'])).get('lockdiscovery');
        return discovery === undefined ? [] : parseLockDiscovery(discovery.node);
    }

    async isLocked(url: string): Promise<boolean> {
        return (await this.discoverLocks(url)).length > 0;
    }

    async getLockToken(url: string): Promise<string | undefined> {
        const locks = await this.discoverLocks(url);
        return locks.find((lock) => lock.token !== undefined)?.token;
    }

    /**
     * Fetches a named version. Looks up `version-history` first and reads
     * `<history>/<label>`; if that cannot be done, asks for the resource
     * with a Label header. Errors of that last request propagate.
     */
    async resolveVersion(url: string, label: string): Promise<Buffer> {
        const history = await this.findVersionHistory(url);
        if (history !== undefined) {
            const versionUrl = joinPaths(this.dispatcher.resolveHref(history, url), label);
            try {
                const outcome = await this.dispatcher.send({ method: 'GET', url: versionUrl });
                return outcome.body;
            } catch (error) {
                logger.warn(`Version ${label} not readable at ${versionUrl}, selecting by label`, { error });
            }
        }
        const outcome = await this.dispatcher.send({
            method: 'GET',
            url,
            headers: { [VERSION_LABEL_HEADER]: label },
        });
        return outcome.body;
    }

    private async findVersionHistory(url: string): Promise<string | undefined> {
        try {
            const outcome = await this.dispatcher.execute({
                method: 'PROPFIND',
                url,
                headers: { 'Content-Type': XML_CONTENT_TYPE, Depth: '0' },
                body: propfindProps(['version-history']),
            });
            if (outcome.kind !== 'success' || outcome.status !== 207) return undefined;
            const [first] = parseMultistatus(outcome.body.toString('utf8')).responses;
            const value = first === undefined ? undefined : successfulProperties(first).get('version-history')?.value;
            return value === '' ? undefined : value;
        } catch (error) {
            logger.warn(`version-history lookup failed for ${url}`, { error });
            return undefined;
        }
    }
}
