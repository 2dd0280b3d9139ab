import { DavAce, SPECIAL_PRINCIPALS } from '../models/DavAce';
import type { Activelock } from '../models/lock';
import { parseDepth } from '../util/davUtils';
import logger from '../util/logger';
import { childText, findChild, findChildren, findDescendant, findDescendants, hrefsOf, parseXml, textContent, XmlNode } from './xmlNode';

export interface ErrorBody {
    conditions: string[];
    description?: string;
}

const DESCRIPTION_ELEMENTS = new Set(['responsedescription', 'description']);

/** Reads a DAV `error` body. Anything unreadable yields no conditions. */
export function parseErrorBody(body: string): ErrorBody {
    if (body.trim() === '' || !body.trimStart().startsWith('<')) {
        return { conditions: [] };
    }
    try {
        const root = parseXml(body);
        const error = root.localName === 'error' ? root : findDescendant(root, 'error');
        if (error === undefined) return { conditions: [] };
        const description = error.children.find((child) => DESCRIPTION_ELEMENTS.has(child.localName));
        return {
            conditions: error.children.filter((child) => !DESCRIPTION_ELEMENTS.has(child.localName)).map((child) => child.localName),
            description: description === undefined ? undefined : textContent(description).trim(),
        };
    } catch (error) {
        logger.debug('Error body is not parseable XML', { error });
        return { conditions: [] };
    }
}

/** "Second-3600" → 3600, "Infinite" → -1. */
export function parseTimeout(value: string | undefined): number | undefined {
    if (value === undefined || value === '') return undefined;
    const first = value.split(',')[0].trim();
    if (first.toLowerCase() === 'infinite') return -1;
    const match = /^Second-(\d+)$/i.exec(first);
    return match ? Number.parseInt(match[1], 10) : undefined;
}

function parseActivelock(node: XmlNode): Activelock {
    const lockToken = findChild(node, 'locktoken');
    const lockScope = findChild(node, 'lockscope');
    const lockType = findChild(node, 'locktype');
    const owner = findChild(node, 'owner');
    const lockRoot = findChild(node, 'lockroot');
    return {
        token: lockToken === undefined ? undefined : hrefsOf(lockToken)[0],
        scope: lockScope !== undefined && findChild(lockScope, 'shared') !== undefined ? 'shared' : 'exclusive',
        type: lockType?.children[0]?.localName ?? 'write',
        depth: parseDepth(childText(node, 'depth') ?? '0'),
        owner: owner === undefined ? undefined : textContent(owner).trim() || undefined,
        timeout: parseTimeout(childText(node, 'timeout')),
        lockRoot: lockRoot === undefined ? undefined : hrefsOf(lockRoot)[0],
    };
}

/** Active locks under a `lockdiscovery` property (or any ancestor of one). */
export function parseLockDiscovery(node: XmlNode): Activelock[] {
    return findDescendants(node, 'activelock').map(parseActivelock);
}

/**
 * Token from a LOCK answer: `prop/lockdiscovery/activelock/locktoken/href`.
 * Undefined when the body is empty, unreadable or carries no token.
 */
export function parseLockToken(body: string): string | undefined {
    if (body.trim() === '') return undefined;
    try {
        const lockToken = findDescendant(parseXml(body), 'locktoken');
        return lockToken === undefined ? undefined : hrefsOf(lockToken)[0];
    } catch (error) {
        logger.debug('LOCK body is not parseable XML', { error });
        return undefined;
    }
}

function parsePrincipal(principal: XmlNode | undefined): string | undefined {
    const first = principal?.children[0];
    if (first === undefined) return undefined;
    if (first.localName === 'href') return textContent(first).trim();
    if (first.localName === 'property') {
        const property = first.children[0];
        return property === undefined ? undefined : `property:${property.localName}`;
    }
    const special = SPECIAL_PRINCIPALS.find((name) => name === first.localName);
    return special === undefined ? undefined : `DAV:${special}`;
}

function privilegeNames(node: XmlNode | undefined): string[] {
    if (node === undefined) return [];
    return findChildren(node, 'privilege').flatMap((privilege) => privilege.children.map((child) => child.localName));
}

export function parseAce(node: XmlNode): DavAce | undefined {
    const invert = findChild(node, 'invert');
    const principal = parsePrincipal(findChild(invert ?? node, 'principal'));
    if (principal === undefined) {
        logger.debug('Skipping ace without a recognizable principal');
        return undefined;
    }
    const grant = findChild(node, 'grant');
    const inherited = findChild(node, 'inherited');
    return new DavAce({
        principal,
        grant: grant !== undefined,
        privileges: privilegeNames(grant ?? findChild(node, 'deny')),
        isProtected: findChild(node, 'protected') !== undefined,
        inherited: inherited !== undefined,
        inheritedFrom: inherited === undefined ? undefined : hrefsOf(inherited)[0],
    });
}

export function parseAclProperty(node: XmlNode): DavAce[] {
    return findChildren(node, 'ace')
        .map(parseAce)
        .filter((ace): ace is DavAce => ace !== undefined);
}

/** Local names of every privilege listed under `current-user-privilege-set`. */
export function parsePrivilegeSet(node: XmlNode): string[] {
    const names = findDescendants(node, 'privilege').flatMap((privilege) => privilege.children.map((child) => child.localName));
    return [...new Set(names)];
}

/** Report names under `supported-report-set`. */
export function parseSupportedReportSet(node: XmlNode): string[] {
    const names = findDescendants(node, 'report')
        .map((report) => report.children[0]?.localName)
        .filter((name): name is string => name !== undefined);
    return [...new Set(names)];
}

/** Every href below the node, for set-valued properties. */
export function parseHrefSet(node: XmlNode): string[] {
    return findDescendants(node, 'href')
        .map((href) => textContent(href).trim())
        .filter((href) => href !== '');
}

/** First href anywhere in a body, undefined when there is none or the body is not XML. */
export function firstHref(body: string): string | undefined {
    if (body.trim() === '') return undefined;
    try {
        const href = findDescendant(parseXml(body), 'href');
        const value = href === undefined ? '' : textContent(href).trim();
        return value === '' ? undefined : value;
    } catch (error) {
        logger.debug('Body is not parseable XML', { error });
        return undefined;
    }
}
