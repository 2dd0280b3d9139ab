import { MalformedResponseError } from '../errorHandler';
import { DavResource } from '../models/DavResource';
import type { DavProperty, DavResponse, DavStatus, Multistatus, Propstat, SyncResult } from '../models/multistatus';
import { isSuccessStatus, parseDate, parseStatusCode } from '../util/davUtils';
import { childText, findChild, findChildren, hasDescendant, hrefsOf, parseXml, textContent, XmlNode } from './xmlNode';

export const COLLECTION_MARKER = 'collection';

function toStatus(line: string): DavStatus {
    return { line, code: parseStatusCode(line) };
}

function conditionsOf(node: XmlNode | undefined): string[] {
    if (node === undefined) return [];
    return node.children.map((child) => child.localName);
}

/** Trimmed inner text, except a collection resourcetype which yields the marker. */
export function propertyValue(property: XmlNode): string {
    if (property.localName === 'resourcetype') {
        return hasDescendant(property, COLLECTION_MARKER) ? COLLECTION_MARKER : textContent(property).trim();
    }
    return textContent(property).trim();
}

function parseProperty(node: XmlNode): DavProperty {
    return {
        name: node.localName,
        namespace: node.namespace,
        value: propertyValue(node),
        node,
    };
}

function parsePropstat(node: XmlNode, href: string): Propstat {
    const status = childText(node, 'status');
    if (status === undefined) {
        throw new MalformedResponseError(`propstat for ${href} has no status`);
    }
    const prop = findChild(node, 'prop');
    return {
        status: toStatus(status),
        properties: prop === undefined ? [] : prop.children.map(parseProperty),
        error: conditionsOf(findChild(node, 'error')),
        description: childText(node, 'responsedescription'),
    };
}

function parseResponse(node: XmlNode): DavResponse {
    const hrefs = hrefsOf(node);
    if (hrefs.length === 0) {
        throw new MalformedResponseError('multistatus response has no href');
    }
    const status = childText(node, 'status');
    const location = findChild(node, 'location');
    return {
        href: hrefs[0],
        hrefs,
        status: status === undefined ? undefined : toStatus(status),
        propstats: findChildren(node, 'propstat').map((propstat) => parsePropstat(propstat, hrefs[0])),
        error: conditionsOf(findChild(node, 'error')),
        description: childText(node, 'responsedescription'),
        location: location === undefined ? undefined : hrefsOf(location)[0],
    };
}

/**
 * Decodes a 207 body. Elements are matched by local name so any prefix, or
 * none, is accepted.
 * @throws MalformedResponseError when the root is not `multistatus` or a
 * response lacks an href.
 */
export function parseMultistatus(body: string): Multistatus {
    const root = parseXml(body);
    if (root.localName !== 'multistatus') {
        throw new MalformedResponseError(`Expected multistatus root, found ${root.name}`);
    }
    return {
        responses: findChildren(root, 'response').map(parseResponse),
        syncToken: childText(root, 'sync-token'),
        description: childText(root, 'responsedescription'),
    };
}

/** Properties from every 2xx propstat of a response, keyed by local name. */
export function successfulProperties(response: DavResponse): Map<string, DavProperty> {
    const properties = new Map<string, DavProperty>();
    for (const propstat of response.propstats) {
        if (!isSuccessStatus(propstat.status.code)) continue;
        for (const property of propstat.properties) {
            properties.set(property.name, property);
        }
    }
    return properties;
}

function resourceTypeTokens(property: DavProperty | undefined): string[] {
    if (property === undefined) return [];
    return property.node.children.map((child) => child.localName);
}

function parseLength(value: string | undefined): number | undefined {
    if (value === undefined || value === '') return undefined;
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
}

export function toResource(response: DavResponse): DavResource {
    const properties = successfulProperties(response);
    const text = (name: string) => {
        const value = properties.get(name)?.value;
        return value === '' ? undefined : value;
    };
    const customProperties: Record<string, string> = {};
    for (const [name, property] of properties) {
        customProperties[name] = property.value;
    }
    const tokens = resourceTypeTokens(properties.get('resourcetype'));
    if (text('resourcetype') === COLLECTION_MARKER && !tokens.includes(COLLECTION_MARKER)) {
        tokens.push(COLLECTION_MARKER);
    }

    return new DavResource({
        href: response.href,
        status: response.status?.code ?? 200,
        contentType: text('getcontenttype'),
        contentLength: parseLength(text('getcontentlength')),
        contentLanguage: text('getcontentlanguage'),
        etag: text('getetag'),
        displayName: text('displayname'),
        resourceTypes: tokens,
        lastModified: parseDate(text('getlastmodified')),
        creationDate: parseDate(text('creationdate')),
        customProperties,
    });
}

export function toResources(multistatus: Multistatus): DavResource[] {
    return multistatus.responses.map(toResource);
}

export function parseMultistatusResources(body: string): DavResource[] {
    return toResources(parseMultistatus(body));
}

/**
 * Splits a sync-collection answer into changed resources and hrefs the
 * server reports as gone (a bare 404 status).
 */
export function toSyncResult(multistatus: Multistatus): SyncResult {
    const resources: DavResource[] = [];
    const removed: string[] = [];
    for (const response of multistatus.responses) {
        if (response.status?.code === 404 && response.propstats.length === 0) {
            removed.push(response.href);
        } else {
            resources.push(toResource(response));
        }
    }
    return { resources, removed, syncToken: multistatus.syncToken };
}
