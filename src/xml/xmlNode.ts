import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedResponseError } from '../errorHandler';

/**
 * Element tree used by every response parser. Matching helpers below compare
 * local names only, so `D:href`, `d:href`, `lp1:href` and `href` are the same
 * element to a caller.
 */
export interface XmlNode {
    readonly name: string;
    readonly localName: string;
    readonly prefix?: string;
    readonly namespace?: string;
    readonly attributes: Readonly<Record<string, string>>;
    readonly content: ReadonlyArray<XmlNode | string>;
    readonly children: readonly XmlNode[];
}

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
});

type NamespaceScope = ReadonlyMap<string, string>;

export function localName(qualifiedName: string): string {
    const colon = qualifiedName.indexOf(':');
    return colon < 0 ? qualifiedName : qualifiedName.slice(colon + 1);
}

function prefixOf(qualifiedName: string): string | undefined {
    const colon = qualifiedName.indexOf(':');
    return colon < 0 ? undefined : qualifiedName.slice(0, colon);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(raw: unknown): Record<string, string> {
    const attributes: Record<string, string> = {};
    if (!isRecord(raw)) return attributes;
    for (const [key, value] of Object.entries(raw)) {
        const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key;
        attributes[name] = String(value);
    }
    return attributes;
}

function extendScope(scope: NamespaceScope, attributes: Record<string, string>): NamespaceScope {
    const declarations = Object.entries(attributes).filter(([name]) => name === 'xmlns' || name.startsWith('xmlns:'));
    if (declarations.length === 0) return scope;
    const next = new Map(scope);
    for (const [name, uri] of declarations) {
        next.set(name === 'xmlns' ? '' : name.slice('xmlns:'.length), uri);
    }
    return next;
}

function convert(entries: unknown, scope: NamespaceScope): Array<XmlNode | string> {
    if (!Array.isArray(entries)) return [];
    const result: Array<XmlNode | string> = [];
    for (const entry of entries) {
        if (!isRecord(entry)) continue;
        if (TEXT_KEY in entry) {
            result.push(String(entry[TEXT_KEY]));
            continue;
        }
        const tag = Object.keys(entry).find((key) => key !== ATTRIBUTES_KEY);
        if (tag === undefined || tag.startsWith('?') || tag.startsWith('!')) continue;

        const attributes = readAttributes(entry[ATTRIBUTES_KEY]);
        const elementScope = extendScope(scope, attributes);
        const prefix = prefixOf(tag);
        const content = convert(entry[tag], elementScope);
        result.push({
            name: tag,
            localName: localName(tag),
            prefix,
            namespace: elementScope.get(prefix ?? ''),
            attributes,
            content,
            children: content.filter((item): item is XmlNode => typeof item !== 'string'),
        });
    }
    return result;
}

/**
 * Parses a document and returns its root element.
 * @throws MalformedResponseError when the text is empty or not well-formed.
 */
export function parseXml(text: string): XmlNode {
    if (text.trim() === '') {
        throw new MalformedResponseError('Empty XML body');
    }
    const validation = XMLValidator.validate(text);
    if (validation !== true) {
        throw new MalformedResponseError(`Invalid XML: ${validation.err.msg} (line ${validation.err.line})`);
    }
    const root = convert(parser.parse(text), new Map()).find((item): item is XmlNode => typeof item !== 'string');
    if (root === undefined) {
        throw new MalformedResponseError('XML body has no root element');
    }
    return root;
}

export function findChildren(node: XmlNode, name: string): XmlNode[] {
    return node.children.filter((child) => child.localName === name);
}

export function findChild(node: XmlNode, name: string): XmlNode | undefined {
    return node.children.find((child) => child.localName === name);
}

/** Depth-first, document order, excluding the node itself. */
export function findDescendants(node: XmlNode, name: string): XmlNode[] {
    const found: XmlNode[] = [];
    const walk = (current: XmlNode) => {
        for (const child of current.children) {
            if (child.localName === name) found.push(child);
            walk(child);
        }
    };
    walk(node);
    return found;
}

export function findDescendant(node: XmlNode, name: string): XmlNode | undefined {
    for (const child of node.children) {
        if (child.localName === name) return child;
        const nested = findDescendant(child, name);
        if (nested !== undefined) return nested;
    }
    return undefined;
}

export function hasDescendant(node: XmlNode, name: string): boolean {
    return findDescendant(node, name) !== undefined;
}

/** Concatenated text of the node and all descendants. */
export function textContent(node: XmlNode): string {
    return node.content.map((item) => (typeof item === 'string' ? item : textContent(item))).join('');
}

export function childText(node: XmlNode, name: string): string | undefined {
    const child = findChild(node, name);
    return child === undefined ? undefined : textContent(child).trim();
}

/** Trimmed text of every `href` directly under the node. */
export function hrefsOf(node: XmlNode): string[] {
    return findChildren(node, 'href')
        .map((href) => textContent(href).trim())
        .filter((href) => href !== '');
}
