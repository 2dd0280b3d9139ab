import { DavAce, SPECIAL_PRINCIPALS } from '../models/DavAce';
import type { LockScope } from '../models/lock';
import { CUSTOM_NAMESPACE, DAV_NAMESPACE, escapeXml } from '../util/davUtils';

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

export const DEFAULT_PROPFIND_PROPERTIES: readonly string[] = [
    'getcontentlength',
    'getlastmodified',
    'creationdate',
    'displayname',
    'getcontenttype',
    'resourcetype',
    'getetag',
    'lockdiscovery',
];

export const DEFAULT_SYNC_PROPERTIES: readonly string[] = ['getetag', 'getcontentlength', 'getlastmodified'];

export const VERSION_TREE_PROPERTIES: readonly string[] = [
    'version-name',
    'creator-displayname',
    'creation-date',
    'successor-set',
    'predecessor-set',
];

function document(lines: string[]): string {
    return [XML_DECLARATION, ...lines].join('\n');
}

/**
 * Property names are either plain DAV: names ("getetag") or Clark notation
 * ("{http://example.com/ns}color").
 */
function parseName(name: string): { ns?: string; local: string } {
    const match = /^\{([^}]*)\}(.+)$/.exec(name);
    return match ? { ns: match[1], local: match[2] } : { local: name };
}

function davPropElement(name: string): string {
    const { ns, local } = parseName(name);
    if (ns === undefined || ns === DAV_NAMESPACE) return `<D:${local}/>`;
    return `<X:${local} xmlns:X="${escapeXml(ns)}"/>`;
}

function customPropElement(name: string, value?: string): string {
    const { ns, local } = parseName(name);
    const open = ns === undefined ? `S:${local} xmlns:S="${CUSTOM_NAMESPACE}"` : `X:${local} xmlns:X="${escapeXml(ns)}"`;
    const close = ns === undefined ? `S:${local}` : `X:${local}`;
    return value === undefined ? `<${open}/>` : `<${open}>${escapeXml(value)}</${close}>`;
}

export function propfindAllprop(): string {
    return document(['<D:propfind xmlns:D="DAV:">', '  <D:allprop/>', '</D:propfind>']);
}

export function propfindPropname(): string {
    return document(['<D:propfind xmlns:D="DAV:">', '  <D:propname/>', '</D:propfind>']);
}

export function propfindProps(properties: Iterable<string>): string {
    const names = [...new Set(properties)];
    return document([
        '<D:propfind xmlns:D="DAV:">',
        '  <D:prop>',
        ...names.map((name) => `    ${davPropElement(name)}`),
        '  </D:prop>',
        '</D:propfind>',
    ]);
}

/** Allprop plus an `include` list for properties servers leave out of allprop. */
export function propfindAllpropInclude(properties: Iterable<string>): string {
    const names = [...new Set(properties)];
    if (names.length === 0) return propfindAllprop();
    return document([
        '<D:propfind xmlns:D="DAV:">',
        '  <D:allprop/>',
        '  <D:include>',
        ...names.map((name) => `    ${davPropElement(name)}`),
        '  </D:include>',
        '</D:propfind>',
    ]);
}

/**
 * Set entries go into one `set` block, removals into one `remove` block of
 * empty elements. Unknown names in `remove` are the server's concern.
 */
export function proppatch(setProperties: Readonly<Record<string, string>>, removeProperties: Iterable<string> = []): string {
    const setEntries = Object.entries(setProperties);
    const removeNames = [...new Set(removeProperties)];
    const lines = ['<D:propertyupdate xmlns:D="DAV:">'];
    if (setEntries.length > 0) {
        lines.push('  <D:set>', '    <D:prop>');
        for (const [name, value] of setEntries) {
            lines.push(`      ${customPropElement(name, value)}`);
        }
        lines.push('    </D:prop>', '  </D:set>');
    }
    if (removeNames.length > 0) {
        lines.push('  <D:remove>', '    <D:prop>');
        for (const name of removeNames) {
            lines.push(`      ${customPropElement(name)}`);
        }
        lines.push('    </D:prop>', '  </D:remove>');
    }
    lines.push('</D:propertyupdate>');
    return document(lines);
}

export function lockInfo(owner: string, scope: LockScope = 'exclusive'): string {
    return document([
        '<D:lockinfo xmlns:D="DAV:">',
        `  <D:lockscope><D:${scope}/></D:lockscope>`,
        '  <D:locktype><D:write/></D:locktype>',
        `  <D:owner>${escapeXml(owner)}</D:owner>`,
        '</D:lockinfo>',
    ]);
}

function principalXml(principal: string): string[] {
    const special = SPECIAL_PRINCIPALS.find((name) => principal === `DAV:${name}`);
    if (special !== undefined) return [`      <D:${special}/>`];
    if (principal.startsWith('property:')) {
        return ['      <D:property>', `        ${davPropElement(principal.slice('property:'.length))}`, '      </D:property>'];
    }
    return [`      <D:href>${escapeXml(principal)}</D:href>`];
}

function aceXml(ace: DavAce): string[] {
    const block = ace.grant ? 'grant' : 'deny';
    return [
        '  <D:ace>',
        '    <D:principal>',
        ...principalXml(ace.principal),
        '    </D:principal>',
        `    <D:${block}>`,
        ...[...ace.privileges].map((privilege) => `      <D:privilege>${davPropElement(privilege)}</D:privilege>`),
        `    </D:${block}>`,
        '  </D:ace>',
    ];
}

export function acl(aces: readonly DavAce[]): string {
    return document(['<D:acl xmlns:D="DAV:">', ...aces.flatMap(aceXml), '</D:acl>']);
}

export function searchRequest(language: string, query: string, scope = '/'): string {
    if (language.toLowerCase() === 'davbasic') {
        return document([
            '<D:searchrequest xmlns:D="DAV:">',
            '  <D:basicsearch>',
            '    <D:select>',
            '      <D:allprop/>',
            '    </D:select>',
            '    <D:from>',
            '      <D:scope>',
            `        <D:href>${escapeXml(scope)}</D:href>`,
            '        <D:depth>infinity</D:depth>',
            '      </D:scope>',
            '    </D:from>',
            '    <D:where>',
            `      <D:contains>${escapeXml(query)}</D:contains>`,
            '    </D:where>',
            '  </D:basicsearch>',
            '</D:searchrequest>',
        ]);
    }
    return document(['<D:searchrequest xmlns:D="DAV:">', `  <D:sql>${escapeXml(query)}</D:sql>`, '</D:searchrequest>']);
}

export function syncCollection(syncToken: string, syncLevel: string, properties: Iterable<string>, limit?: number): string {
    const names = [...new Set(properties)];
    const lines = [
        '<D:sync-collection xmlns:D="DAV:">',
        `  <D:sync-token>${escapeXml(syncToken)}</D:sync-token>`,
        `  <D:sync-level>${escapeXml(syncLevel)}</D:sync-level>`,
    ];
    if (limit !== undefined) {
        lines.push('  <D:limit>', `    <D:nresults>${limit}</D:nresults>`, '  </D:limit>');
    }
    if (names.length > 0) {
        lines.push('  <D:prop>', ...names.map((name) => `    ${davPropElement(name)}`), '  </D:prop>');
    }
    lines.push('</D:sync-collection>');
    return document(lines);
}

export function versionTree(properties: Iterable<string> = VERSION_TREE_PROPERTIES): string {
    return document([
        '<D:version-tree xmlns:D="DAV:">',
        '  <D:prop>',
        ...[...new Set(properties)].map((name) => `    ${davPropElement(name)}`),
        '  </D:prop>',
        '</D:version-tree>',
    ]);
}

export function bind(segment: string, href: string): string {
    return document([
        '<D:bind xmlns:D="DAV:">',
        `  <D:segment>${escapeXml(segment)}</D:segment>`,
        `  <D:href>${escapeXml(href)}</D:href>`,
        '</D:bind>',
    ]);
}

export function unbind(segment: string): string {
    return document(['<D:unbind xmlns:D="DAV:">', `  <D:segment>${escapeXml(segment)}</D:segment>`, '</D:unbind>']);
}

export function versionControl(version?: string): string {
    if (version === undefined) return document(['<D:version-control xmlns:D="DAV:"/>']);
    return document([
        '<D:version-control xmlns:D="DAV:">',
        `  <D:version><D:href>${escapeXml(version)}</D:href></D:version>`,
        '</D:version-control>',
    ]);
}

export function checkout(activity?: string): string {
    if (activity === undefined) return document(['<D:checkout xmlns:D="DAV:"/>']);
    return document([
        '<D:checkout xmlns:D="DAV:">',
        `  <D:activity-set><D:href>${escapeXml(activity)}</D:href></D:activity-set>`,
        '</D:checkout>',
    ]);
}

export function checkin(keepCheckedOut: boolean): string {
    if (!keepCheckedOut) return document(['<D:checkin xmlns:D="DAV:"/>']);
    return document(['<D:checkin xmlns:D="DAV:">', '  <D:keep-checked-out/>', '</D:checkin>']);
}

export function baselineControl(baseline?: string): string {
    if (baseline === undefined) return document(['<D:baseline-control xmlns:D="DAV:"/>']);
    return document([
        '<D:baseline-control xmlns:D="DAV:">',
        `  <D:baseline><D:href>${escapeXml(baseline)}</D:href></D:baseline>`,
        '</D:baseline-control>',
    ]);
}
