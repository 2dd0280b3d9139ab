import type { DavProperty, DavResponse } from '../models/multistatus';
import { XML_CONTENT_TYPE, depthToString } from '../util/davUtils';
import { successfulProperties } from '../xml/multistatusParser';
import { propfindProps } from '../xml/requestBodies';
import { RequestDispatcher } from './RequestDispatcher';

export interface PropertyQueryResult {
    href: string;
    response: DavResponse;
    properties: Map<string, DavProperty>;
}

/** PROPFIND for a few named properties, returning the 2xx values per response. */
export async function queryProperties(
    dispatcher: RequestDispatcher,
    url: string,
    names: readonly string[],
    depth = 0
): Promise<PropertyQueryResult[]> {
    const multistatus = await dispatcher.sendMultistatus({
        method: 'PROPFIND',
        url,
        headers: { 'Content-Type': XML_CONTENT_TYPE, Depth: depthToString(depth) },
        body: propfindProps(names),
    });
    return multistatus.responses.map((response) => ({
        href: response.href,
        response,
        properties: successfulProperties(response),
    }));
}

/** Properties of the resource itself, from a depth-0 query. */
export async function queryOwnProperties(
    dispatcher: RequestDispatcher,
    url: string,
    names: readonly string[]
): Promise<Map<string, DavProperty>> {
    const [first] = await queryProperties(dispatcher, url, names, 0);
    return first?.properties ?? new Map<string, DavProperty>();
}
