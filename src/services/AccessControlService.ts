import { DavAce, DavAcl } from '../models/DavAce';
import { DavPrincipal, PrincipalType } from '../models/DavPrincipal';
import { DavQuota } from '../models/DavQuota';
import { XML_CONTENT_TYPE } from '../util/davUtils';
import logger from '../util/logger';
import { toResource } from '../xml/multistatusParser';
import { parseAclProperty, parseHrefSet, parsePrivilegeSet, parseSupportedReportSet } from '../xml/propertyParsers';
import { acl } from '../xml/requestBodies';
import { queryOwnProperties, queryProperties } from './propertyQuery';
import { RequestDispatcher } from './RequestDispatcher';

const PRINCIPAL_PROPERTIES = ['displayname', 'resourcetype', 'principal-URL'];

function parseBytes(value: string | undefined): number | undefined {
    if (value === undefined || value === '') return undefined;
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
}

/** ACL, principal, privilege, report-set and quota queries. */
export class AccessControlService {
    constructor(private readonly dispatcher: RequestDispatcher) {}

    async getAcl(url: string): Promise<DavAcl> {
        const [first] = await queryProperties(this.dispatcher, url, ['acl', 'owner']);
        if (first === undefined) {
            return new DavAcl([], this.dispatcher.resolveUrl(url));
        }
        const aclProperty = first.properties.get('acl');
        const owner = first.properties.get('owner');
        return new DavAcl(
            aclProperty === undefined ? [] : parseAclProperty(aclProperty.node),
            first.href,
            owner === undefined ? undefined : parseHrefSet(owner.node)[0]
        );
    }

    /** Sends only the entries a client may change; inherited and protected ones are dropped. */
    async setAcl(url: string, aces: readonly DavAce[]): Promise<void> {
        const editable = aces.filter((ace) => !ace.inherited && !ace.isProtected);
        await this.dispatcher.send({
            method: 'ACL',
            url,
            headers: { 'Content-Type': XML_CONTENT_TYPE },
            body: acl(editable),
        });
        logger.info(`ACL updated for ${url} with ${editable.length} entries`);
    }

    /** Members of a collection whose resourcetype includes `principal`. */
    async getPrincipals(url: string): Promise<DavPrincipal[]> {
        const results = await queryProperties(this.dispatcher, url, PRINCIPAL_PROPERTIES, 1);
        return results
            .map((result) => ({ result, resource: toResource(result.response) }))
            .filter(({ resource }) => resource.resourceTypes.includes('principal'))
            .map(({ result, resource }) => {
                const principalUrl = result.properties.get('principal-URL');
                const type: PrincipalType = resource.resourceTypes.includes('group') ? 'group' : 'user';
                return new DavPrincipal({
                    url: resource.href,
                    displayName: resource.displayName,
                    type,
                    principalUrl: principalUrl === undefined ? undefined : parseHrefSet(principalUrl.node)[0],
                    properties: { ...resource.customProperties },
                });
            });
    }

    async getPrincipalCollectionSet(url: string): Promise<string[]> {
        const property = (await queryOwnProperties(this.dispatcher, url, ['principal-collection-set'])).get('principal-collection-set');
        return property === undefined ? [] : parseHrefSet(property.node);
    }

    async getCurrentUserPrivileges(url: string): Promise<string[]> {
        const property = (await queryOwnProperties(this.dispatcher, url, ['current-user-privilege-set'])).get('current-user-privilege-set');
        return property === undefined ? [] : parsePrivilegeSet(property.node);
    }

    /** True when the privilege, or the aggregate `all`, is held. */
    async hasPrivilege(url: string, privilege: string): Promise<boolean> {
        const privileges = await this.getCurrentUserPrivileges(url);
        return privileges.includes(privilege) || privileges.includes('all');
    }

    async validatePrivileges(url: string, required: readonly string[]): Promise<Record<string, boolean>> {
        const privileges = new Set(await this.getCurrentUserPrivileges(url));
        const result: Record<string, boolean> = {};
        for (const privilege of required) {
            result[privilege] = privileges.has(privilege) || privileges.has('all');
        }
        return result;
    }

    async getSupportedReports(url: string): Promise<string[]> {
        const property = (await queryOwnProperties(this.dispatcher, url, ['supported-report-set'])).get('supported-report-set');
        return property === undefined ? [] : parseSupportedReportSet(property.node);
    }

    async getQuota(url: string): Promise<DavQuota> {
        const properties = await queryOwnProperties(this.dispatcher, url, ['quota-available-bytes', 'quota-used-bytes']);
        return new DavQuota({
            resourceUrl: this.dispatcher.resolveUrl(url),
            availableBytes: parseBytes(properties.get('quota-available-bytes')?.value),
            usedBytes: parseBytes(properties.get('quota-used-bytes')?.value),
        });
    }
}
