import { DavResource } from '../models/DavResource';
import { depthToString, XML_CONTENT_TYPE } from '../util/davUtils';
import logger from '../util/logger';
import { toResources } from '../xml/multistatusParser';
import { firstHref } from '../xml/propertyParsers';
import { baselineControl, checkin, checkout, versionControl, versionTree, VERSION_TREE_PROPERTIES } from '../xml/requestBodies';
import { RequestDispatcher, SuccessOutcome } from './RequestDispatcher';

/** Versioning verbs: VERSION-CONTROL, CHECKOUT, CHECKIN, baselines and the version tree. */
export class VersioningService {
    constructor(private readonly dispatcher: RequestDispatcher) {}

    async versionsList(url: string, depth = 1, properties: readonly string[] = VERSION_TREE_PROPERTIES): Promise<DavResource[]> {
        const multistatus = await this.dispatcher.sendMultistatus({
            method: 'REPORT',
            url,
            headers: { 'Content-Type': XML_CONTENT_TYPE, Depth: depthToString(depth) },
            body: versionTree(properties),
        });
        return toResources(multistatus);
    }

    async getVersionHistory(url: string): Promise<string[]> {
        const versions = await this.versionsList(url, 0);
        return versions.map((version) => version.href);
    }

    async versionControl(url: string, version?: string): Promise<void> {
        await this.dispatcher.send({
            method: 'VERSION-CONTROL',
            url,
            headers: { 'Content-Type': XML_CONTENT_TYPE },
            body: versionControl(version),
        });
        logger.info(`Placed under version control: ${url}`);
    }

    /** Returns the working resource URL. */
    async checkout(url: string, activity?: string): Promise<string> {
        const outcome = await this.dispatcher.send({
            method: 'CHECKOUT',
            url,
            headers: { 'Content-Type': XML_CONTENT_TYPE },
            body: checkout(activity),
        });
        return this.locationOf(outcome, url);
    }

    /** Returns the URL of the version that was created. */
    async checkin(url: string, keepCheckedOut = false): Promise<string> {
        const outcome = await this.dispatcher.send({
            method: 'CHECKIN',
            url,
            headers: { 'Content-Type': XML_CONTENT_TYPE },
            body: checkin(keepCheckedOut),
        });
        return this.locationOf(outcome, url);
    }

    async uncheckout(url: string): Promise<void> {
        await this.dispatcher.send({ method: 'UNCHECKOUT', url });
    }

    async baselineControl(url: string, baseline?: string): Promise<void> {
        await this.dispatcher.send({
            method: 'BASELINE-CONTROL',
            url,
            headers: { 'Content-Type': XML_CONTENT_TYPE },
            body: baselineControl(baseline),
        });
    }

    async makeBaseline(url: string): Promise<string> {
        const outcome = await this.dispatcher.send({ method: 'MKBASELINE', url });
        return this.locationOf(outcome, url);
    }

    /** Location header, else the first href of the body, else the request URL. */
    private locationOf(outcome: SuccessOutcome, url: string): string {
        return outcome.headers.get('location') ?? firstHref(outcome.body.toString('utf8')) ?? this.dispatcher.resolveUrl(url);
    }
}
