import { getFileName, isAbsoluteUrl } from '../util/davUtils';

export type PrincipalType = 'user' | 'group' | 'special' | 'property';

export interface DavPrincipalJSON {
    url: string;
    displayName?: string;
    type: PrincipalType;
    principalUrl?: string;
    properties: Record<string, string>;
}

export class DavPrincipal {
    readonly url: string;
    readonly displayName?: string;
    readonly type: PrincipalType;
    readonly principalUrl?: string;
    readonly properties: Readonly<Record<string, string>>;

    constructor(init: { url: string; displayName?: string; type?: PrincipalType; principalUrl?: string; properties?: Record<string, string> }) {
        this.url = init.url;
        this.displayName = init.displayName;
        this.type = init.type ?? 'user';
        this.principalUrl = init.principalUrl;
        this.properties = { ...init.properties };
    }

    get name(): string {
        const path = isAbsoluteUrl(this.url) ? new URL(this.url).pathname : this.url;
        return getFileName(path);
    }

    get isGroup(): boolean {
        return this.type === 'group';
    }

    toJSON(): DavPrincipalJSON {
        return {
            url: this.url,
            displayName: this.displayName,
            type: this.type,
            principalUrl: this.principalUrl,
            properties: { ...this.properties },
        };
    }

    static fromJSON(json: DavPrincipalJSON): DavPrincipal {
        return new DavPrincipal(json);
    }
}
