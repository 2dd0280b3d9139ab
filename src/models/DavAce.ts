/** Pseudo-principals written as `DAV:all`, `DAV:authenticated` and so on. */
export const SPECIAL_PRINCIPALS = ['all', 'authenticated', 'unauthenticated', 'self'] as const;

export interface DavAceInit {
    principal: string;
    grant?: boolean;
    privileges: Iterable<string>;
    inherited?: boolean;
    isProtected?: boolean;
    inheritedFrom?: string;
}

export interface DavAceJSON {
    principal: string;
    grant: boolean;
    privileges: string[];
    inherited: boolean;
    isProtected: boolean;
    inheritedFrom?: string;
}

export class DavAce {
    /** Principal href, `DAV:<special>` or `property:<name>`. */
    readonly principal: string;
    readonly grant: boolean;
    readonly privileges: ReadonlySet<string>;
    readonly inherited: boolean;
    readonly isProtected: boolean;
    readonly inheritedFrom?: string;

    constructor(init: DavAceInit) {
        this.principal = init.principal;
        this.grant = init.grant ?? true;
        this.privileges = new Set(init.privileges);
        this.inherited = init.inherited ?? false;
        this.isProtected = init.isProtected ?? false;
        this.inheritedFrom = init.inheritedFrom;
    }

    get isDeny(): boolean {
        return !this.grant;
    }

    hasPrivilege(privilege: string): boolean {
        return this.privileges.has(privilege) || this.privileges.has('all');
    }

    equals(other: DavAce): boolean {
        return (
            this.principal === other.principal &&
            this.grant === other.grant &&
            this.inherited === other.inherited &&
            this.isProtected === other.isProtected &&
            this.privileges.size === other.privileges.size &&
            [...this.privileges].every((privilege) => other.privileges.has(privilege))
        );
    }

    toJSON(): DavAceJSON {
        return {
            principal: this.principal,
            grant: this.grant,
            privileges: [...this.privileges],
            inherited: this.inherited,
            isProtected: this.isProtected,
            inheritedFrom: this.inheritedFrom,
        };
    }

    static fromJSON(json: DavAceJSON): DavAce {
        return new DavAce(json);
    }
}

export interface DavAclJSON {
    resourceUrl?: string;
    owner?: string;
    aces: DavAceJSON[];
}

export class DavAcl {
    readonly aces: readonly DavAce[];
    readonly resourceUrl?: string;
    readonly owner?: string;

    constructor(aces: readonly DavAce[], resourceUrl?: string, owner?: string) {
        this.aces = [...aces];
        this.resourceUrl = resourceUrl;
        this.owner = owner;
    }

    acesFor(principal: string): DavAce[] {
        return this.aces.filter((ace) => ace.principal === principal);
    }

    /** Deny entries win over grant entries for the same principal. */
    hasPrivilege(principal: string, privilege: string): boolean {
        const relevant = this.acesFor(principal).filter((ace) => ace.hasPrivilege(privilege));
        if (relevant.some((ace) => ace.isDeny)) return false;
        return relevant.some((ace) => ace.grant);
    }

    get principals(): Set<string> {
        return new Set(this.aces.map((ace) => ace.principal));
    }

    /** Entries a client may send back in an ACL request. */
    get editableAces(): DavAce[] {
        return this.aces.filter((ace) => !ace.inherited && !ace.isProtected);
    }

    get isEmpty(): boolean {
        return this.aces.length === 0;
    }

    toJSON(): DavAclJSON {
        return {
            resourceUrl: this.resourceUrl,
            owner: this.owner,
            aces: this.aces.map((ace) => ace.toJSON()),
        };
    }

    static fromJSON(json: DavAclJSON): DavAcl {
        return new DavAcl(json.aces.map((ace) => DavAce.fromJSON(ace)), json.resourceUrl, json.owner);
    }
}
