import { basicAuth } from '../util/davUtils';

export type ChallengeHeaders = Readonly<Record<string, string>>;

/**
 * A pluggable authentication scheme. Implementations answer 401 challenges
 * and may optionally supply a value to send before any challenge is seen.
 */
export interface AuthHandler {
    readonly scheme: string;
    /** Sent as `X-Workstation` on every request while the handler is active. */
    readonly workstation?: string;
    canHandle(schemeToken: string): boolean;
    preemptiveValue?(url: string): string | undefined;
    /** Resolves to the next Authorization value, or undefined when it has no better answer. */
    handleChallenge(url: string, challengeHeaders: ChallengeHeaders): Promise<string | undefined>;
}

export interface BasicCredentials {
    username: string;
    password: string;
    domain?: string;
    workstation?: string;
}

/** `domain\username` when a domain is set. */
export function qualifiedUsername(credentials: BasicCredentials): string {
    return credentials.domain ? `${credentials.domain}\\${credentials.username}` : credentials.username;
}

export function basicAuthorization(credentials: BasicCredentials): string {
    return basicAuth(qualifiedUsername(credentials), credentials.password);
}

export class BasicAuthHandler implements AuthHandler {
    readonly scheme = 'Basic';
    private readonly credentials: BasicCredentials;

    constructor(username: string, password: string, domain?: string) {
        this.credentials = { username, password, domain };
    }

    static withDomain(username: string, password: string, domain: string): BasicAuthHandler {
        return new BasicAuthHandler(username, password, domain);
    }

    canHandle(schemeToken: string): boolean {
        return schemeToken.toLowerCase() === 'basic';
    }

    preemptiveValue(): string {
        return basicAuthorization(this.credentials);
    }

    async handleChallenge(): Promise<string | undefined> {
        return basicAuthorization(this.credentials);
    }
}

/** Basic as `domain\username`, naming the client workstation as well. */
export class DomainBasicAuthHandler extends BasicAuthHandler {
    constructor(
        username: string,
        password: string,
        domain: string,
        readonly workstation?: string
    ) {
        super(username, password, domain);
    }
}

/**
 * Scheme tokens announced in WWW-Authenticate, e.g.
 * `Basic realm="x", NTLM` → ["Basic", "NTLM"].
 */
export function parseChallengeSchemes(header: string | undefined): string[] {
    if (header === undefined || header.trim() === '') return [];
    const schemes: string[] = [];
    for (const part of header.split(',')) {
        const match = /^\s*([A-Za-z][A-Za-z0-9!#$%&'*+.^_`|~-]*)(\s+|$)/.exec(part);
        if (match) schemes.push(match[1]);
    }
    return schemes;
}
