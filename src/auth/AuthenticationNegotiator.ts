import logger from '../util/logger';
import { AuthHandler, BasicAuthHandler, BasicCredentials, basicAuthorization, ChallengeHeaders, parseChallengeSchemes } from './AuthHandler';

type AuthMode =
    | { kind: 'none' }
    | { kind: 'credentials'; credentials: BasicCredentials; handler: AuthHandler }
    | { kind: 'handler'; handler: AuthHandler };

interface PreemptiveScope {
    hostname: string;
    ports?: readonly number[];
}

export interface AuthState {
    mode: AuthMode['kind'];
    preemptive: boolean;
    preemptiveScope?: PreemptiveScope;
    workstation?: string;
}

export const WORKSTATION_HEADER = 'X-Workstation';

/**
 * Holds the active credential mode and produces Authorization headers.
 * Mutating it while requests are in flight is the caller's responsibility to
 * serialize.
 */
export class AuthenticationNegotiator {
    private mode: AuthMode = { kind: 'none' };
    private preemptive = false;
    private preemptiveScope?: PreemptiveScope;

    setCredentials(username: string, password: string, preemptive = false): void {
        this.setCredentialsWithDomain(username, password, undefined, undefined, preemptive);
    }

    setCredentialsWithDomain(username: string, password: string, domain?: string, workstation?: string, preemptive = false): void {
        const credentials: BasicCredentials = {
            username,
            password,
            domain: domain || undefined,
            workstation: workstation || undefined,
        };
        this.mode = {
            kind: 'credentials',
            credentials,
            handler: new BasicAuthHandler(username, password, credentials.domain),
        };
        this.setPreemptive(preemptive);
    }

    setAuthenticationHandler(handler: AuthHandler, preemptive = false): void {
        this.mode = { kind: 'handler', handler };
        this.setPreemptive(preemptive);
    }

    clearAuthentication(): void {
        this.mode = { kind: 'none' };
        this.setPreemptive(false);
    }

    /** Restricts preemptive credentials to one host, optionally to some ports. */
    enablePreemptiveAuthentication(hostname: string, ports?: readonly number[]): void {
        this.preemptive = true;
        this.preemptiveScope = { hostname: hostname.toLowerCase(), ports: ports && ports.length > 0 ? [...ports] : undefined };
    }

    disablePreemptiveAuthentication(): void {
        this.setPreemptive(false);
    }

    get state(): AuthState {
        return {
            mode: this.mode.kind,
            preemptive: this.preemptive,
            preemptiveScope: this.preemptiveScope,
            workstation: this.workstation(),
        };
    }

    headersForRequest(url: string): Record<string, string> {
        const headers: Record<string, string> = {};
        if (this.mode.kind === 'none') return headers;

        const workstation = this.workstation();
        if (workstation) {
            headers[WORKSTATION_HEADER] = workstation;
        }
        if (!this.preemptive || !this.inScope(url)) return headers;

        const authorization = this.preemptiveAuthorization(url);
        if (authorization !== undefined) {
            headers.Authorization = authorization;
        }
        return headers;
    }

    /**
     * Answer to a 401: the handler's value when it accepts one of the offered
     * schemes, otherwise Basic from stored credentials, otherwise undefined.
     */
    async respondToChallenge(url: string, challengeHeaders: ChallengeHeaders): Promise<string | undefined> {
        const mode = this.mode;
        if (mode.kind === 'none') return undefined;

        const schemes = parseChallengeSchemes(challengeHeaders['www-authenticate']);
        const handler = mode.handler;
        if (schemes.length === 0 || schemes.some((scheme) => handler.canHandle(scheme))) {
            try {
                const value = await handler.handleChallenge(url, challengeHeaders);
                if (value !== undefined) return value;
            } catch (error) {
                logger.warn(`${handler.scheme} handler failed to answer challenge for ${url}`, { error });
            }
        }

        if (mode.kind === 'credentials') {
            return basicAuthorization(mode.credentials);
        }
        return undefined;
    }

    private preemptiveAuthorization(url: string): string | undefined {
        if (this.mode.kind === 'credentials') {
            return basicAuthorization(this.mode.credentials);
        }
        if (this.mode.kind === 'handler') {
            try {
                return this.mode.handler.preemptiveValue?.(url);
            } catch (error) {
                logger.warn(`${this.mode.handler.scheme} handler failed to produce a preemptive value`, { error });
            }
        }
        return undefined;
    }

    private workstation(): string | undefined {
        if (this.mode.kind === 'credentials') return this.mode.credentials.workstation;
        if (this.mode.kind === 'handler') return this.mode.handler.workstation;
        return undefined;
    }

    private setPreemptive(preemptive: boolean): void {
        this.preemptive = preemptive;
        this.preemptiveScope = undefined;
    }

    private inScope(url: string): boolean {
        const scope = this.preemptiveScope;
        if (scope === undefined) return true;
        let parsed: URL;
        try {
            parsed = new URL(url);
        } catch {
            return false;
        }
        if (parsed.hostname.toLowerCase() !== scope.hostname) return false;
        if (scope.ports === undefined) return true;
        const port = parsed.port !== '' ? Number(parsed.port) : parsed.protocol === 'https:' ? 443 : 80;
        return scope.ports.includes(port);
    }
}
