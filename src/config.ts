import dotenv from 'dotenv';

export const CLIENT_VERSION = '0.1.0';

export interface ClientConfig {
    readonly baseUrl?: string;
    readonly userAgent: string;
    readonly defaultHeaders: Readonly<Record<string, string>>;
    readonly timeoutMs: number;
    readonly compression: boolean;
    readonly ignoreCookies: boolean;
}

export type ClientConfigOverrides = Partial<Omit<ClientConfig, 'defaultHeaders'>> & {
    defaultHeaders?: Record<string, string>;
};

const DEFAULT_USER_AGENT = `davkit/${CLIENT_VERSION}`;
const DEFAULT_TIMEOUT_MS = 30000;

export function createConfig(overrides: ClientConfigOverrides = {}): ClientConfig {
    const userAgent = overrides.userAgent ?? DEFAULT_USER_AGENT;
    return Object.freeze({
        baseUrl: overrides.baseUrl,
        userAgent,
        defaultHeaders: Object.freeze({
            'User-Agent': userAgent,
            Accept: '*/*',
            ...overrides.defaultHeaders,
        }),
        timeoutMs: overrides.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        compression: overrides.compression ?? false,
        ignoreCookies: overrides.ignoreCookies ?? false,
    });
}

function parseBoolean(value: string | undefined): boolean | undefined {
    if (value === undefined || value === '') return undefined;
    return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function parsePositiveInt(value: string | undefined): number | undefined {
    if (value === undefined || value === '') return undefined;
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Builds a config from `DAVKIT_*` environment variables, loading `.env`
 * first. Explicit overrides win over the environment.
 */
export function loadConfigFromEnv(overrides: ClientConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): ClientConfig {
    if (env === process.env) {
        dotenv.config();
    }
    return createConfig({
        baseUrl: env.DAVKIT_BASE_URL || undefined,
        userAgent: env.DAVKIT_USER_AGENT || undefined,
        timeoutMs: parsePositiveInt(env.DAVKIT_TIMEOUT_MS),
        compression: parseBoolean(env.DAVKIT_COMPRESSION),
        ...withoutUndefined(overrides),
    });
}

type MutableOverrides = { -readonly [K in keyof ClientConfigOverrides]?: ClientConfigOverrides[K] };

function withoutUndefined(overrides: ClientConfigOverrides): ClientConfigOverrides {
    const result: MutableOverrides = {};
    if (overrides.baseUrl !== undefined) result.baseUrl = overrides.baseUrl;
    if (overrides.userAgent !== undefined) result.userAgent = overrides.userAgent;
    if (overrides.timeoutMs !== undefined) result.timeoutMs = overrides.timeoutMs;
    if (overrides.compression !== undefined) result.compression = overrides.compression;
    if (overrides.ignoreCookies !== undefined) result.ignoreCookies = overrides.ignoreCookies;
    if (overrides.defaultHeaders !== undefined) result.defaultHeaders = overrides.defaultHeaders;
    return result;
}
