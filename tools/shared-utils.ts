import type { RemoteServerConfig } from './remote-client.js';

export const DEFAULT_SERVER_NAME = 'graphql-mcp';
export const SERVER_VERSION = '0.1.0';

export const QUERY_EXECUTION_TIMEOUT = {
    DEFAULT: 30000, // 30 seconds
};

type Env = Record<string, string | undefined>;

export interface ServerSettings {
    name: string;
    allowMutations: boolean;
    remote: RemoteServerConfig | null;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = raw.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(value)) return true;
    if (['false', '0', 'no'].includes(value)) return false;
    console.warn(`Ignoring ${key}=${raw}: expected true or false`);
    return fallback;
}

function readPositiveInteger(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = parseInt(raw, 10);
    if (isNaN(value) || value <= 0) {
        console.warn(`Ignoring ${key}=${raw}: expected a positive integer`);
        return fallback;
    }
    return value;
}

// Helper function to sanitize URLs for logging
export function sanitizeUrlForLogging(url: string): string {
    try {
        const urlObj = new URL(url);
        if (urlObj.username || urlObj.password) {
            return url.replace(/\/\/[^@]*@/, '//***:***@');
        }
        return url;
    } catch {
        return url;
    }
}

/**
 * Endpoint and extra headers from GRAPHQL_ENDPOINT and GRAPHQL_HEADERS.
 * Malformed headers are reported and ignored.
 */
export function resolveEndpointAndHeaders(env: Env = process.env): { url: string | null; headers: Record<string, string> } {
    const endpoint = env.GRAPHQL_ENDPOINT?.trim();
    const headers: Record<string, string> = {};

    if (env.GRAPHQL_HEADERS) {
        try {
            const parsed: unknown = JSON.parse(env.GRAPHQL_HEADERS);
            if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
                throw new Error('Headers must be a valid object');
            }

            const validated: Record<string, string> = {};
            for (const [key, value] of Object.entries(parsed)) {
                if (typeof value !== 'string') {
                    throw new Error(`Invalid header: ${key} must be string`);
                }
                validated[key] = value;
            }
            Object.assign(headers, validated);
        } catch (error) {
            console.warn(`Failed to parse GRAPHQL_HEADERS: ${error instanceof Error ? error.message : 'Invalid JSON'}`);
        }
    }

    return { url: endpoint ? endpoint : null, headers };
}

export function resolveServerSettings(env: Env = process.env): ServerSettings {
    const { url, headers } = resolveEndpointAndHeaders(env);
    const bearerToken = env.GRAPHQL_BEARER_TOKEN?.trim();

    return {
        name: env.MCP_SERVER_NAME?.trim() || DEFAULT_SERVER_NAME,
        allowMutations: readBoolean(env, 'GRAPHQL_ALLOW_MUTATIONS', true),
        remote: url
            ? {
                url,
                headers,
                bearerToken: bearerToken ? bearerToken : undefined,
                timeoutMs: readPositiveInteger(env, 'GRAPHQL_TIMEOUT_MS', QUERY_EXECUTION_TIMEOUT.DEFAULT),
                verifySsl: readBoolean(env, 'GRAPHQL_VERIFY_SSL', true),
                forwardBearerToken: readBoolean(env, 'GRAPHQL_FORWARD_BEARER_TOKEN', false),
            }
            : null,
    };
}

/**
 * Execute with timeout. The operation receives a signal that is aborted when time runs out.
 */
export async function executeWithTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    timeoutMessage: string = 'Operation timed out'
): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new Error(`${timeoutMessage} (${timeoutMs}ms)`));
        }, timeoutMs);
    });

    try {
        return await Promise.race([operation(controller.signal), timeoutPromise]);
    } finally {
        clearTimeout(timer);
    }
}
