import { GraphQLSchema, IntrospectionQuery, buildClientSchema, getIntrospectionQuery } from 'graphql';
import { Agent, fetch as undiciFetch } from 'undici';
import { z } from 'zod';
import { RemoteExecutionError, RemoteIntrospectionError, toErrorMessage } from './errors.js';
import { QUERY_EXECUTION_TIMEOUT, executeWithTimeout, sanitizeUrlForLogging } from './shared-utils.js';

export interface RemoteServerConfig {
    url: string;
    headers?: Record<string, string>;
    /** Sent as `Authorization: Bearer <token>`. */
    bearerToken?: string;
    timeoutMs?: number;
    /** Defaults to true. */
    verifySsl?: boolean;
    /** Use the calling agent's bearer token, when it presented one, instead of `bearerToken`. */
    forwardBearerToken?: boolean;
    /** Called once after an authentication failure; must be safe to call concurrently. */
    tokenRefresh?: () => string | Promise<string>;
}

interface HttpRequest {
    method: 'POST';
    headers: Record<string, string>;
    body: string;
    signal: AbortSignal;
}

interface HttpResponse {
    ok: boolean;
    status: number;
    statusText: string;
    text(): Promise<string>;
}

type HttpFetch = (url: string, init: HttpRequest) => Promise<HttpResponse>;

interface RawResponse {
    ok: boolean;
    status: number;
    statusText: string;
    body: string;
}

const GraphQLResponseSchema = z.object({
    data: z.record(z.unknown()).nullable().optional(),
    errors: z.array(z.object({ message: z.string() }).passthrough()).optional(),
});

type GraphQLResponse = z.infer<typeof GraphQLResponseSchema>;

const AUTH_ERROR_PATTERN = /unauthori[sz]ed|unauthenticated|authentication|forbidden/i;

function isIntrospectionQuery(data: unknown): data is IntrospectionQuery {
    return typeof data === 'object' && data !== null && '__schema' in data
        && typeof data.__schema === 'object' && data.__schema !== null;
}

function createFetch(verifySsl: boolean): HttpFetch {
    if (verifySsl) {
        return (url, init) => fetch(url, init);
    }
    console.warn('SSL certificate verification disabled for remote GraphQL requests - only use in development!');
    const dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
    return (url, init) => undiciFetch(url, { ...init, dispatcher });
}

export class RemoteGraphQLClient {
    private bearerToken: string | undefined;
    private readonly fetchImpl: HttpFetch;

    constructor(private readonly config: RemoteServerConfig) {
        this.bearerToken = config.bearerToken;
        this.fetchImpl = createFetch(config.verifySsl ?? true);
    }

    get url(): string {
        return this.config.url;
    }

    /**
     * Fetches the remote schema. Any failure, including a server with introspection
     * disabled, is a RemoteIntrospectionError.
     */
    async introspect(): Promise<GraphQLSchema> {
        const target = sanitizeUrlForLogging(this.config.url);
        const body = JSON.stringify({ query: getIntrospectionQuery({ descriptions: true }) });

        let response: RawResponse;
        try {
            response = await this.post(body, this.buildHeaders(this.bearerToken));
        } catch (error) {
            throw new RemoteIntrospectionError(`Failed to fetch schema from ${target}: ${toErrorMessage(error)}`, { cause: error });
        }

        if (!response.ok) {
            throw new RemoteIntrospectionError(
                `Failed to fetch schema from ${target}: HTTP ${response.status} - ${response.body || response.statusText}`,
            );
        }

        let payload: GraphQLResponse;
        try {
            payload = this.parseBody(response.body);
        } catch (error) {
            throw new RemoteIntrospectionError(`Invalid introspection response from ${target}: ${toErrorMessage(error)}`);
        }

        if (payload.errors && payload.errors.length > 0) {
            throw new RemoteIntrospectionError(
                `GraphQL errors during introspection: ${payload.errors.map(error => error.message).join('\n')}`,
            );
        }
        if (!isIntrospectionQuery(payload.data)) {
            throw new RemoteIntrospectionError(`No introspection data in response from ${target}`);
        }

        try {
            return buildClientSchema(payload.data);
        } catch (error) {
            throw new RemoteIntrospectionError(`Invalid introspection result from ${target}: ${toErrorMessage(error)}`, { cause: error });
        }
    }

    /**
     * Runs an operation and returns its `data`. Non-2xx responses, GraphQL errors and
     * network failures are RemoteExecutionErrors carrying the server's message.
     */
    async execute(
        query: string,
        variables: Record<string, unknown>,
        options: { bearerToken?: string } = {},
    ): Promise<Record<string, unknown>> {
        const forwardedToken = this.config.forwardBearerToken ? options.bearerToken : undefined;
        return this.request(query, variables, forwardedToken, true);
    }

    private async request(
        query: string,
        variables: Record<string, unknown>,
        forwardedToken: string | undefined,
        allowRefresh: boolean,
    ): Promise<Record<string, unknown>> {
        const body = JSON.stringify(Object.keys(variables).length > 0 ? { query, variables } : { query });
        const headers = this.buildHeaders(forwardedToken ?? this.bearerToken);
        const canRefresh = allowRefresh && forwardedToken === undefined && this.config.tokenRefresh !== undefined;

        let response: RawResponse;
        try {
            response = await this.post(body, headers);
        } catch (error) {
            throw new RemoteExecutionError(toErrorMessage(error), undefined, { cause: error });
        }

        if ((response.status === 401 || response.status === 403) && canRefresh && await this.refreshToken()) {
            return this.request(query, variables, undefined, false);
        }

        if (!response.ok) {
            throw new RemoteExecutionError(
                `HTTP ${response.status}: ${response.body || response.statusText}`,
                response.status,
            );
        }

        let payload: GraphQLResponse;
        try {
            payload = this.parseBody(response.body);
        } catch (error) {
            throw new RemoteExecutionError(`Invalid GraphQL response: ${toErrorMessage(error)}`, response.status);
        }

        if (payload.errors && payload.errors.length > 0) {
            const message = payload.errors.map(error => error.message).join('\n');
            if (canRefresh && AUTH_ERROR_PATTERN.test(message) && await this.refreshToken()) {
                return this.request(query, variables, undefined, false);
            }
            throw new RemoteExecutionError(message, response.status);
        }

        return payload.data ?? {};
    }

    private async refreshToken(): Promise<boolean> {
        if (!this.config.tokenRefresh) {
            return false;
        }
        try {
            this.bearerToken = await this.config.tokenRefresh();
            return true;
        } catch (error) {
            console.warn(`Token refresh failed: ${toErrorMessage(error)}`);
            return false;
        }
    }

    private buildHeaders(token: string | undefined): Record<string, string> {
        return {
            'Content-Type': 'application/json',
            Accept: 'application/json',
            ...this.config.headers,
            ...(token ? { Authorization: `Bearer ${token}` } : {}),
        };
    }

    private parseBody(body: string): GraphQLResponse {
        const parsed: unknown = JSON.parse(body);
        return GraphQLResponseSchema.parse(parsed);
    }

    private async post(body: string, headers: Record<string, string>): Promise<RawResponse> {
        const timeoutMs = this.config.timeoutMs ?? QUERY_EXECUTION_TIMEOUT.DEFAULT;
        return executeWithTimeout(
            async signal => {
                const response = await this.fetchImpl(this.config.url, { method: 'POST', headers, body, signal });
                return {
                    ok: response.ok,
                    status: response.status,
                    statusText: response.statusText,
                    body: await response.text(),
                };
            },
            timeoutMs,
            `Request to ${sanitizeUrlForLogging(this.config.url)} timed out`,
        );
    }
}

export async function fetchRemoteSchema(config: RemoteServerConfig): Promise<GraphQLSchema> {
    return new RemoteGraphQLClient(config).introspect();
}
