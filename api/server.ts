import { config } from 'dotenv';
import { GraphQLSchema } from 'graphql';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { toErrorMessage } from '../tools/errors.js';
import { createLocalInvoker, type LocalInvokerOptions } from '../tools/local-invoker.js';
import { createRemoteInvoker } from '../tools/query-rewriter.js';
import { registerTools } from '../tools/register-tools.js';
import { RemoteGraphQLClient, type RemoteServerConfig } from '../tools/remote-client.js';
import {
    DEFAULT_SERVER_NAME,
    SERVER_VERSION,
    resolveServerSettings,
    sanitizeUrlForLogging,
} from '../tools/shared-utils.js';
import { synthesizeTools, type SynthesizeOptions } from '../tools/synthesize.js';
import type { ToolDescriptor } from '../tools/types.js';

export interface GraphQLMcpServerOptions extends Omit<SynthesizeOptions, 'origin'> {
    name?: string;
    version?: string;
}

export interface GraphQLMcpServer {
    server: McpServer;
    tools: ToolDescriptor[];
}

function createServer(tools: ToolDescriptor[], options: GraphQLMcpServerOptions): GraphQLMcpServer {
    const server = new McpServer({
        name: options.name ?? DEFAULT_SERVER_NAME,
        version: options.version ?? SERVER_VERSION,
    });
    registerTools(server, tools);
    return { server, tools };
}

/**
 * An MCP server whose tools resolve against `schema` in this process.
 */
export function createGraphQLMcpServer(
    schema: GraphQLSchema,
    options: GraphQLMcpServerOptions & LocalInvokerOptions = {},
): GraphQLMcpServer {
    const { rootValue, contextValue, ...rest } = options;
    const tools = synthesizeTools(schema, createLocalInvoker(schema, { rootValue, contextValue }), {
        ...rest,
        origin: 'local',
    });
    return createServer(tools, rest);
}

/**
 * Introspects the endpoint and exposes its schema. Fails with a
 * RemoteIntrospectionError when the schema cannot be fetched.
 */
export async function createRemoteGraphQLMcpServer(
    remote: RemoteServerConfig,
    options: GraphQLMcpServerOptions = {},
): Promise<GraphQLMcpServer> {
    const client = new RemoteGraphQLClient(remote);
    const schema = await client.introspect();
    const tools = synthesizeTools(schema, createRemoteInvoker(client), { ...options, origin: 'remote' });
    return createServer(tools, options);
}

export async function main(): Promise<void> {
    // Load environment variables from .env file
    config({ path: '.env' });

    const settings = resolveServerSettings();
    if (!settings.remote) {
        throw new Error('GRAPHQL_ENDPOINT is not set');
    }

    const { server, tools } = await createRemoteGraphQLMcpServer(settings.remote, {
        name: settings.name,
        allowMutations: settings.allowMutations,
    });

    // Graceful shutdown handling
    const shutdown = (): void => {
        console.error('Shutting down gracefully...');
        server.close().then(
            () => process.exit(0),
            (error: unknown) => {
                console.error(`Shutdown failed: ${toErrorMessage(error)}`);
                process.exit(1);
            },
        );
    };
    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);

    await server.connect(new StdioServerTransport());
    console.error(`${settings.name} serving ${tools.length} tools from ${sanitizeUrlForLogging(settings.remote.url)}`);
}
