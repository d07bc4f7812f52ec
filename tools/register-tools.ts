import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ToolDescriptor, ToolOutcome } from './types.js';

export function toCallToolResult(outcome: ToolOutcome): CallToolResult {
    if (!outcome.ok) {
        return {
            content: [{ type: 'text', text: outcome.error.message }],
            isError: true,
        };
    }

    const { value } = outcome;
    const text = typeof value === 'string' ? value : JSON.stringify(value ?? null, null, 2);
    return {
        content: [{ type: 'text', text }],
        structuredContent: { result: value ?? null },
    };
}

/**
 * Registers every descriptor on `server`. The caller's bearer token, when the
 * transport authenticated one, reaches the invoker as `authToken`.
 */
export function registerTools(server: McpServer, tools: readonly ToolDescriptor[]): void {
    for (const tool of tools) {
        server.registerTool(
            tool.name,
            {
                description: tool.description ?? `${tool.operationKind === 'mutation' ? 'Mutation' : 'Query'} ${tool.name}`,
                inputSchema: tool.schema,
                outputSchema: { result: tool.returnSchema },
                annotations: { readOnlyHint: tool.operationKind === 'query' },
            },
            async (args, extra) => toCallToolResult(await tool.invoke(args, { authToken: extra.authInfo?.token })),
        );
    }
}
