import { expect, vi } from 'vitest';
import {
    GraphQLField,
    GraphQLInterfaceType,
    GraphQLNamedType,
    GraphQLObjectType,
    GraphQLSchema,
    assertObjectType,
    getNamedType,
    isInterfaceType,
    isObjectType,
} from 'graphql';
import { z } from 'zod';
import type { GraphQLMcpError } from '../../tools/errors.js';
import type { CompiledTool, SchemaFieldRef, ToolOutcome } from '../../tools/types.js';

export const TEST_ENDPOINT = 'https://api.example.test/graphql';

/**
 * Field chain starting at a root type, e.g. `fieldPath(schema, 'Query', 'user', 'posts')`.
 */
export function fieldPath(schema: GraphQLSchema, rootType: string, ...fieldNames: string[]): SchemaFieldRef[] {
    const path: SchemaFieldRef[] = [];
    let parent: GraphQLObjectType | GraphQLInterfaceType = assertObjectType(schema.getType(rootType));
    for (const fieldName of fieldNames) {
        const field: GraphQLField<unknown, unknown> | undefined = parent.getFields()[fieldName];
        if (!field) {
            throw new Error(`Unknown field ${parent.name}.${fieldName}`);
        }
        path.push({ parentType: parent, fieldName, field });
        const namedType: GraphQLNamedType = getNamedType(field.type);
        if (isObjectType(namedType) || isInterfaceType(namedType)) {
            parent = namedType;
        }
    }
    return path;
}

export function findTool<T extends CompiledTool>(tools: readonly T[], name: string): T {
    const tool = tools.find(candidate => candidate.name === name);
    if (!tool) {
        throw new Error(`No tool named ${name}; have ${tools.map(candidate => candidate.name).join(', ')}`);
    }
    return tool;
}

/**
 * Assert that an invocation succeeded and return its value
 */
export function expectValue(outcome: ToolOutcome): unknown {
    if (!outcome.ok) {
        throw new Error(`Expected success, got ${outcome.error.name}: ${outcome.error.message}`);
    }
    return outcome.value;
}

/**
 * Assert that an invocation failed and return its error
 */
export function expectFailure(outcome: ToolOutcome, kind?: GraphQLMcpError['kind']): GraphQLMcpError {
    if (outcome.ok) {
        throw new Error(`Expected failure, got ${JSON.stringify(outcome.value)}`);
    }
    if (kind) {
        expect(outcome.error.kind).toBe(kind);
    }
    return outcome.error;
}

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
    return new Response(JSON.stringify(body), {
        status: 200,
        ...init,
        headers: { 'Content-Type': 'application/json' },
    });
}

const RequestBodySchema = z.object({
    query: z.string(),
    variables: z.record(z.unknown()).optional(),
});

export interface RecordedRequest {
    url: string;
    headers: Headers;
    query: string;
    variables?: Record<string, unknown>;
}

/**
 * Stubs the global fetch with `respond` and records every GraphQL request it sees.
 */
export function stubFetch(respond: (request: RecordedRequest, index: number) => Response | Promise<Response>) {
    const requests: RecordedRequest[] = [];
    const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
        const rawBody: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : {};
        const body = RequestBodySchema.parse(rawBody);
        const request: RecordedRequest = {
            url: String(input),
            headers: new Headers(init?.headers),
            query: body.query,
            variables: body.variables,
        };
        requests.push(request);
        return respond(request, requests.length - 1);
    });
    vi.stubGlobal('fetch', fetchMock);
    return { fetchMock, requests };
}
