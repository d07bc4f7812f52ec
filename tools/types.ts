import type {
    DocumentNode,
    GraphQLField,
    GraphQLInputType,
    GraphQLInterfaceType,
    GraphQLObjectType,
    SelectionSetNode,
} from 'graphql';
import type { ZodRawShape, ZodTypeAny } from 'zod';
import type { GraphQLMcpError } from './errors.js';

export type OperationKind = 'query' | 'mutation';

export type SchemaOrigin = 'local' | 'remote';

/**
 * One field of the schema's type graph, as reached while walking it.
 */
export interface SchemaFieldRef {
    parentType: GraphQLObjectType | GraphQLInterfaceType;
    fieldName: string;
    field: GraphQLField<unknown, unknown>;
}

export interface ParameterSpec {
    name: string;
    type: GraphQLInputType;
    required: boolean;
    defaultValue?: unknown;
    description?: string;
    schema: ZodTypeAny;
}

/**
 * Ties a field argument in the origin path to the value it receives:
 * a tool parameter (sent as a variable) or, for hidden arguments, the schema default.
 */
export type ArgumentBinding =
    | {
        kind: 'parameter';
        parameter: string;
        pathIndex: number;
        argumentName: string;
        type: GraphQLInputType;
        hasDefault: boolean;
    }
    | {
        kind: 'hidden';
        pathIndex: number;
        argumentName: string;
        type: GraphQLInputType;
        defaultValue: unknown;
    };

export interface CompiledTool {
    name: string;
    description?: string;
    parameters: ParameterSpec[];
    schema: ZodRawShape;
    returnSchema: ZodTypeAny;
    originPath: SchemaFieldRef[];
    operationKind: OperationKind;
    origin: SchemaOrigin;
    selection?: SelectionSetNode;
    bindings: ArgumentBinding[];
    document: DocumentNode;
}

export interface InvocationContext {
    /** Bearer token presented by the calling agent, when the transport authenticated one. */
    authToken?: string;
}

export type ToolOutcome =
    | { ok: true; value: unknown }
    | { ok: false; error: GraphQLMcpError };

export type ToolInvoker = (args: Record<string, unknown>, context?: InvocationContext) => Promise<ToolOutcome>;

export type InvokerFactory = (tool: CompiledTool) => ToolInvoker;

export interface ToolDescriptor extends CompiledTool {
    invoke: ToolInvoker;
}
