import {
    GraphQLObjectType,
    GraphQLSchema,
    getNamedType,
    isInterfaceType,
    isObjectType,
} from 'graphql';
import { compileArguments, toParameterShape } from './arguments.js';
import { CompileTimeConfigError, toErrorMessage } from './errors.js';
import { assertHiddenDefaults, collectHiddenArguments, type HiddenArgumentTable } from './hidden-arguments.js';
import { buildOperationDocument } from './operation-builder.js';
import { buildToolReturnSchema } from './return-schema.js';
import type { ScalarMappings } from './scalars.js';
import { LOCAL_SELECTION_DEPTH, REMOTE_SELECTION_DEPTH, buildSelection } from './selection-set.js';
import { resolveToolName } from './tool-names.js';
import { TypeMapper } from './type-mapper.js';
import type {
    CompiledTool,
    InvokerFactory,
    OperationKind,
    SchemaFieldRef,
    SchemaOrigin,
    ToolDescriptor,
} from './types.js';

export const DEFAULT_MAX_NESTED_DEPTH = 5;

export interface SynthesizeOptions {
    /** Expose Mutation fields as tools. Defaults to true. */
    allowMutations?: boolean;
    origin?: SchemaOrigin;
    /** Overrides the selection depth budget of the origin. */
    selectionDepth?: number;
    /** Longest field chain a nested tool may have. */
    maxNestedDepth?: number;
    scalars?: ScalarMappings;
    /** Only these tool names are exposed. */
    include?: readonly string[];
    exclude?: readonly string[];
    /** Defaults to the `@mcpHidden` arguments found in the schema. */
    hiddenArguments?: HiddenArgumentTable;
}

interface CompileContext {
    origin: SchemaOrigin;
    mapper: TypeMapper;
    hiddenArguments: HiddenArgumentTable;
    selectionDepth: number;
    isExposed: (name: string) => boolean;
}

function compileTool(originPath: SchemaFieldRef[], operationKind: OperationKind, context: CompileContext): CompiledTool {
    const name = resolveToolName(originPath);
    const leaf = originPath[originPath.length - 1];
    const { parameters, bindings } = compileArguments(originPath, context.hiddenArguments, context.mapper);
    const selection = buildSelection(leaf.field.type, context.selectionDepth);

    const tool = {
        name,
        description: leaf.field.description ?? undefined,
        parameters,
        schema: toParameterShape(parameters),
        returnSchema: buildToolReturnSchema(originPath, selection, context.mapper),
        originPath,
        operationKind,
        origin: context.origin,
        selection,
        bindings,
    };
    return { ...tool, document: buildOperationDocument(tool) };
}

/**
 * Compiles unless the tool is filtered out. Configuration errors abort synthesis;
 * any other failure only drops this tool.
 */
function tryCompileTool(
    originPath: SchemaFieldRef[],
    operationKind: OperationKind,
    context: CompileContext,
): CompiledTool | undefined {
    const name = resolveToolName(originPath);
    if (!context.isExposed(name)) {
        return undefined;
    }
    try {
        return compileTool(originPath, operationKind, context);
    } catch (error) {
        if (error instanceof CompileTimeConfigError) {
            throw error;
        }
        console.warn(`Skipping tool ${name}: ${toErrorMessage(error)}`);
        return undefined;
    }
}

function rootFieldRefs(rootType: GraphQLObjectType): SchemaFieldRef[] {
    return Object.values(rootType.getFields()).map(field => ({ parentType: rootType, fieldName: field.name, field }));
}

/**
 * Every chain below `root` ending in a field that takes arguments, depth first.
 * Types already on the current branch are not descended into again.
 */
function collectNestedPaths(root: SchemaFieldRef, maxDepth: number): SchemaFieldRef[][] {
    const paths: SchemaFieldRef[][] = [];

    const walk = (path: SchemaFieldRef[], branch: ReadonlySet<string>): void => {
        if (path.length >= maxDepth) {
            return;
        }
        const namedType = getNamedType(path[path.length - 1].field.type);
        if (!(isObjectType(namedType) || isInterfaceType(namedType)) || branch.has(namedType.name)) {
            return;
        }

        const nextBranch = new Set([...branch, namedType.name]);
        for (const field of Object.values(namedType.getFields())) {
            const childPath = [...path, { parentType: namedType, fieldName: field.name, field }];
            if (field.args.length > 0) {
                paths.push(childPath);
            }
            walk(childPath, nextBranch);
        }
    };

    walk([root], new Set([root.parentType.name]));
    return paths;
}

/**
 * Compiles the schema into tools: Mutation fields (when allowed), then Query fields
 * replacing same-named mutations, then nested fields with arguments. Nested tools never
 * replace a top-level tool; among themselves the first one wins.
 */
export function compileTools(schema: GraphQLSchema, options: SynthesizeOptions = {}): CompiledTool[] {
    const origin = options.origin ?? 'local';
    const include = options.include ? new Set(options.include) : undefined;
    const exclude = new Set(options.exclude ?? []);
    const context: CompileContext = {
        origin,
        mapper: new TypeMapper({ scalars: options.scalars }),
        hiddenArguments: options.hiddenArguments ?? collectHiddenArguments(schema),
        selectionDepth: options.selectionDepth ?? (origin === 'remote' ? REMOTE_SELECTION_DEPTH : LOCAL_SELECTION_DEPTH),
        isExposed: name => !exclude.has(name) && (!include || include.has(name)),
    };
    assertHiddenDefaults(schema, context.hiddenArguments);
    const allowMutations = options.allowMutations ?? true;
    const maxNestedDepth = options.maxNestedDepth ?? DEFAULT_MAX_NESTED_DEPTH;

    const queryType = schema.getQueryType();
    const mutationType = allowMutations ? schema.getMutationType() : undefined;
    const queryRoots = queryType ? rootFieldRefs(queryType) : [];
    const mutationRoots = mutationType ? rootFieldRefs(mutationType) : [];

    const topLevel = new Map<string, CompiledTool>();
    for (const ref of mutationRoots) {
        const tool = tryCompileTool([ref], 'mutation', context);
        if (tool) {
            topLevel.set(tool.name, tool);
        }
    }
    for (const ref of queryRoots) {
        const tool = tryCompileTool([ref], 'query', context);
        if (!tool) {
            continue;
        }
        if (topLevel.has(tool.name)) {
            console.warn(`Query tool ${tool.name} replaces the mutation tool of the same name`);
        }
        topLevel.set(tool.name, tool);
    }

    const nested = new Map<string, CompiledTool>();
    const nestedRoots: [SchemaFieldRef, OperationKind][] = [
        ...queryRoots.map((ref): [SchemaFieldRef, OperationKind] => [ref, 'query']),
        ...mutationRoots.map((ref): [SchemaFieldRef, OperationKind] => [ref, 'mutation']),
    ];
    for (const [root, operationKind] of nestedRoots) {
        for (const path of collectNestedPaths(root, maxNestedDepth)) {
            const name = resolveToolName(path);
            if (topLevel.has(name) || nested.has(name)) {
                console.warn(`Skipping nested tool ${name}: the name is already taken`);
                continue;
            }
            const tool = tryCompileTool(path, operationKind, context);
            if (tool) {
                nested.set(name, tool);
            }
        }
    }

    return [...topLevel.values(), ...nested.values()];
}

export function synthesizeTools(
    schema: GraphQLSchema,
    createInvoker: InvokerFactory,
    options: SynthesizeOptions = {},
): ToolDescriptor[] {
    return compileTools(schema, options).map(tool => ({ ...tool, invoke: createInvoker(tool) }));
}
