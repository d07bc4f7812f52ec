import {
    DocumentNode,
    GraphQLOutputType,
    Kind,
    SelectionSetNode,
    ValueNode,
    print,
    visit,
} from 'graphql';
import { createArgumentValidator } from './arguments.js';
import { GraphQLMcpError, RemoteExecutionError, toErrorMessage } from './errors.js';
import type { RemoteGraphQLClient } from './remote-client.js';
import { extractToolValue, shapeResponseValue } from './response-shaping.js';
import type { InvokerFactory } from './types.js';

/**
 * Variables the caller actually supplied. An explicit `null` counts as supplied.
 */
export function filterSuppliedVariables(values: Record<string, unknown>): Record<string, unknown> {
    const supplied: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(values)) {
        if (value !== undefined) {
            supplied[name] = value;
        }
    }
    return supplied;
}

function isDroppedVariable(value: ValueNode, supplied: ReadonlySet<string>): boolean {
    return value.kind === Kind.VARIABLE && !supplied.has(value.name.value);
}

/**
 * Removes declarations of variables that were not supplied along with every argument,
 * input object field and list item that refers to one of them.
 */
export function pruneOperation(document: DocumentNode, supplied: ReadonlySet<string>): DocumentNode {
    return visit(document, {
        VariableDefinition(node) {
            return supplied.has(node.variable.name.value) ? undefined : null;
        },
        Argument(node) {
            return isDroppedVariable(node.value, supplied) ? null : undefined;
        },
        ObjectField(node) {
            return isDroppedVariable(node.value, supplied) ? null : undefined;
        },
        ListValue(node) {
            if (!node.values.some(value => isDroppedVariable(value, supplied))) {
                return undefined;
            }
            return { ...node, values: node.values.filter(value => !isDroppedVariable(value, supplied)) };
        },
    });
}

/**
 * `null` at a list-typed position becomes `[]`; everything else is returned untouched.
 */
export function coerceNullLists(
    value: unknown,
    type: GraphQLOutputType,
    selection: SelectionSetNode | undefined,
): unknown {
    return shapeResponseValue(value, type, selection, { nullListsToEmpty: true });
}

export function createRemoteInvoker(client: RemoteGraphQLClient): InvokerFactory {
    return tool => {
        const validate = createArgumentValidator(tool);

        return async (args, context = {}) => {
            const validation = validate(args);
            if (!validation.ok) {
                return { ok: false, error: validation.error };
            }

            const variables = filterSuppliedVariables(validation.values);
            const document = pruneOperation(tool.document, new Set(Object.keys(variables)));

            try {
                const data = await client.execute(print(document), variables, { bearerToken: context.authToken });
                return {
                    ok: true,
                    value: extractToolValue(data, tool.originPath, tool.selection, { nullListsToEmpty: true }),
                };
            } catch (error) {
                if (error instanceof GraphQLMcpError) {
                    return { ok: false, error };
                }
                return { ok: false, error: new RemoteExecutionError(toErrorMessage(error), undefined, { cause: error }) };
            }
        };
    };
}
