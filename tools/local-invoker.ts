import { GraphQLSchema, execute } from 'graphql';
import { createArgumentValidator } from './arguments.js';
import { LocalExecutionError, toErrorMessage } from './errors.js';
import { filterSuppliedVariables } from './query-rewriter.js';
import { extractToolValue } from './response-shaping.js';
import type { InvocationContext, InvokerFactory } from './types.js';

export interface LocalInvokerOptions {
    rootValue?: unknown;
    /** Passed to resolvers. A function receives the invocation context of each call. */
    contextValue?: object | ((context: InvocationContext) => unknown);
}

function resolveContextValue(options: LocalInvokerOptions, context: InvocationContext): unknown {
    const { contextValue } = options;
    if (typeof contextValue === 'function') {
        return contextValue(context);
    }
    return { ...contextValue, authToken: context.authToken };
}

/**
 * Runs tools in-process against `schema`. Enum values in the result are reported by
 * their internal value rather than their GraphQL name.
 */
export function createLocalInvoker(schema: GraphQLSchema, options: LocalInvokerOptions = {}): InvokerFactory {
    return tool => {
        const validate = createArgumentValidator(tool);

        return async (args, context = {}) => {
            const validation = validate(args);
            if (!validation.ok) {
                return { ok: false, error: validation.error };
            }

            try {
                const result = await execute({
                    schema,
                    document: tool.document,
                    rootValue: options.rootValue,
                    contextValue: resolveContextValue(options, context),
                    variableValues: filterSuppliedVariables(validation.values),
                });

                if (result.errors && result.errors.length > 0) {
                    return {
                        ok: false,
                        error: new LocalExecutionError(result.errors.map(error => error.message).join('\n')),
                    };
                }

                return {
                    ok: true,
                    value: extractToolValue(result.data ?? {}, tool.originPath, tool.selection, { enumValues: true }),
                };
            } catch (error) {
                return { ok: false, error: new LocalExecutionError(toErrorMessage(error), { cause: error }) };
            }
        };
    };
}
