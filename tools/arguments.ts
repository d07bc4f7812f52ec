import { GraphQLArgument, isNonNullType } from 'graphql';
import { z, type ZodError, type ZodRawShape } from 'zod';
import { CompileTimeConfigError, ValidationError } from './errors.js';
import { hiddenArgumentKey, type HiddenArgumentTable } from './hidden-arguments.js';
import { resolveToolName, toSnakeCase } from './tool-names.js';
import type { TypeMapper } from './type-mapper.js';
import type { ArgumentBinding, CompiledTool, ParameterSpec, SchemaFieldRef } from './types.js';

export interface CompiledArguments {
    parameters: ParameterSpec[];
    bindings: ArgumentBinding[];
}

function describeArgument(argument: GraphQLArgument): string | undefined {
    const parts: string[] = [];
    if (argument.description) {
        parts.push(argument.description);
    }
    if (argument.defaultValue !== undefined) {
        parts.push(`Defaults to ${JSON.stringify(argument.defaultValue)}.`);
    }
    return parts.length > 0 ? parts.join(' ') : undefined;
}

/**
 * Parameters for the tool at `originPath`. Ancestor arguments are prefixed with the
 * ancestor's snake_case name; hidden arguments never become parameters and are bound
 * to their schema default instead.
 */
export function compileArguments(
    originPath: readonly SchemaFieldRef[],
    hiddenArguments: HiddenArgumentTable,
    mapper: TypeMapper,
): CompiledArguments {
    const parameters: ParameterSpec[] = [];
    const bindings: ArgumentBinding[] = [];
    const names = new Set<string>();
    const leafIndex = originPath.length - 1;

    originPath.forEach((ref, pathIndex) => {
        const prefix = pathIndex === leafIndex ? '' : `${toSnakeCase(ref.fieldName)}_`;

        for (const argument of ref.field.args) {
            const hasDefault = argument.defaultValue !== undefined;

            if (hiddenArguments.has(hiddenArgumentKey(ref.parentType.name, ref.fieldName, argument.name))) {
                if (!hasDefault) {
                    throw new CompileTimeConfigError(
                        `Hidden argument ${ref.parentType.name}.${ref.fieldName}(${argument.name}) must declare a default value`,
                    );
                }
                bindings.push({
                    kind: 'hidden',
                    pathIndex,
                    argumentName: argument.name,
                    type: argument.type,
                    defaultValue: argument.defaultValue,
                });
                continue;
            }

            const name = `${prefix}${argument.name}`;
            if (names.has(name)) {
                throw new Error(`Parameter "${name}" is declared twice for tool ${resolveToolName(originPath)}`);
            }
            names.add(name);

            const required = isNonNullType(argument.type) && !hasDefault;
            const description = describeArgument(argument);
            let schema = mapper.mapInputType(argument.type);
            if (!required) {
                schema = schema.optional();
            }
            if (description) {
                schema = schema.describe(description);
            }

            parameters.push({
                name,
                type: argument.type,
                required,
                defaultValue: argument.defaultValue,
                description,
                schema,
            });
            bindings.push({
                kind: 'parameter',
                parameter: name,
                pathIndex,
                argumentName: argument.name,
                type: argument.type,
                hasDefault,
            });
        }
    });

    return { parameters, bindings };
}

export function toParameterShape(parameters: readonly ParameterSpec[]): ZodRawShape {
    const shape: ZodRawShape = {};
    for (const parameter of parameters) {
        shape[parameter.name] = parameter.schema;
    }
    return shape;
}

function formatIssues(error: ZodError): string[] {
    return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

export type ArgumentValidation =
    | { ok: true; values: Record<string, unknown> }
    | { ok: false; error: ValidationError };

/**
 * Checks caller arguments against the tool's parameter shape, coercing enums and IDs.
 */
export function createArgumentValidator(tool: Pick<CompiledTool, 'name' | 'schema'>): (args: unknown) => ArgumentValidation {
    const schema = z.object(tool.schema);
    return args => {
        const parsed = schema.safeParse(args ?? {});
        if (parsed.success) {
            return { ok: true, values: parsed.data };
        }
        const issues = formatIssues(parsed.error);
        return {
            ok: false,
            error: new ValidationError(`Invalid arguments for ${tool.name}: ${issues.join('; ')}`, issues),
        };
    };
}
