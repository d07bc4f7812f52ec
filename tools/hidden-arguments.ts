import { GraphQLArgument, GraphQLField, GraphQLSchema, isInterfaceType, isObjectType } from 'graphql';
import { CompileTimeConfigError } from './errors.js';

export const HIDDEN_DIRECTIVE_NAME = 'mcpHidden';

/**
 * Add to SDL-first schemas that mark arguments with `@mcpHidden`.
 * Code-first schemas set `extensions: { mcpHidden: true }` on the argument instead.
 */
export const HIDDEN_DIRECTIVE_SDL = `directive @${HIDDEN_DIRECTIVE_NAME} on ARGUMENT_DEFINITION`;

export type HiddenArgumentTable = ReadonlySet<string>;

export function hiddenArgumentKey(typeName: string, fieldName: string, argumentName: string): string {
    return `${typeName}.${fieldName}.${argumentName}`;
}

function isHiddenArgument(argument: GraphQLArgument): boolean {
    if (argument.extensions[HIDDEN_DIRECTIVE_NAME] === true) {
        return true;
    }
    return argument.astNode?.directives?.some(directive => directive.name.value === HIDDEN_DIRECTIVE_NAME) ?? false;
}

function* schemaArguments(
    schema: GraphQLSchema,
): Generator<[typeName: string, field: GraphQLField<unknown, unknown>, argument: GraphQLArgument]> {
    for (const type of Object.values(schema.getTypeMap())) {
        if (type.name.startsWith('__') || !(isObjectType(type) || isInterfaceType(type))) {
            continue;
        }
        for (const field of Object.values(type.getFields())) {
            for (const argument of field.args) {
                yield [type.name, field, argument];
            }
        }
    }
}

export function collectHiddenArguments(schema: GraphQLSchema): HiddenArgumentTable {
    const hidden = new Set<string>();
    for (const [typeName, field, argument] of schemaArguments(schema)) {
        if (isHiddenArgument(argument)) {
            hidden.add(hiddenArgumentKey(typeName, field.name, argument.name));
        }
    }
    return hidden;
}

/**
 * Every hidden argument in the schema needs a default, whether or not its field
 * ends up as a tool.
 */
export function assertHiddenDefaults(schema: GraphQLSchema, hiddenArguments: HiddenArgumentTable): void {
    for (const [typeName, field, argument] of schemaArguments(schema)) {
        if (argument.defaultValue === undefined && hiddenArguments.has(hiddenArgumentKey(typeName, field.name, argument.name))) {
            throw new CompileTimeConfigError(
                `Hidden argument ${typeName}.${field.name}(${argument.name}) must declare a default value`,
            );
        }
    }
}
