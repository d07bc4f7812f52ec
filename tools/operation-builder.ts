import {
    ArgumentNode,
    DocumentNode,
    FieldNode,
    GraphQLInputType,
    Kind,
    OperationTypeNode,
    SelectionSetNode,
    VariableDefinitionNode,
    astFromValue,
    isNonNullType,
    parseType,
} from 'graphql';
import { CompileTimeConfigError } from './errors.js';
import { toOperationName } from './tool-names.js';
import type { ArgumentBinding, CompiledTool } from './types.js';

type OperationSource = Pick<CompiledTool, 'name' | 'operationKind' | 'originPath' | 'bindings' | 'selection'>;

// An argument with a default accepts an omitted variable only if the variable itself is nullable.
function variableType(binding: Extract<ArgumentBinding, { kind: 'parameter' }>): GraphQLInputType {
    return binding.hasDefault && isNonNullType(binding.type) ? binding.type.ofType : binding.type;
}

function argumentNode(binding: ArgumentBinding, toolName: string): ArgumentNode {
    if (binding.kind === 'parameter') {
        return {
            kind: Kind.ARGUMENT,
            name: { kind: Kind.NAME, value: binding.argumentName },
            value: { kind: Kind.VARIABLE, name: { kind: Kind.NAME, value: binding.parameter } },
        };
    }

    const value = astFromValue(binding.defaultValue, binding.type);
    if (!value) {
        throw new CompileTimeConfigError(
            `Default of hidden argument "${binding.argumentName}" in tool ${toolName} cannot be written as a GraphQL literal`,
        );
    }
    return { kind: Kind.ARGUMENT, name: { kind: Kind.NAME, value: binding.argumentName }, value };
}

/**
 * The full operation for a tool: every parameter declared as a variable, ancestor
 * fields wrapped around the leaf field and its selection.
 */
export function buildOperationDocument(tool: OperationSource): DocumentNode {
    const variableDefinitions: VariableDefinitionNode[] = [];
    for (const binding of tool.bindings) {
        if (binding.kind !== 'parameter') {
            continue;
        }
        variableDefinitions.push({
            kind: Kind.VARIABLE_DEFINITION,
            variable: { kind: Kind.VARIABLE, name: { kind: Kind.NAME, value: binding.parameter } },
            type: parseType(String(variableType(binding))),
        });
    }

    let selectionSet: SelectionSetNode | undefined = tool.selection;
    for (let index = tool.originPath.length - 1; index >= 0; index--) {
        const field: FieldNode = {
            kind: Kind.FIELD,
            name: { kind: Kind.NAME, value: tool.originPath[index].fieldName },
            arguments: tool.bindings
                .filter(binding => binding.pathIndex === index)
                .map(binding => argumentNode(binding, tool.name)),
            ...(selectionSet ? { selectionSet } : {}),
        };
        selectionSet = { kind: Kind.SELECTION_SET, selections: [field] };
    }

    if (!selectionSet) {
        throw new Error(`Tool ${tool.name} has an empty origin path`);
    }

    return {
        kind: Kind.DOCUMENT,
        definitions: [
            {
                kind: Kind.OPERATION_DEFINITION,
                operation: tool.operationKind === 'mutation' ? OperationTypeNode.MUTATION : OperationTypeNode.QUERY,
                name: { kind: Kind.NAME, value: toOperationName(tool.name) },
                variableDefinitions,
                selectionSet,
            },
        ],
    };
}
