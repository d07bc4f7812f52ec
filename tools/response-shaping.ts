import {
    FieldNode,
    GraphQLOutputType,
    Kind,
    SelectionSetNode,
    isEnumType,
    isInterfaceType,
    isLeafType,
    isListType,
    isNonNullType,
    isObjectType,
} from 'graphql';
import type { SchemaFieldRef } from './types.js';

export interface ShapeOptions {
    /** Replace `null` at list-typed positions with `[]`. */
    nullListsToEmpty?: boolean;
    /** Replace enum value names with the enum's internal values. */
    enumValues?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function findFieldNode(selection: SelectionSetNode, responseKey: string): FieldNode | undefined {
    for (const node of selection.selections) {
        if (node.kind === Kind.FIELD && (node.alias?.value ?? node.name.value) === responseKey) {
            return node;
        }
    }
    return undefined;
}

export function shapeResponseValue(
    value: unknown,
    type: GraphQLOutputType,
    selection: SelectionSetNode | undefined,
    options: ShapeOptions,
): unknown {
    const nullableType = isNonNullType(type) ? type.ofType : type;

    if (value === null || value === undefined) {
        return options.nullListsToEmpty && isListType(nullableType) ? [] : value;
    }

    if (isListType(nullableType)) {
        return Array.isArray(value)
            ? value.map(item => shapeResponseValue(item, nullableType.ofType, selection, options))
            : value;
    }

    if (isEnumType(nullableType)) {
        if (options.enumValues && typeof value === 'string') {
            const enumValue = nullableType.getValue(value);
            return enumValue ? enumValue.value : value;
        }
        return value;
    }

    if (isLeafType(nullableType) || !selection || !isRecord(value)) {
        return value;
    }

    const fields = isObjectType(nullableType) || isInterfaceType(nullableType) ? nullableType.getFields() : {};
    const shaped: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
        const node = findFieldNode(selection, key);
        const field = node ? fields[node.name.value] : undefined;
        shaped[key] = node && field ? shapeResponseValue(child, field.type, node.selectionSet, options) : child;
    }
    return shaped;
}

/**
 * Pulls a tool's value out of the operation result by following its origin path,
 * mapping over list-typed ancestors.
 */
export function extractToolValue(
    data: Record<string, unknown>,
    originPath: readonly SchemaFieldRef[],
    selection: SelectionSetNode | undefined,
    options: ShapeOptions,
): unknown {
    const last = originPath.length - 1;

    const walk = (value: unknown, index: number, type: GraphQLOutputType): unknown => {
        if (index === last) {
            return shapeResponseValue(value, type, selection, options);
        }
        const nullableType = isNonNullType(type) ? type.ofType : type;
        if (value === null || value === undefined) {
            return options.nullListsToEmpty && isListType(nullableType) ? [] : null;
        }
        if (isListType(nullableType)) {
            return Array.isArray(value) ? value.map(item => walk(item, index, nullableType.ofType)) : value;
        }
        if (!isRecord(value)) {
            return value;
        }
        const next = originPath[index + 1];
        return walk(value[next.fieldName], index + 1, next.field.type);
    };

    return walk(data[originPath[0].fieldName], 0, originPath[0].field.type);
}
