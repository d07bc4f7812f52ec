import {
    GraphQLOutputType,
    Kind,
    SelectionSetNode,
    isInterfaceType,
    isLeafType,
    isListType,
    isNonNullType,
    isObjectType,
} from 'graphql';
import { z, type ZodTypeAny } from 'zod';
import type { TypeMapper } from './type-mapper.js';
import type { SchemaFieldRef } from './types.js';

function buildNullableReturnSchema(
    type: GraphQLOutputType,
    selection: SelectionSetNode | undefined,
    mapper: TypeMapper,
): ZodTypeAny {
    if (isNonNullType(type)) {
        return buildNullableReturnSchema(type.ofType, selection, mapper);
    }
    if (isListType(type)) {
        return z.array(buildReturnSchema(type.ofType, selection, mapper));
    }
    if (isLeafType(type)) {
        return mapper.mapLeafOutput(type);
    }
    if (!selection) {
        return z.record(z.unknown());
    }

    const shape: Record<string, ZodTypeAny> = {};
    const fields = isObjectType(type) || isInterfaceType(type) ? type.getFields() : {};
    for (const node of selection.selections) {
        if (node.kind !== Kind.FIELD) {
            continue;
        }
        const responseKey = node.alias?.value ?? node.name.value;
        if (node.name.value === '__typename') {
            shape[responseKey] = z.string();
            continue;
        }
        const field = fields[node.name.value];
        if (field) {
            shape[responseKey] = buildReturnSchema(field.type, node.selectionSet, mapper);
        }
    }
    return z.object(shape);
}

/**
 * Result schema for a value of `type` fetched with `selection`: exactly the selected
 * fields, nullable where GraphQL says so.
 */
export function buildReturnSchema(
    type: GraphQLOutputType,
    selection: SelectionSetNode | undefined,
    mapper: TypeMapper,
): ZodTypeAny {
    if (isNonNullType(type)) {
        return buildNullableReturnSchema(type.ofType, selection, mapper);
    }
    return buildNullableReturnSchema(type, selection, mapper).nullable();
}

function wrapLike(type: GraphQLOutputType, inner: ZodTypeAny): ZodTypeAny {
    if (isNonNullType(type)) {
        return isListType(type.ofType) ? z.array(wrapLike(type.ofType.ofType, inner)) : inner;
    }
    return (isListType(type) ? z.array(wrapLike(type.ofType, inner)) : inner).nullable();
}

/**
 * A nested tool returns its leaf value as seen through every ancestor: list-typed
 * ancestors turn it into arrays, nullable ones may yield null.
 */
export function buildToolReturnSchema(
    originPath: readonly SchemaFieldRef[],
    selection: SelectionSetNode | undefined,
    mapper: TypeMapper,
): ZodTypeAny {
    const leaf = originPath[originPath.length - 1];
    let schema = buildReturnSchema(leaf.field.type, selection, mapper);
    for (let index = originPath.length - 2; index >= 0; index--) {
        schema = wrapLike(originPath[index].field.type, schema);
    }
    return schema;
}
