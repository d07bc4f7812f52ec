import {
    GRAPHQL_MAX_INT,
    GRAPHQL_MIN_INT,
    GraphQLEnumType,
    GraphQLInputObjectType,
    GraphQLInputType,
    GraphQLLeafType,
    GraphQLScalarType,
    isEnumType,
    isInputObjectType,
    isListType,
    isNonNullType,
    isScalarType,
} from 'graphql';
import { z, type ZodTypeAny } from 'zod';
import { DEFAULT_SCALAR_MAPPINGS, type ScalarMappings } from './scalars.js';

export interface TypeMapperOptions {
    scalars?: ScalarMappings;
}

/**
 * Maps GraphQL input types to zod parameter schemas and leaf output types to
 * result schemas. Holds a cache of input object schemas so recursive input
 * types resolve to a single lazy schema.
 */
export class TypeMapper {
    private readonly scalars: ScalarMappings;
    private readonly inputObjects = new Map<string, ZodTypeAny>();

    constructor(options: TypeMapperOptions = {}) {
        this.scalars = options.scalars ?? DEFAULT_SCALAR_MAPPINGS;
    }

    mapInputType(type: GraphQLInputType): ZodTypeAny {
        if (isNonNullType(type)) {
            return this.mapNullableInput(type.ofType);
        }
        return this.mapNullableInput(type).nullable();
    }

    mapLeafOutput(type: GraphQLLeafType): ZodTypeAny {
        if (isEnumType(type)) {
            const values = type.getValues().map(value => value.value);
            const strings = values.filter((value): value is string => typeof value === 'string');
            const [first, ...rest] = strings;
            if (first === undefined || strings.length !== values.length) {
                return z.unknown();
            }
            return z.enum([first, ...rest]);
        }
        switch (type.name) {
            case 'String':
            case 'ID':
                return z.string();
            case 'Int':
                return z.number().int().min(GRAPHQL_MIN_INT).max(GRAPHQL_MAX_INT);
            case 'Float':
                return z.number();
            case 'Boolean':
                return z.boolean();
            default:
                // custom scalars serialize however their author decided
                return z.unknown();
        }
    }

    private mapNullableInput(type: GraphQLInputType): ZodTypeAny {
        if (isNonNullType(type)) {
            return this.mapNullableInput(type.ofType);
        }
        if (isListType(type)) {
            return z.array(this.mapInputType(type.ofType));
        }
        if (isEnumType(type)) {
            return this.mapEnumInput(type);
        }
        if (isScalarType(type)) {
            return this.mapScalarInput(type);
        }
        if (isInputObjectType(type)) {
            return this.mapInputObject(type);
        }
        return z.any();
    }

    private mapScalarInput(type: GraphQLScalarType): ZodTypeAny {
        switch (type.name) {
            case 'String':
                return z.string();
            case 'ID':
                return z.union([z.string(), z.number().int()]).transform(value => String(value));
            case 'Int':
                return z.number().int().min(GRAPHQL_MIN_INT).max(GRAPHQL_MAX_INT);
            case 'Float':
                return z.number();
            case 'Boolean':
                return z.boolean();
        }
        const custom = this.scalars[type.name];
        if (custom) {
            return custom();
        }
        return z.record(z.unknown());
    }

    /**
     * Accepts the value's name or its internal value in any letter case and
     * hands the GraphQL value name on, since that is what variables carry.
     */
    private mapEnumInput(type: GraphQLEnumType): ZodTypeAny {
        const values = type.getValues();
        const lookup = new Map<string, string>();
        for (const value of values) {
            lookup.set(value.name.toLowerCase(), value.name);
        }
        for (const value of values) {
            if (typeof value.value === 'string' && !lookup.has(value.value.toLowerCase())) {
                lookup.set(value.value.toLowerCase(), value.name);
            }
        }

        const [first, ...rest] = values.map(value => value.name);
        if (first === undefined) {
            return z.never();
        }

        const schema = z.preprocess(
            input => (typeof input === 'string' ? lookup.get(input.toLowerCase()) ?? input : input),
            z.enum([first, ...rest]),
        );
        return type.description ? schema.describe(type.description) : schema;
    }

    private mapInputObject(type: GraphQLInputObjectType): ZodTypeAny {
        const cached = this.inputObjects.get(type.name);
        if (cached) {
            return cached;
        }

        let built: ZodTypeAny | undefined;
        const schema = z.lazy(() => (built ??= this.buildInputObject(type)));
        this.inputObjects.set(type.name, schema);
        return schema;
    }

    private buildInputObject(type: GraphQLInputObjectType): ZodTypeAny {
        const shape: Record<string, ZodTypeAny> = {};
        for (const field of Object.values(type.getFields())) {
            let schema = this.mapInputType(field.type);
            if (!isNonNullType(field.type) || field.defaultValue !== undefined) {
                schema = schema.optional();
            }
            if (field.description) {
                schema = schema.describe(field.description);
            }
            shape[field.name] = schema;
        }

        const object = z.object(shape);
        return type.description ? object.describe(type.description) : object;
    }
}
