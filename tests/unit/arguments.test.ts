import { describe, it, expect } from 'vitest';
import { buildSchema } from 'graphql';
import { compileArguments, createArgumentValidator, toParameterShape } from '../../tools/arguments.js';
import { CompileTimeConfigError, ValidationError } from '../../tools/errors.js';
import { HIDDEN_DIRECTIVE_SDL, collectHiddenArguments } from '../../tools/hidden-arguments.js';
import { TypeMapper } from '../../tools/type-mapper.js';
import { CODE_FIRST_SCHEMA, TEST_SCHEMA } from '../core/setup.js';
import { fieldPath } from '../core/test-helpers.js';

const NO_HIDDEN = new Set<string>();

describe('collectHiddenArguments', () => {
    it('finds arguments marked with the directive', () => {
        expect([...collectHiddenArguments(TEST_SCHEMA)]).toEqual(['Query.search.tenant']);
    });

    it('finds arguments marked through extensions', () => {
        expect([...collectHiddenArguments(CODE_FIRST_SCHEMA)]).toEqual(['Query.projects.workspace']);
    });
});

describe('compileArguments', () => {
    const mapper = new TypeMapper();

    it('keeps argument names for root fields', () => {
        const { parameters } = compileArguments(fieldPath(TEST_SCHEMA, 'Query', 'user'), NO_HIDDEN, mapper);
        expect(parameters.map(({ name, required }) => ({ name, required }))).toEqual([{ name: 'id', required: true }]);
        expect(parameters[0].description).toBeUndefined();
    });

    it('prefixes ancestor arguments with the ancestor name', () => {
        const { parameters, bindings } = compileArguments(fieldPath(TEST_SCHEMA, 'Query', 'users', 'posts'), NO_HIDDEN, mapper);

        expect(parameters.map(parameter => parameter.name)).toEqual(['users_role', 'users_limit', 'filter', 'limit']);
        expect(parameters.every(parameter => !parameter.required)).toBe(true);
        expect(bindings.map(binding => [binding.pathIndex, binding.argumentName])).toEqual([
            [0, 'role'],
            [0, 'limit'],
            [1, 'filter'],
            [1, 'limit'],
        ]);
    });

    it('reports defaults without applying them', () => {
        const { parameters } = compileArguments(fieldPath(TEST_SCHEMA, 'Query', 'users'), NO_HIDDEN, mapper);
        const limit = parameters[1];

        expect(limit.defaultValue).toBe(20);
        expect(limit.description).toBe('Defaults to 20.');
        expect(limit.schema.parse(undefined)).toBeUndefined();
    });

    it('quotes string defaults in descriptions', () => {
        const { parameters } = compileArguments(fieldPath(TEST_SCHEMA, 'Mutation', 'createUser'), NO_HIDDEN, mapper);
        expect(parameters[1].description).toBe('Defaults to "VIEWER".');
    });

    it('binds hidden arguments to their default', () => {
        const { parameters, bindings } = compileArguments(
            fieldPath(TEST_SCHEMA, 'Query', 'search'),
            collectHiddenArguments(TEST_SCHEMA),
            mapper,
        );

        expect(parameters.map(parameter => parameter.name)).toEqual(['term']);
        expect(bindings[1]).toMatchObject({ kind: 'hidden', argumentName: 'tenant', defaultValue: 'public' });
    });

    it('rejects hidden arguments without a default', () => {
        const schema = buildSchema(`
          ${HIDDEN_DIRECTIVE_SDL}
          type Query {
            report(tenant: String! @mcpHidden): String
          }
        `);
        const compile = () => compileArguments(fieldPath(schema, 'Query', 'report'), collectHiddenArguments(schema), mapper);

        expect(compile).toThrow(CompileTimeConfigError);
        expect(compile).toThrow('Hidden argument Query.report(tenant) must declare a default value');
    });

    it('rejects parameter names used twice', () => {
        const schema = buildSchema(`
          type Item {
            detail(item_id: ID): String
          }
          type Query {
            item(id: ID): Item
          }
        `);
        expect(() => compileArguments(fieldPath(schema, 'Query', 'item', 'detail'), NO_HIDDEN, mapper))
            .toThrow('Parameter "item_id" is declared twice for tool item_detail');
    });
});

describe('createArgumentValidator', () => {
    const mapper = new TypeMapper();

    function validatorFor(...path: string[]) {
        const { parameters } = compileArguments(fieldPath(TEST_SCHEMA, 'Query', ...path), NO_HIDDEN, mapper);
        return createArgumentValidator({ name: path.join('_'), schema: toParameterShape(parameters) });
    }

    it('returns the parsed values', () => {
        expect(validatorFor('user')({ id: 5 })).toEqual({ ok: true, values: { id: '5' } });
    });

    it('normalizes enum arguments', () => {
        expect(validatorFor('users')({ role: 'viewer' })).toEqual({ ok: true, values: { role: 'VIEWER' } });
    });

    it('keeps explicit nulls', () => {
        expect(validatorFor('users')({ role: null })).toEqual({ ok: true, values: { role: null } });
    });

    it('treats missing arguments as an empty object', () => {
        expect(validatorFor('users')(undefined)).toEqual({ ok: true, values: {} });
    });

    it('lists every issue', () => {
        const result = validatorFor('search')({ term: 3 });
        if (result.ok) {
            throw new Error('expected a validation failure');
        }
        expect(result.error).toBeInstanceOf(ValidationError);
        expect(result.error.issues).toEqual(['term: Expected string, received number']);
        expect(result.error.message).toBe('Invalid arguments for search: term: Expected string, received number');
    });

    it('reports missing required arguments', () => {
        const result = validatorFor('search')({});
        expect(result.ok ? undefined : result.error.message).toBe('Invalid arguments for search: term: Required');
    });
});
