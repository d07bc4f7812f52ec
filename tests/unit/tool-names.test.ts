import { describe, it, expect } from 'vitest';
import { resolveToolName, toOperationName, toSnakeCase } from '../../tools/tool-names.js';
import { TEST_SCHEMA } from '../core/setup.js';
import { fieldPath } from '../core/test-helpers.js';

describe('toSnakeCase', () => {
    it.each([
        ['getUserById', 'get_user_by_id'],
        ['getHTTPResponse', 'get_http_response'],
        ['userID', 'user_id'],
        ['ID', 'id'],
        ['version2Beta', 'version2_beta'],
        ['CreateUser', 'create_user'],
        ['already_snake', 'already_snake'],
        ['user', 'user'],
    ])('converts %s to %s', (input, expected) => {
        expect(toSnakeCase(input)).toBe(expected);
    });

    it('collapses runs of underscores', () => {
        expect(toSnakeCase('__double__Name')).toBe('_double_name');
    });

    it('is idempotent', () => {
        const once = toSnakeCase('getHTTPResponseCode');
        expect(toSnakeCase(once)).toBe(once);
    });
});

describe('resolveToolName', () => {
    it('uses the field name for root fields', () => {
        expect(resolveToolName(fieldPath(TEST_SCHEMA, 'Mutation', 'createUser'))).toBe('create_user');
    });

    it('joins every field of a nested path', () => {
        expect(resolveToolName(fieldPath(TEST_SCHEMA, 'Query', 'user', 'posts', 'comments'))).toBe('user_posts_comments');
    });
});

describe('toOperationName', () => {
    it('PascalCases the tool name', () => {
        expect(toOperationName('create_user_posts')).toBe('CreateUserPosts');
        expect(toOperationName('ping')).toBe('Ping');
    });

    it('skips empty segments', () => {
        expect(toOperationName('_double_name')).toBe('DoubleName');
    });

    it('falls back for an empty name', () => {
        expect(toOperationName('')).toBe('Operation');
    });
});
