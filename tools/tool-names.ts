import type { SchemaFieldRef } from './types.js';

/**
 * camelCase → snake_case. Acronym runs stay one word: `getHTTPResponse` → `get_http_response`.
 */
export function toSnakeCase(name: string): string {
    return name
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
        .replace(/_+/g, '_')
        .toLowerCase();
}

export function resolveToolName(originPath: readonly SchemaFieldRef[]): string {
    return originPath.map(ref => toSnakeCase(ref.fieldName)).join('_');
}

// user_posts → UserPosts
export function toOperationName(toolName: string): string {
    const name = toolName
        .split('_')
        .filter(part => part.length > 0)
        .map(part => part[0].toUpperCase() + part.slice(1))
        .join('');
    return name.length > 0 ? name : 'Operation';
}
