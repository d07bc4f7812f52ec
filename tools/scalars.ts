import { z, type ZodTypeAny } from 'zod';

/**
 * Parameter schemas for custom scalars, keyed by scalar name.
 * Scalars missing from the table are treated as string-keyed records.
 */
export type ScalarMappings = Readonly<Record<string, () => ZodTypeAny>>;

export const DEFAULT_SCALAR_MAPPINGS: ScalarMappings = {
    DateTime: () => z.string().describe('ISO-8601 date-time'),
    Date: () => z.string().describe('ISO-8601 date'),
    Time: () => z.string().describe('ISO-8601 time'),
    UUID: () => z.string().uuid(),
    Bytes: () => z.string().describe('Base64-encoded bytes'),
    JSON: () => z.any(),
    JSONObject: () => z.record(z.unknown()),
};
