// Central exports for the schema-to-tool compiler
export * from './errors.js';
export * from './types.js';
export { DEFAULT_SCALAR_MAPPINGS, type ScalarMappings } from './scalars.js';
export { TypeMapper, type TypeMapperOptions } from './type-mapper.js';
export { LOCAL_SELECTION_DEPTH, REMOTE_SELECTION_DEPTH, buildSelection, printSelection } from './selection-set.js';
export { buildReturnSchema, buildToolReturnSchema } from './return-schema.js';
export { resolveToolName, toOperationName, toSnakeCase } from './tool-names.js';
export {
    HIDDEN_DIRECTIVE_NAME,
    HIDDEN_DIRECTIVE_SDL,
    collectHiddenArguments,
    hiddenArgumentKey,
    type HiddenArgumentTable,
} from './hidden-arguments.js';
export { compileArguments, createArgumentValidator, toParameterShape } from './arguments.js';
export { buildOperationDocument } from './operation-builder.js';
export { DEFAULT_MAX_NESTED_DEPTH, compileTools, synthesizeTools, type SynthesizeOptions } from './synthesize.js';
export { createLocalInvoker, type LocalInvokerOptions } from './local-invoker.js';
export { RemoteGraphQLClient, fetchRemoteSchema, type RemoteServerConfig } from './remote-client.js';
export { coerceNullLists, createRemoteInvoker, filterSuppliedVariables, pruneOperation } from './query-rewriter.js';
export { extractToolValue, shapeResponseValue, type ShapeOptions } from './response-shaping.js';
export { registerTools, toCallToolResult } from './register-tools.js';

// Shared utilities
export * from './shared-utils.js';
