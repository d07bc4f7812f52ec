export type GraphQLMcpErrorKind =
    | 'compile-time-config'
    | 'validation'
    | 'remote-introspection'
    | 'remote-execution'
    | 'local-execution';

export abstract class GraphQLMcpError extends Error {
    abstract readonly kind: GraphQLMcpErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Raised while compiling tools; the schema cannot be exposed as declared.
 */
export class CompileTimeConfigError extends GraphQLMcpError {
    readonly kind = 'compile-time-config';
}

export class ValidationError extends GraphQLMcpError {
    readonly kind = 'validation';

    constructor(message: string, readonly issues: string[] = []) {
        super(message);
    }
}

export class RemoteIntrospectionError extends GraphQLMcpError {
    readonly kind = 'remote-introspection';
}

export class RemoteExecutionError extends GraphQLMcpError {
    readonly kind = 'remote-execution';

    constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class LocalExecutionError extends GraphQLMcpError {
    readonly kind = 'local-execution';
}

export function toErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return String(error);
}
