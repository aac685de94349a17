export class MalformedDeclarationError extends Error {
    override readonly name = "MalformedDeclarationError";

    constructor(
        readonly declarationId: string | null,
        detail: string,
    ) {
        super(
            declarationId === null
                ? `Malformed declaration: ${detail}`
                : `Malformed declaration "${declarationId}": ${detail}`,
        );
    }
}

export class UnresolvedDependencyError extends Error {
    override readonly name = "UnresolvedDependencyError";

    constructor(
        readonly declarationId: string,
        readonly missingId: string,
    ) {
        super(
            `Unresolved dependency: "${declarationId}" requires "${missingId}", which is not declared`,
        );
    }
}

export class CyclicDependencyError extends Error {
    override readonly name = "CyclicDependencyError";

    constructor(readonly cycle: readonly string[]) {
        super(`Cyclic dependency: ${cycle.join(" -> ")}`);
    }

    get member(): string {
        return this.cycle[0] ?? "";
    }
}

export class ConfigurationError extends Error {
    override readonly name = "ConfigurationError";
}

/** Raised by provider adapters for failures worth retrying. */
export class TransientError extends Error {
    override readonly name: string = "TransientError";
}

/** Raised by provider adapters for permanent rejections. */
export class FatalError extends Error {
    override readonly name = "FatalError";
}

export class CallTimeoutError extends TransientError {
    override readonly name = "CallTimeoutError";

    constructor(
        readonly operation: string,
        readonly timeoutMs: number,
    ) {
        super(`${operation} timed out after ${timeoutMs}ms`);
    }
}

export type PreRunError =
    | MalformedDeclarationError
    | UnresolvedDependencyError
    | CyclicDependencyError
    | ConfigurationError;

export function isPreRunError(error: unknown): error is PreRunError {
    return (
        error instanceof MalformedDeclarationError ||
        error instanceof UnresolvedDependencyError ||
        error instanceof CyclicDependencyError ||
        error instanceof ConfigurationError
    );
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
