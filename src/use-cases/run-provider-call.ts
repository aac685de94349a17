import {
    CallTimeoutError,
    TransientError,
    describeError,
} from "../entities/errors.js";
import type { ProviderCallContext } from "./provider-adapter.port.js";

export interface RetryPolicy {
    /** Attempts made after the first one fails. */
    readonly maxRetries: number;
    readonly timeoutMs: number;
    readonly initialDelayMs: number;
    readonly maxDelayMs: number;
}

export interface ProviderCallSuccess<T> {
    readonly ok: true;
    readonly value: T;
    readonly attempts: number;
}

export interface ProviderCallFailure {
    readonly ok: false;
    readonly cause: "transient" | "fatal";
    readonly reason: string;
    readonly attempts: number;
}

export type ProviderCallResult<T> = ProviderCallSuccess<T> | ProviderCallFailure;

export interface RetryLogger {
    warn(message: string): void;
}

export interface ProviderCallRunnerDeps {
    readonly policy: RetryPolicy;
    readonly sleep: (ms: number) => Promise<void>;
    readonly logger: RetryLogger;
}

export interface ProviderCallRunner {
    run<T>(
        operation: string,
        call: (context: ProviderCallContext) => Promise<T>,
    ): Promise<ProviderCallResult<T>>;
}

export function backoffDelay(policy: RetryPolicy, failures: number): number {
    const delay = policy.initialDelayMs * 2 ** Math.max(0, failures - 1);
    return Math.min(delay, policy.maxDelayMs);
}

async function withTimeout<T>(
    operation: string,
    timeoutMs: number,
    call: (context: ProviderCallContext) => Promise<T>,
): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new CallTimeoutError(operation, timeoutMs);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([
            call({ signal: controller.signal }),
            timeout,
        ]);
    } finally {
        clearTimeout(timer);
    }
}

export function createProviderCallRunner(
    deps: ProviderCallRunnerDeps,
): ProviderCallRunner {
    const { policy } = deps;
    const maxAttempts = policy.maxRetries + 1;

    return {
        async run<T>(
            operation: string,
            call: (context: ProviderCallContext) => Promise<T>,
        ): Promise<ProviderCallResult<T>> {
            for (let attempt = 1; ; attempt++) {
                try {
                    const value = await withTimeout(
                        operation,
                        policy.timeoutMs,
                        call,
                    );
                    return { ok: true, value, attempts: attempt };
                } catch (error) {
                    const reason = describeError(error);
                    if (!(error instanceof TransientError)) {
                        return {
                            ok: false,
                            cause: "fatal",
                            reason,
                            attempts: attempt,
                        };
                    }
                    if (attempt >= maxAttempts) {
                        return {
                            ok: false,
                            cause: "transient",
                            reason: `${reason} (gave up after ${attempt} attempt(s))`,
                            attempts: attempt,
                        };
                    }
                    const delay = backoffDelay(policy, attempt);
                    deps.logger.warn(
                        `${operation} failed (attempt ${attempt}/${maxAttempts}): ${reason}; retrying in ${delay}ms`,
                    );
                    await deps.sleep(delay);
                }
            }
        },
    };
}
