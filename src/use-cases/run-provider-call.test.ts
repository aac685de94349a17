import { describe, expect, it, vi } from "vitest";
import { FatalError, TransientError } from "../entities/errors.js";
import type { ProviderCallContext } from "./provider-adapter.port.js";
import {
    type RetryPolicy,
    backoffDelay,
    createProviderCallRunner,
} from "./run-provider-call.js";

const POLICY: RetryPolicy = {
    maxRetries: 3,
    timeoutMs: 1000,
    initialDelayMs: 100,
    maxDelayMs: 250,
};

function buildRunner(policy: RetryPolicy = POLICY) {
    const sleep = vi.fn(async (_ms: number) => {});
    const warn = vi.fn();
    const runner = createProviderCallRunner({
        policy,
        sleep,
        logger: { warn },
    });
    return { runner, sleep, warn };
}

describe("backoffDelay", () => {
    it("should double the delay per failure up to the cap", () => {
        expect(backoffDelay(POLICY, 1)).toBe(100);
        expect(backoffDelay(POLICY, 2)).toBe(200);
        expect(backoffDelay(POLICY, 3)).toBe(250);
    });
});

describe("ProviderCallRunner", () => {
    describe("given a call that succeeds", () => {
        it("should return the value after one attempt", async () => {
            // Arrange
            const { runner, sleep } = buildRunner();

            // Act
            const result = await runner.run("lookup", async () => "found");

            // Assert
            expect(result).toEqual({ ok: true, value: "found", attempts: 1 });
            expect(sleep).not.toHaveBeenCalled();
        });
    });

    describe("given transient failures followed by success", () => {
        it("should retry with backoff and count every attempt", async () => {
            // Arrange
            const { runner, sleep, warn } = buildRunner();
            const call = vi
                .fn<(context: ProviderCallContext) => Promise<string>>()
                .mockRejectedValueOnce(new TransientError("rate limited"))
                .mockRejectedValueOnce(new TransientError("rate limited"))
                .mockResolvedValueOnce("found");

            // Act
            const result = await runner.run('lookup Zone "zone"', call);

            // Assert
            expect(result).toEqual({ ok: true, value: "found", attempts: 3 });
            expect(sleep.mock.calls).toEqual([[100], [200]]);
            expect(warn).toHaveBeenNthCalledWith(
                1,
                'lookup Zone "zone" failed (attempt 1/4): rate limited; retrying in 100ms',
            );
        });
    });

    describe("given transient failures beyond the retry limit", () => {
        it("should give up after the last allowed attempt", async () => {
            // Arrange
            const { runner, sleep } = buildRunner({ ...POLICY, maxRetries: 2 });
            const call = vi.fn(async () => {
                throw new TransientError("service unavailable");
            });

            // Act
            const result = await runner.run("create", call);

            // Assert
            expect(result).toEqual({
                ok: false,
                cause: "transient",
                reason: "service unavailable (gave up after 3 attempt(s))",
                attempts: 3,
            });
            expect(call).toHaveBeenCalledTimes(3);
            expect(sleep).toHaveBeenCalledTimes(2);
        });

        it("should make a single attempt when retries are disabled", async () => {
            const { runner } = buildRunner({ ...POLICY, maxRetries: 0 });

            const result = await runner.run("create", async () => {
                throw new TransientError("busy");
            });

            expect(result).toEqual({
                ok: false,
                cause: "transient",
                reason: "busy (gave up after 1 attempt(s))",
                attempts: 1,
            });
        });
    });

    describe("given a fatal failure", () => {
        it("should stop without retrying", async () => {
            // Arrange
            const { runner, sleep } = buildRunner();
            const call = vi.fn(async () => {
                throw new FatalError("ttl has a minimum value of 300");
            });

            // Act
            const result = await runner.run("create", call);

            // Assert
            expect(result).toEqual({
                ok: false,
                cause: "fatal",
                reason: "ttl has a minimum value of 300",
                attempts: 1,
            });
            expect(call).toHaveBeenCalledTimes(1);
            expect(sleep).not.toHaveBeenCalled();
        });

        it("should treat unexpected errors as fatal", async () => {
            const { runner } = buildRunner();

            const result = await runner.run("resolve", async () => {
                throw new TypeError("boom");
            });

            expect(result).toMatchObject({ ok: false, cause: "fatal" });
        });
    });

    describe("given a call that outlives its timeout", () => {
        it("should abort the call and treat the timeout as transient", async () => {
            // Arrange
            const { runner } = buildRunner({
                ...POLICY,
                maxRetries: 1,
                timeoutMs: 20,
            });
            const signals: AbortSignal[] = [];
            const call = (context: ProviderCallContext) => {
                signals.push(context.signal);
                return new Promise<string>(() => {});
            };

            // Act
            const result = await runner.run('lookup Zone "zone"', call);

            // Assert
            expect(result).toEqual({
                ok: false,
                cause: "transient",
                reason: 'lookup Zone "zone" timed out after 20ms (gave up after 2 attempt(s))',
                attempts: 2,
            });
            expect(signals).toHaveLength(2);
            expect(signals.every((signal) => signal.aborted)).toBe(true);
        });
    });
});
