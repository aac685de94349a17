import { setTimeout as delay } from "node:timers/promises";
import type {
    Declaration,
    ParameterValue,
    Parameters,
} from "../entities/declaration.js";
import { identityOf } from "../entities/kind-requirements.js";
import {
    type FailureCause,
    type RecordedOutcome,
    UPSTREAM_FAILURE_REASON,
} from "../entities/outcome.js";
import {
    referenceKey,
    referencesIn,
    substituteReferences,
} from "../entities/references.js";
import type { DependencyGraph } from "./build-dependency-graph.js";
import {
    changedParameters,
    detectDrift,
    unknownValue,
} from "./detect-drift.js";
import { createOutcomeStore } from "./outcome-store.js";
import type { ProviderAdapter } from "./provider-adapter.port.js";
import {
    type ProviderCallFailure,
    type ProviderCallRunner,
    type RetryPolicy,
    createProviderCallRunner,
} from "./run-provider-call.js";

export interface ConvergeLogger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
}

export interface ConvergeOptions {
    readonly dryRun: boolean;
    readonly concurrency: number;
    readonly retry: RetryPolicy;
    readonly signal?: AbortSignal | undefined;
}

export interface ConvergenceResult {
    readonly outcomes: ReadonlyMap<string, RecordedOutcome>;
}

export interface ConvergenceEngine {
    converge(
        graph: DependencyGraph,
        adapter: ProviderAdapter,
        options: ConvergeOptions,
    ): Promise<ConvergenceResult>;
}

export interface ConvergenceEngineDeps {
    readonly logger: ConvergeLogger;
    readonly sleep?: ((ms: number) => Promise<void>) | undefined;
}

interface RunContext {
    readonly graph: DependencyGraph;
    readonly adapter: ProviderAdapter;
    readonly runner: ProviderCallRunner;
    readonly dryRun: boolean;
    readonly outcomeOf: (id: string) => RecordedOutcome | undefined;
    // Declarations as they were applied, with references substituted
    readonly applied: Map<string, Declaration>;
}

function failed(
    cause: FailureCause,
    reason: string,
    attempts: number,
): RecordedOutcome {
    return { outcome: { status: "failed", cause, reason }, attempts };
}

function fromCallFailure(
    failure: ProviderCallFailure,
    attemptsSoFar: number,
): RecordedOutcome {
    return failed(
        failure.cause,
        failure.reason,
        attemptsSoFar + failure.attempts,
    );
}

type ResolvedParameters =
    | {
          readonly ok: true;
          readonly parameters: Parameters;
          readonly attempts: number;
      }
    | { readonly ok: false; readonly recorded: RecordedOutcome };

async function resolveParameters(
    declaration: Declaration,
    ctx: RunContext,
): Promise<ResolvedParameters> {
    const refs = referencesIn(declaration.parameters);
    if (refs.length === 0) {
        return { ok: true, parameters: declaration.parameters, attempts: 0 };
    }

    const values = new Map<string, ParameterValue>();
    let attempts = 0;
    for (const ref of refs) {
        const key = referenceKey(ref);
        const status = ctx.outcomeOf(ref.declarationId)?.outcome.status;
        // A dry run never applies these, so the stored value is stale
        if (ctx.dryRun && (status === "created" || status === "updated")) {
            values.set(key, unknownValue(key));
            continue;
        }
        const target =
            ctx.applied.get(ref.declarationId) ??
            ctx.graph.get(ref.declarationId);
        if (!target) {
            return {
                ok: false,
                recorded: failed(
                    "fatal",
                    `reference to undeclared "${ref.declarationId}"`,
                    attempts,
                ),
            };
        }
        const result = await ctx.runner.run(`resolve ${key}`, (callCtx) =>
            ctx.adapter.resolve(target, ref.attribute, callCtx),
        );
        if (!result.ok) {
            return { ok: false, recorded: fromCallFailure(result, attempts) };
        }
        attempts += result.attempts;
        values.set(key, result.value);
    }

    const parameters: Record<string, ParameterValue> = {};
    for (const [name, value] of Object.entries(declaration.parameters)) {
        parameters[name] = substituteReferences(value, values);
    }
    return { ok: true, parameters, attempts };
}

async function convergeOne(
    declaration: Declaration,
    ctx: RunContext,
): Promise<RecordedOutcome> {
    const resolution = await resolveParameters(declaration, ctx);
    if (!resolution.ok) {
        return resolution.recorded;
    }
    const { parameters } = resolution;
    let attempts = resolution.attempts;
    ctx.applied.set(declaration.id, { ...declaration, parameters });

    const { kind } = declaration;
    const identity = identityOf(kind, parameters);
    const label = `${kind} "${declaration.id}"`;

    const lookup = await ctx.runner.run(`lookup ${label}`, (callCtx) =>
        ctx.adapter.lookup(kind, identity, callCtx),
    );
    if (!lookup.ok) {
        return fromCallFailure(lookup, attempts);
    }
    attempts += lookup.attempts;

    if (!lookup.value.exists) {
        if (!ctx.dryRun) {
            const create = await ctx.runner.run(`create ${label}`, (callCtx) =>
                ctx.adapter.create(kind, parameters, callCtx),
            );
            if (!create.ok) {
                return fromCallFailure(create, attempts);
            }
            attempts += create.attempts;
        }
        return { outcome: { status: "created" }, attempts };
    }

    const changes = detectDrift(parameters, lookup.value.parameters);
    if (changes.length === 0) {
        return { outcome: { status: "unchanged" }, attempts };
    }

    if (!ctx.dryRun) {
        const update = await ctx.runner.run(`update ${label}`, (callCtx) =>
            ctx.adapter.update(
                kind,
                identity,
                changedParameters(changes),
                callCtx,
            ),
        );
        if (!update.ok) {
            return fromCallFailure(update, attempts);
        }
        attempts += update.attempts;
    }
    return { outcome: { status: "updated", changes }, attempts };
}

function describeOutcome(id: string, recorded: RecordedOutcome): string {
    const { outcome } = recorded;
    switch (outcome.status) {
        case "failed":
            return `${id}: failed (${outcome.cause}) ${outcome.reason}`;
        case "updated": {
            const fields = outcome.changes.map((change) => change.field);
            return `${id}: updated ${fields.join(", ")}`;
        }
        default:
            return `${id}: ${outcome.status}`;
    }
}

export function createConvergenceEngine(
    deps: ConvergenceEngineDeps,
): ConvergenceEngine {
    const sleep = deps.sleep ?? ((ms: number) => delay(ms));
    const { logger } = deps;

    return {
        async converge(
            graph: DependencyGraph,
            adapter: ProviderAdapter,
            options: ConvergeOptions,
        ): Promise<ConvergenceResult> {
            const store = createOutcomeStore();
            const runner = createProviderCallRunner({
                policy: options.retry,
                sleep,
                logger,
            });
            const ctx: RunContext = {
                graph,
                adapter,
                runner,
                dryRun: options.dryRun,
                outcomeOf: (id) => store.get(id),
                applied: new Map(),
            };
            const concurrency = Math.max(1, options.concurrency);
            const isCancelled = () => options.signal?.aborted === true;

            const waiting = new Map<string, number>();
            const ready: Declaration[] = [];
            for (const declaration of graph.order) {
                const count = graph.dependenciesOf(declaration.id).length;
                waiting.set(declaration.id, count);
                if (count === 0) {
                    ready.push(declaration);
                }
            }

            const settle = (
                declaration: Declaration,
                recorded: RecordedOutcome,
            ): void => {
                store.record(declaration.id, recorded);
                const message = describeOutcome(declaration.id, recorded);
                if (recorded.outcome.status === "failed") {
                    logger.warn(message);
                } else if (recorded.outcome.status === "unchanged") {
                    logger.debug(message);
                } else {
                    logger.info(message);
                }

                for (const dependentId of graph.dependentsOf(declaration.id)) {
                    const left = (waiting.get(dependentId) ?? 0) - 1;
                    waiting.set(dependentId, left);
                    const dependent = graph.get(dependentId);
                    if (left === 0 && dependent) {
                        release(dependent);
                    }
                }
            };

            // Called once every dependency is terminal
            const release = (declaration: Declaration): void => {
                const upstreamFailed = graph
                    .dependenciesOf(declaration.id)
                    .some((id) => store.get(id)?.outcome.status === "failed");
                if (upstreamFailed) {
                    settle(
                        declaration,
                        failed("upstream", UPSTREAM_FAILURE_REASON, 0),
                    );
                    return;
                }
                const rank = graph.indexOf(declaration.id);
                const at = ready.findIndex(
                    (queued) => graph.indexOf(queued.id) > rank,
                );
                ready.splice(at === -1 ? ready.length : at, 0, declaration);
            };

            const inFlight = new Set<Promise<void>>();
            for (;;) {
                while (!isCancelled() && inFlight.size < concurrency) {
                    const next = ready.shift();
                    if (!next) {
                        break;
                    }
                    logger.debug(`${next.id}: converging ${next.kind}`);
                    const task: Promise<void> = convergeOne(next, ctx)
                        .then((recorded) => settle(next, recorded))
                        .finally(() => inFlight.delete(task));
                    inFlight.add(task);
                }
                if (inFlight.size === 0) {
                    break;
                }
                await Promise.race(inFlight);
            }

            if (isCancelled()) {
                for (const declaration of graph.order) {
                    if (!store.has(declaration.id)) {
                        store.record(declaration.id, {
                            outcome: { status: "cancelled" },
                            attempts: 0,
                        });
                    }
                }
                logger.warn(
                    "Convergence cancelled; pending declarations were not dispatched",
                );
            }

            return { outcomes: store.snapshot() };
        },
    };
}
