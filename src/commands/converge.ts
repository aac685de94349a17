import { readFile } from "node:fs/promises";
import { defineCommand } from "citty";
import { consola } from "consola";
import type { ConvergeConfig } from "../entities/converge-config.js";
import { ConfigurationError, isPreRunError } from "../entities/errors.js";
import type { RunReport } from "../entities/run-report.js";
import type {
    DependencyGraph,
    DependencyGraphBuilder,
} from "../use-cases/build-dependency-graph.js";
import type { RunReportBuilder } from "../use-cases/build-run-report.js";
import type { ConvergenceEngine } from "../use-cases/converge-declarations.js";
import type { ConvergeConfigParser } from "../use-cases/parse-converge-config.js";
import type { ManifestParser } from "../use-cases/parse-manifest.js";
import type {
    ProviderSession,
    ProviderSessionFactory,
} from "../use-cases/provider-adapter.port.js";
import type { RunReportSerializer } from "../use-cases/serialize-run-report.js";

export interface ConsoleOutput {
    log(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface ConvergeCommandDeps {
    readonly configParser: ConvergeConfigParser;
    readonly manifestParser: ManifestParser;
    readonly graphBuilder: DependencyGraphBuilder;
    readonly engine: ConvergenceEngine;
    readonly reportBuilder: RunReportBuilder;
    readonly serializer: RunReportSerializer;
    readonly openProvider: ProviderSessionFactory;
}

export interface ConvergeCommandOptions {
    readonly manifestPath: string;
    readonly statePath?: string | undefined;
    readonly configPath?: string | undefined;
    readonly dryRun?: boolean | undefined;
    readonly maxRetries?: string | undefined;
    readonly timeout?: string | undefined;
    readonly concurrency?: string | undefined;
    readonly signal?: AbortSignal | undefined;
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILED = 1;
export const EXIT_INVALID_INPUT = 2;

export type ConvergeExitCode =
    | typeof EXIT_SUCCESS
    | typeof EXIT_FAILED
    | typeof EXIT_INVALID_INPUT;

export interface ConvergeCommandResult {
    readonly exitCode: ConvergeExitCode;
    readonly report: RunReport | null;
}

export interface ConvergeCommand {
    execute(
        options: ConvergeCommandOptions,
        console: ConsoleOutput,
    ): Promise<ConvergeCommandResult>;
}

export interface PreparedRun {
    readonly config: ConvergeConfig;
    readonly graph: DependencyGraph;
}

async function readInput(label: string, path: string): Promise<string> {
    try {
        return await readFile(path, "utf-8");
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(
            `Could not read ${label} "${path}": ${message}`,
        );
    }
}

/**
 * Loads configuration and the manifest and builds the dependency graph.
 * Every failure here happens before any provider call.
 */
export async function prepareRun(
    deps: Pick<
        ConvergeCommandDeps,
        "configParser" | "manifestParser" | "graphBuilder"
    >,
    options: Pick<
        ConvergeCommandOptions,
        "manifestPath" | "configPath" | "maxRetries" | "timeout" | "concurrency"
    >,
    output: Pick<ConsoleOutput, "warn">,
): Promise<PreparedRun> {
    const baseConfig =
        options.configPath === undefined
            ? deps.configParser.defaults()
            : deps.configParser.parse(
                  await readInput("configuration", options.configPath),
              );
    const config = deps.configParser.applyOverrides(baseConfig, {
        maxRetries: options.maxRetries,
        timeout: options.timeout,
        concurrency: options.concurrency,
    });

    const manifest = deps.manifestParser.parseDocument(
        await readInput("manifest", options.manifestPath),
        config.templateVariables,
    );
    for (const warning of manifest.warnings) {
        output.warn(warning);
    }

    return { config, graph: deps.graphBuilder.build(manifest.declarations) };
}

export function createConvergeCommand(
    deps: ConvergeCommandDeps,
): ConvergeCommand {
    return {
        async execute(
            options: ConvergeCommandOptions,
            output: ConsoleOutput,
        ): Promise<ConvergeCommandResult> {
            let prepared: PreparedRun;
            let session: ProviderSession;
            try {
                prepared = await prepareRun(deps, options, output);
                // An unreadable state file is input error too
                session = await deps.openProvider(options.statePath);
            } catch (error) {
                if (isPreRunError(error)) {
                    output.error(error.message);
                    return { exitCode: EXIT_INVALID_INPUT, report: null };
                }
                throw error;
            }

            const { config, graph } = prepared;
            const dryRun = options.dryRun ?? false;

            const result = await deps.engine.converge(graph, session.adapter, {
                dryRun,
                concurrency: config.concurrency,
                retry: {
                    maxRetries: config.maxRetries,
                    timeoutMs: config.timeoutMs,
                    initialDelayMs: config.backoff.initialDelayMs,
                    maxDelayMs: config.backoff.maxDelayMs,
                },
                signal: options.signal,
            });

            if (!dryRun) {
                await session.persist();
            }

            const report = deps.reportBuilder.build(
                graph.order,
                result.outcomes,
                { dryRun },
            );
            output.log(deps.serializer.serialize(report));

            const summary = deps.serializer.summarize(report);
            if (report.success && !report.cancelled) {
                output.info(summary);
                return { exitCode: EXIT_SUCCESS, report };
            }
            output.warn(summary);
            return { exitCode: EXIT_FAILED, report };
        },
    };
}

function optionalArg(value: string | undefined): string | undefined {
    return value === undefined || value === "" ? undefined : value;
}

export function createConvergeCittyCommand(deps: ConvergeCommandDeps) {
    const convergeCommand = createConvergeCommand(deps);

    return defineCommand({
        meta: {
            name: "converge",
            description:
                "Converge cloud resources to the state declared in a manifest",
        },
        args: {
            manifest: {
                type: "string",
                description: "Path to the manifest JSON file",
                required: true,
            },
            state: {
                type: "string",
                description:
                    "Path to the local cloud state file (created when missing)",
            },
            config: {
                type: "string",
                description: "Path to a configuration JSON file",
            },
            "dry-run": {
                type: "boolean",
                description: "Look up current state without creating or updating",
                default: false,
            },
            "max-retries": {
                type: "string",
                description: "Retries per provider call for transient failures",
            },
            timeout: {
                type: "string",
                description: "Per-call timeout, e.g. 500ms, 30s or 2m",
            },
            concurrency: {
                type: "string",
                description: "Declarations converged at the same time",
            },
            verbose: {
                type: "boolean",
                description: "Log every declaration, including unchanged ones",
                default: false,
            },
        },
        async run({ args }) {
            if (args.verbose) {
                consola.level = 4;
            }

            const controller = new AbortController();
            const onInterrupt = () => {
                consola.warn(
                    "Interrupted; waiting for in-flight operations to finish",
                );
                controller.abort();
            };
            process.once("SIGINT", onInterrupt);

            try {
                const result = await convergeCommand.execute(
                    {
                        manifestPath: args.manifest,
                        statePath: optionalArg(args.state),
                        configPath: optionalArg(args.config),
                        dryRun: args["dry-run"],
                        maxRetries: optionalArg(args["max-retries"]),
                        timeout: optionalArg(args.timeout),
                        concurrency: optionalArg(args.concurrency),
                        signal: controller.signal,
                    },
                    {
                        log: (msg) => consola.log(msg),
                        info: (msg) => consola.info(msg),
                        warn: (msg) => consola.warn(msg),
                        error: (msg) => consola.error(msg),
                    },
                );
                process.exitCode = result.exitCode;
            } finally {
                process.off("SIGINT", onInterrupt);
            }
        },
    });
}
