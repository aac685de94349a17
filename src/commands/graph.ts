import { defineCommand } from "citty";
import { consola } from "consola";
import type { ResourceKind } from "../entities/declaration.js";
import { isPreRunError } from "../entities/errors.js";
import type { DependencyGraphBuilder } from "../use-cases/build-dependency-graph.js";
import type { ConvergeConfigParser } from "../use-cases/parse-converge-config.js";
import type { ManifestParser } from "../use-cases/parse-manifest.js";
import {
    type ConsoleOutput,
    EXIT_INVALID_INPUT,
    EXIT_SUCCESS,
    prepareRun,
} from "./converge.js";

export interface GraphCommandDeps {
    readonly configParser: ConvergeConfigParser;
    readonly manifestParser: ManifestParser;
    readonly graphBuilder: DependencyGraphBuilder;
}

export interface GraphCommandOptions {
    readonly manifestPath: string;
    readonly configPath?: string | undefined;
}

export interface GraphEntry {
    readonly id: string;
    readonly kind: ResourceKind;
    readonly requires: readonly string[];
}

export interface GraphCommandResult {
    readonly exitCode: typeof EXIT_SUCCESS | typeof EXIT_INVALID_INPUT;
    readonly order: readonly GraphEntry[];
}

export interface GraphCommand {
    execute(
        options: GraphCommandOptions,
        console: ConsoleOutput,
    ): Promise<GraphCommandResult>;
}

export function createGraphCommand(deps: GraphCommandDeps): GraphCommand {
    return {
        async execute(
            options: GraphCommandOptions,
            output: ConsoleOutput,
        ): Promise<GraphCommandResult> {
            try {
                const { graph } = await prepareRun(deps, options, output);
                const order = graph.order.map((declaration) => ({
                    id: declaration.id,
                    kind: declaration.kind,
                    requires: graph.dependenciesOf(declaration.id),
                }));
                output.log(JSON.stringify({ order }, null, 2));
                return { exitCode: EXIT_SUCCESS, order };
            } catch (error) {
                if (isPreRunError(error)) {
                    output.error(error.message);
                    return { exitCode: EXIT_INVALID_INPUT, order: [] };
                }
                throw error;
            }
        },
    };
}

export function createGraphCittyCommand(deps: GraphCommandDeps) {
    const graphCommand = createGraphCommand(deps);

    return defineCommand({
        meta: {
            name: "graph",
            description:
                "Print the order in which a manifest's declarations converge",
        },
        args: {
            manifest: {
                type: "string",
                description: "Path to the manifest JSON file",
                required: true,
            },
            config: {
                type: "string",
                description: "Path to a configuration JSON file",
            },
        },
        async run({ args }) {
            const result = await graphCommand.execute(
                {
                    manifestPath: args.manifest,
                    configPath: args.config ? args.config : undefined,
                },
                {
                    log: (msg) => consola.log(msg),
                    info: (msg) => consola.info(msg),
                    warn: (msg) => consola.warn(msg),
                    error: (msg) => consola.error(msg),
                },
            );
            process.exitCode = result.exitCode;
        },
    });
}
