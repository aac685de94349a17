#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import { consola } from "consola";
import { createConvergeCittyCommand } from "./commands/converge.js";
import { createGraphCittyCommand } from "./commands/graph.js";
import { openLocalCloudSession } from "./gateways/local-cloud-provider.js";
import { createDependencyGraphBuilder } from "./use-cases/build-dependency-graph.js";
import { createRunReportBuilder } from "./use-cases/build-run-report.js";
import { createConvergenceEngine } from "./use-cases/converge-declarations.js";
import { createConvergeConfigParser } from "./use-cases/parse-converge-config.js";
import { createManifestParser } from "./use-cases/parse-manifest.js";
import { createTemplateVariableResolver } from "./use-cases/resolve-template-variables.js";
import { createRunReportSerializer } from "./use-cases/serialize-run-report.js";

const configParser = createConvergeConfigParser();
const manifestParser = createManifestParser({
    resolver: createTemplateVariableResolver(),
});
const graphBuilder = createDependencyGraphBuilder();

const converge = createConvergeCittyCommand({
    configParser,
    manifestParser,
    graphBuilder,
    engine: createConvergenceEngine({
        logger: {
            debug: (msg) => consola.debug(msg),
            info: (msg) => consola.info(msg),
            warn: (msg) => consola.warn(msg),
        },
    }),
    reportBuilder: createRunReportBuilder(),
    serializer: createRunReportSerializer(),
    openProvider: openLocalCloudSession,
});

const graph = createGraphCittyCommand({
    configParser,
    manifestParser,
    graphBuilder,
});

const main = defineCommand({
    meta: {
        name: "tidemark",
        description:
            "Converge DNS zones and records, databases and CDN containers to a declarative manifest",
    },
    subCommands: {
        converge,
        graph,
    },
});

await runMain(main);
