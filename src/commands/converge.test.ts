import { readFile } from "node:fs/promises";
import { describe, expect, it, vi } from "vitest";
import {
    createLocalCloudProvider,
    openLocalCloudSession,
} from "../gateways/local-cloud-provider.js";
import { buildManifestJson } from "../lib/test-manifest-builder.js";
import { createDependencyGraphBuilder } from "../use-cases/build-dependency-graph.js";
import { createRunReportBuilder } from "../use-cases/build-run-report.js";
import { createConvergenceEngine } from "../use-cases/converge-declarations.js";
import { createConvergeConfigParser } from "../use-cases/parse-converge-config.js";
import { createManifestParser } from "../use-cases/parse-manifest.js";
import type { ProviderSession } from "../use-cases/provider-adapter.port.js";
import { createTemplateVariableResolver } from "../use-cases/resolve-template-variables.js";
import { createRunReportSerializer } from "../use-cases/serialize-run-report.js";
import {
    EXIT_FAILED,
    EXIT_INVALID_INPUT,
    EXIT_SUCCESS,
    type ConvergeCommandDeps,
    createConvergeCommand,
} from "./converge.js";

vi.mock("node:fs/promises");

const ZONE_AND_RECORD = buildManifestJson([
    { id: "zone", kind: "Zone" },
    { id: "www", kind: "Record", requires: ["zone"] },
]);

function buildCommand(overrides: Partial<ConvergeCommandDeps> = {}) {
    const provider = createLocalCloudProvider();
    const persist = vi.fn(async () => {});
    const openProvider = vi.fn(
        async (_statePath: string | undefined): Promise<ProviderSession> => ({
            adapter: provider,
            persist,
        }),
    );
    const command = createConvergeCommand({
        configParser: createConvergeConfigParser(),
        manifestParser: createManifestParser({
            resolver: createTemplateVariableResolver(),
        }),
        graphBuilder: createDependencyGraphBuilder(),
        engine: createConvergenceEngine({
            logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn() },
            sleep: async () => {},
        }),
        reportBuilder: createRunReportBuilder(),
        serializer: createRunReportSerializer(),
        openProvider,
        ...overrides,
    });
    return { command, provider, persist, openProvider };
}

function buildConsole() {
    return { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("ConvergeCommand", () => {
    describe("given a manifest of missing resources", () => {
        it("should create them, persist state and exit 0", async () => {
            // Arrange
            vi.mocked(readFile).mockResolvedValue(ZONE_AND_RECORD);
            const { command, persist, openProvider } = buildCommand();
            const mockConsole = buildConsole();

            // Act
            const result = await command.execute(
                { manifestPath: "manifest.json", statePath: "state.json" },
                mockConsole,
            );

            // Assert
            expect(result.exitCode).toBe(EXIT_SUCCESS);
            expect(result.report?.counts.created).toBe(2);
            expect(openProvider).toHaveBeenCalledWith("state.json");
            expect(persist).toHaveBeenCalledTimes(1);
            expect(mockConsole.info).toHaveBeenCalledWith(
                "2 created, 0 updated, 0 unchanged, 0 failed, 0 cancelled",
            );
        });

        it("should log the serialized run report", async () => {
            // Arrange
            vi.mocked(readFile).mockResolvedValue(ZONE_AND_RECORD);
            const { command } = buildCommand();
            const output: string[] = [];
            const mockConsole = {
                ...buildConsole(),
                log: (msg: string) => output.push(msg),
            };

            // Act
            await command.execute({ manifestPath: "manifest.json" }, mockConsole);

            // Assert
            const parsed = JSON.parse(output[0] ?? "{}");
            expect(parsed.success).toBe(true);
            expect(parsed.outcomes).toEqual([
                { id: "zone", kind: "Zone", status: "created", attempts: 2 },
                { id: "www", kind: "Record", status: "created", attempts: 2 },
            ]);
        });
    });

    describe("given a dry run", () => {
        it("should neither create nor persist", async () => {
            // Arrange
            vi.mocked(readFile).mockResolvedValue(ZONE_AND_RECORD);
            const { command, persist, provider } = buildCommand();
            const mockConsole = buildConsole();

            // Act
            const result = await command.execute(
                { manifestPath: "manifest.json", dryRun: true },
                mockConsole,
            );

            // Assert
            expect(result.exitCode).toBe(EXIT_SUCCESS);
            expect(result.report?.dryRun).toBe(true);
            expect(persist).not.toHaveBeenCalled();
            expect(provider.snapshot().resources).toEqual([]);
            expect(mockConsole.info).toHaveBeenCalledWith(
                "Dry run: 2 created, 0 updated, 0 unchanged, 0 failed, 0 cancelled",
            );
        });
    });

    describe("given a declaration the provider rejects", () => {
        it("should exit 1 and warn with the summary", async () => {
            // Arrange
            vi.mocked(readFile).mockResolvedValue(
                buildManifestJson([
                    {
                        id: "zone",
                        kind: "Zone",
                        parameters: {
                            name: "example.test",
                            email_address: "hostmaster@example.test",
                            ttl: 60,
                        },
                    },
                    { id: "www", kind: "Record", requires: ["zone"] },
                ]),
            );
            const { command, persist } = buildCommand();
            const mockConsole = buildConsole();

            // Act
            const result = await command.execute(
                { manifestPath: "manifest.json" },
                mockConsole,
            );

            // Assert
            expect(result.exitCode).toBe(EXIT_FAILED);
            expect(persist).toHaveBeenCalledTimes(1);
            expect(mockConsole.warn).toHaveBeenCalledWith(
                "0 created, 0 updated, 0 unchanged, 2 failed, 0 cancelled",
            );
        });
    });

    describe("given a cancelled run", () => {
        it("should exit 1 and report the cancelled declarations", async () => {
            // Arrange
            vi.mocked(readFile).mockResolvedValue(ZONE_AND_RECORD);
            const { command } = buildCommand();
            const mockConsole = buildConsole();
            const controller = new AbortController();
            controller.abort();

            // Act
            const result = await command.execute(
                { manifestPath: "manifest.json", signal: controller.signal },
                mockConsole,
            );

            // Assert
            expect(result.exitCode).toBe(EXIT_FAILED);
            expect(result.report?.cancelled).toBe(true);
            expect(mockConsole.warn).toHaveBeenCalledWith(
                "0 created, 0 updated, 0 unchanged, 0 failed, 2 cancelled",
            );
        });
    });

    describe("given input that fails before any provider call", () => {
        it("should exit 2 on a dependency cycle", async () => {
            // Arrange
            vi.mocked(readFile).mockResolvedValue(
                buildManifestJson([
                    { id: "a", kind: "Container", requires: ["b"] },
                    { id: "b", kind: "Container", requires: ["a"] },
                ]),
            );
            const { command, openProvider } = buildCommand();
            const mockConsole = buildConsole();

            // Act
            const result = await command.execute(
                { manifestPath: "manifest.json" },
                mockConsole,
            );

            // Assert
            expect(result).toEqual({
                exitCode: EXIT_INVALID_INPUT,
                report: null,
            });
            expect(mockConsole.error).toHaveBeenCalledWith(
                "Cyclic dependency: a -> b -> a",
            );
            expect(openProvider).not.toHaveBeenCalled();
        });

        it("should exit 2 when the manifest cannot be read", async () => {
            // Arrange
            vi.mocked(readFile).mockRejectedValue(
                new Error("ENOENT: no such file or directory"),
            );
            const { command } = buildCommand();
            const mockConsole = buildConsole();

            // Act
            const result = await command.execute(
                { manifestPath: "missing.json" },
                mockConsole,
            );

            // Assert
            expect(result.exitCode).toBe(EXIT_INVALID_INPUT);
            expect(mockConsole.error).toHaveBeenCalledWith(
                'Could not read manifest "missing.json": ENOENT: no such file or directory',
            );
        });

        it("should exit 2 when the state file is not valid JSON", async () => {
            // Arrange
            vi.mocked(readFile)
                .mockResolvedValueOnce(ZONE_AND_RECORD)
                .mockResolvedValueOnce("{ not json");
            const engine = {
                converge: vi.fn(),
            };
            const { command } = buildCommand({
                openProvider: openLocalCloudSession,
                engine,
            });
            const mockConsole = buildConsole();

            // Act
            const result = await command.execute(
                { manifestPath: "manifest.json", statePath: "state.json" },
                mockConsole,
            );

            // Assert
            expect(result).toEqual({
                exitCode: EXIT_INVALID_INPUT,
                report: null,
            });
            expect(mockConsole.error).toHaveBeenCalledWith(
                expect.stringMatching(/^Invalid state file state\.json: /),
            );
            expect(engine.converge).not.toHaveBeenCalled();
        });

        it("should exit 2 on an invalid command-line override", async () => {
            vi.mocked(readFile).mockResolvedValue(ZONE_AND_RECORD);
            const { command } = buildCommand();
            const mockConsole = buildConsole();

            const result = await command.execute(
                { manifestPath: "manifest.json", concurrency: "0" },
                mockConsole,
            );

            expect(result.exitCode).toBe(EXIT_INVALID_INPUT);
            expect(mockConsole.error).toHaveBeenCalledWith(
                '--concurrency must be an integer of at least 1, got "0"',
            );
        });
    });

    describe("given a configuration file", () => {
        it("should substitute its template variables into the manifest", async () => {
            // Arrange
            vi.mocked(readFile)
                .mockResolvedValueOnce(
                    JSON.stringify({
                        template_variables: { domain: "staging.example.test" },
                    }),
                )
                .mockResolvedValueOnce(
                    buildManifestJson([
                        {
                            id: "zone",
                            kind: "Zone",
                            parameters: {
                                // biome-ignore lint/suspicious/noTemplateCurlyInString: manifest placeholder for testing
                                name: "${domain}",
                                email_address: "hostmaster@example.test",
                            },
                        },
                    ]),
                );
            const { command, provider } = buildCommand();
            const mockConsole = buildConsole();

            // Act
            const result = await command.execute(
                { manifestPath: "manifest.json", configPath: "config.json" },
                mockConsole,
            );

            // Assert
            expect(result.exitCode).toBe(EXIT_SUCCESS);
            expect(provider.snapshot().resources[0]?.parameters.name).toBe(
                "staging.example.test",
            );
        });
    });

    describe("given a manifest with unsafe keys", () => {
        it("should warn about each ignored key", async () => {
            vi.mocked(readFile).mockResolvedValue(
                '{"declarations":[{"id":"cdn","kind":"Container","parameters":{"name":"a"},"constructor":{}}]}',
            );
            const { command } = buildCommand();
            const mockConsole = buildConsole();

            await command.execute({ manifestPath: "manifest.json" }, mockConsole);

            expect(mockConsole.warn).toHaveBeenCalledWith(
                "Ignored unsafe manifest key at $.declarations[0].constructor",
            );
        });
    });
});
