import { readFile } from "node:fs/promises";
import { describe, expect, it, vi } from "vitest";
import { buildManifestJson } from "../lib/test-manifest-builder.js";
import { createDependencyGraphBuilder } from "../use-cases/build-dependency-graph.js";
import { createConvergeConfigParser } from "../use-cases/parse-converge-config.js";
import { createManifestParser } from "../use-cases/parse-manifest.js";
import { createTemplateVariableResolver } from "../use-cases/resolve-template-variables.js";
import { EXIT_INVALID_INPUT, EXIT_SUCCESS } from "./converge.js";
import { createGraphCommand } from "./graph.js";

vi.mock("node:fs/promises");

function buildCommand() {
    return createGraphCommand({
        configParser: createConvergeConfigParser(),
        manifestParser: createManifestParser({
            resolver: createTemplateVariableResolver(),
        }),
        graphBuilder: createDependencyGraphBuilder(),
    });
}

function buildConsole() {
    return { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("GraphCommand", () => {
    describe("given a valid manifest", () => {
        it("should print declarations in convergence order", async () => {
            // Arrange
            vi.mocked(readFile).mockResolvedValue(
                buildManifestJson([
                    { id: "www", kind: "Record", requires: ["zone"] },
                    { id: "zone", kind: "Zone" },
                ]),
            );
            const output: string[] = [];
            const mockConsole = {
                ...buildConsole(),
                log: (msg: string) => output.push(msg),
            };

            // Act
            const result = await buildCommand().execute(
                { manifestPath: "manifest.json" },
                mockConsole,
            );

            // Assert
            expect(result.exitCode).toBe(EXIT_SUCCESS);
            expect(JSON.parse(output[0] ?? "{}")).toEqual({
                order: [
                    { id: "zone", kind: "Zone", requires: [] },
                    { id: "www", kind: "Record", requires: ["zone"] },
                ],
            });
        });

        it("should include dependencies implied by references", async () => {
            vi.mocked(readFile).mockResolvedValue(
                buildManifestJson([
                    { id: "cdn", kind: "Container" },
                    {
                        id: "alias",
                        kind: "Record",
                        parameters: {
                            zone_name: "example.test",
                            record_type: "CNAME",
                            data: "{{ cdn.cdn_uri }}",
                        },
                    },
                ]),
            );

            const result = await buildCommand().execute(
                { manifestPath: "manifest.json" },
                buildConsole(),
            );

            expect(result.order[1]).toEqual({
                id: "alias",
                kind: "Record",
                requires: ["cdn"],
            });
        });
    });

    describe("given a dependency that is not declared", () => {
        it("should exit 2 with the error", async () => {
            // Arrange
            vi.mocked(readFile).mockResolvedValue(
                buildManifestJson([
                    { id: "www", kind: "Record", requires: ["zone"] },
                ]),
            );
            const mockConsole = buildConsole();

            // Act
            const result = await buildCommand().execute(
                { manifestPath: "manifest.json" },
                mockConsole,
            );

            // Assert
            expect(result).toEqual({ exitCode: EXIT_INVALID_INPUT, order: [] });
            expect(mockConsole.error).toHaveBeenCalledWith(
                'Unresolved dependency: "www" requires "zone", which is not declared',
            );
        });
    });
});
