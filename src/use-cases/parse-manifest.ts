import { ZodError } from "zod";
import {
    type Declaration,
    type ParameterValue,
    type RawDeclaration,
    isParameterValue,
    isResourceKind,
} from "../entities/declaration.js";
import { MalformedDeclarationError } from "../entities/errors.js";
import {
    extraRequirements,
    requirementFor,
} from "../entities/kind-requirements.js";
import { referencesIn } from "../entities/references.js";
import { stripDangerousKeys } from "../entities/sanitize-json.js";
import { type ManifestInput, ManifestSchema } from "./manifest.schema.js";
import type { TemplateVariableResolver } from "./resolve-template-variables.js";

export interface ManifestParseResult {
    readonly declarations: readonly Declaration[];
    readonly warnings: readonly string[];
}

export interface ManifestParser {
    parse(records: readonly RawDeclaration[]): readonly Declaration[];
    parseDocument(
        jsonString: string,
        templateVariables: Readonly<Record<string, string>>,
    ): ManifestParseResult;
}

export interface ManifestParserDeps {
    readonly resolver: TemplateVariableResolver;
}

function parseJson(jsonString: string): unknown {
    try {
        return JSON.parse(jsonString);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new MalformedDeclarationError(
            null,
            `manifest is not valid JSON (${message})`,
        );
    }
}

function validateManifest(data: unknown): ManifestInput {
    try {
        return ManifestSchema.parse(data);
    } catch (error) {
        if (error instanceof ZodError) {
            const details = error.issues
                .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                .join("; ");
            throw new MalformedDeclarationError(null, details);
        }
        throw error;
    }
}

function toParameters(
    record: RawDeclaration,
): Readonly<Record<string, ParameterValue>> {
    const parameters: Record<string, ParameterValue> = {};
    for (const [name, value] of Object.entries(record.parameters)) {
        if (!isParameterValue(value)) {
            throw new MalformedDeclarationError(
                record.id,
                `parameter "${name}" must be a string, boolean or integer`,
            );
        }
        parameters[name] = value;
    }
    return Object.freeze(parameters);
}

function toRequires(
    record: RawDeclaration,
    parameters: Readonly<Record<string, ParameterValue>>,
): readonly string[] {
    const requires: string[] = [];
    for (const dependency of record.requires) {
        if (dependency.trim() === "") {
            throw new MalformedDeclarationError(
                record.id,
                "dependency identifier must not be empty",
            );
        }
        if (dependency === record.id) {
            throw new MalformedDeclarationError(
                record.id,
                "declaration cannot require itself",
            );
        }
        if (!requires.includes(dependency)) {
            requires.push(dependency);
        }
    }

    // References are implicit dependencies
    for (const ref of referencesIn(parameters)) {
        if (ref.declarationId === record.id) {
            throw new MalformedDeclarationError(
                record.id,
                `parameter references its own attribute "${ref.attribute}"`,
            );
        }
        if (!requires.includes(ref.declarationId)) {
            requires.push(ref.declarationId);
        }
    }

    return Object.freeze(requires);
}

function toDeclaration(record: RawDeclaration): Declaration {
    if (!isResourceKind(record.kind)) {
        throw new MalformedDeclarationError(
            record.id,
            `unrecognized kind "${record.kind}"`,
        );
    }
    const kind = record.kind;
    const parameters = toParameters(record);

    const required = [
        ...requirementFor(kind).required,
        ...extraRequirements(kind, parameters),
    ];
    const missing = required.filter((name) => !Object.hasOwn(parameters, name));
    if (missing.length > 0) {
        throw new MalformedDeclarationError(
            record.id,
            `${kind} is missing required parameter(s): ${missing.join(", ")}`,
        );
    }

    return Object.freeze({
        id: record.id,
        kind,
        parameters,
        requires: toRequires(record, parameters),
    });
}

function parseRecords(records: readonly RawDeclaration[]): Declaration[] {
    const seen = new Set<string>();
    const declarations: Declaration[] = [];

    for (const record of records) {
        if (record.id.trim() === "") {
            throw new MalformedDeclarationError(
                null,
                `declaration of kind "${record.kind}" has an empty id`,
            );
        }
        if (seen.has(record.id)) {
            throw new MalformedDeclarationError(
                record.id,
                "identifier is declared more than once",
            );
        }
        seen.add(record.id);
        declarations.push(toDeclaration(record));
    }

    return declarations;
}

export function createManifestParser(deps: ManifestParserDeps): ManifestParser {
    return {
        parse(records: readonly RawDeclaration[]): readonly Declaration[] {
            return parseRecords(records);
        },

        parseDocument(
            jsonString: string,
            templateVariables: Readonly<Record<string, string>>,
        ): ManifestParseResult {
            const rawData = parseJson(jsonString);

            let sanitized: ReturnType<typeof stripDangerousKeys>;
            try {
                sanitized = stripDangerousKeys(rawData);
            } catch (error) {
                const message =
                    error instanceof Error ? error.message : String(error);
                throw new MalformedDeclarationError(
                    null,
                    `manifest could not be sanitized (${message})`,
                );
            }

            const templated = deps.resolver.resolveDeep(
                sanitized.value,
                templateVariables,
            );
            if (templated.missingVariables.length > 0) {
                throw new MalformedDeclarationError(
                    null,
                    `unresolved template variable(s): ${templated.missingVariables.join(", ")}`,
                );
            }

            const manifest = validateManifest(templated.value);

            return {
                declarations: parseRecords(manifest.declarations),
                warnings: sanitized.strippedPaths.map(
                    (path) => `Ignored unsafe manifest key at ${path}`,
                ),
            };
        },
    };
}
