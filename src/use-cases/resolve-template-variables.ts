export interface TemplateResolutionResult {
    readonly resolved: true;
    readonly output: string;
}

export interface TemplateResolutionError {
    readonly resolved: false;
    readonly missingVariables: readonly string[];
}

export type TemplateResolutionOutcome =
    | TemplateResolutionResult
    | TemplateResolutionError;

export interface TemplateValueResult {
    readonly value: unknown;
    readonly missingVariables: readonly string[];
}

export interface TemplateVariableResolver {
    resolve(
        input: string,
        templateVariables: Readonly<Record<string, string>>,
    ): TemplateResolutionOutcome;
    resolveDeep(
        value: unknown,
        templateVariables: Readonly<Record<string, string>>,
    ): TemplateValueResult;
}

const PLACEHOLDER_PATTERN = /\$\{([^}]+)\}/g;

function toPlaceholder(key: string): string {
    return `\${${key}}`;
}

// A value that still carries a placeholder would need a second pass
function isResolvedValue(value: string): boolean {
    return !value.includes("${");
}

function discoverPlaceholderKeys(input: string): string[] {
    const keys = new Set<string>();
    for (const match of input.matchAll(PLACEHOLDER_PATTERN)) {
        if (match[1] !== undefined) {
            keys.add(match[1]);
        }
    }
    return [...keys];
}

function buildResolutionMap(
    input: string,
    templateVariables: Readonly<Record<string, string>>,
): { map: Map<string, string>; missing: string[] } {
    const map = new Map<string, string>();
    const missing: string[] = [];

    for (const key of discoverPlaceholderKeys(input)) {
        const templateValue = Object.hasOwn(templateVariables, key)
            ? templateVariables[key]
            : undefined;
        if (templateValue !== undefined && isResolvedValue(templateValue)) {
            map.set(key, templateValue);
        } else {
            missing.push(key);
        }
    }

    return { map, missing };
}

function applyReplacements(
    input: string,
    resolutionMap: Map<string, string>,
): string {
    let output = input;
    for (const [key, value] of resolutionMap) {
        output = output.replaceAll(toPlaceholder(key), value);
    }
    return output;
}

export function createTemplateVariableResolver(): TemplateVariableResolver {
    const resolve = (
        input: string,
        templateVariables: Readonly<Record<string, string>>,
    ): TemplateResolutionOutcome => {
        const { map, missing } = buildResolutionMap(input, templateVariables);

        if (missing.length > 0) {
            return { resolved: false, missingVariables: missing };
        }

        return { resolved: true, output: applyReplacements(input, map) };
    };

    return {
        resolve,
        resolveDeep(
            value: unknown,
            templateVariables: Readonly<Record<string, string>>,
        ): TemplateValueResult {
            const missing = new Set<string>();

            const walk = (current: unknown): unknown => {
                if (typeof current === "string") {
                    const resolution = resolve(current, templateVariables);
                    if (!resolution.resolved) {
                        for (const variable of resolution.missingVariables) {
                            missing.add(variable);
                        }
                        return current;
                    }
                    return resolution.output;
                }
                if (Array.isArray(current)) {
                    return current.map(walk);
                }
                if (current !== null && typeof current === "object") {
                    const result: Record<string, unknown> = {};
                    for (const [key, nested] of Object.entries(current)) {
                        result[key] = walk(nested);
                    }
                    return result;
                }
                return current;
            };

            const resolved = walk(value);
            return { value: resolved, missingVariables: [...missing] };
        },
    };
}
