import { ZodError } from "zod";
import type {
    ConvergeConfig,
    ConvergeConfigOverrides,
} from "../entities/converge-config.js";
import { parseDuration } from "../entities/duration.js";
import { ConfigurationError } from "../entities/errors.js";
import { stripDangerousKeys } from "../entities/sanitize-json.js";
import { ConvergeConfigSchema } from "./converge-config.schema.js";

export interface ConvergeConfigParser {
    parse(jsonString: string): ConvergeConfig;
    defaults(): ConvergeConfig;
    applyOverrides(
        config: ConvergeConfig,
        overrides: ConvergeConfigOverrides,
    ): ConvergeConfig;
}

const KEY_MAP: Record<string, string> = {
    max_retries: "maxRetries",
    timeout: "timeout",
    concurrency: "concurrency",
    backoff: "backoff",
    initial_delay: "initialDelay",
    max_delay: "maxDelay",
    template_variables: "templateVariables",
};

// Variable names inside template_variables are user data and keep their case
function transformSnakeToCamel(data: unknown): unknown {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
        return data;
    }

    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
        const camelKey = KEY_MAP[key] ?? key;
        result[camelKey] =
            camelKey === "backoff" ? transformSnakeToCamel(value) : value;
    }
    return result;
}

function validateConfig(data: unknown): ConvergeConfig {
    try {
        const parsed = ConvergeConfigSchema.parse(data);
        return {
            maxRetries: parsed.maxRetries,
            timeoutMs: parsed.timeout,
            concurrency: parsed.concurrency,
            backoff: {
                initialDelayMs: parsed.backoff.initialDelay,
                maxDelayMs: parsed.backoff.maxDelay,
            },
            templateVariables: parsed.templateVariables,
        };
    } catch (error) {
        if (error instanceof ZodError) {
            const details = error.issues
                .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                .join("; ");
            throw new ConfigurationError(`Invalid configuration: ${details}`);
        }
        throw error;
    }
}

function parseCount(flag: string, value: string, minimum: number): number {
    const parsed = value.trim() === "" ? Number.NaN : Number(value);
    if (!Number.isInteger(parsed) || parsed < minimum) {
        throw new ConfigurationError(
            `--${flag} must be an integer of at least ${minimum}, got "${value}"`,
        );
    }
    return parsed;
}

export function createConvergeConfigParser(): ConvergeConfigParser {
    return {
        parse(jsonString: string): ConvergeConfig {
            let rawData: unknown;
            try {
                rawData = JSON.parse(jsonString);
            } catch (error) {
                const message =
                    error instanceof Error ? error.message : String(error);
                throw new ConfigurationError(
                    `Invalid JSON: configuration file is not valid JSON (${message})`,
                );
            }

            let sanitized: unknown;
            try {
                sanitized = stripDangerousKeys(rawData).value;
            } catch (error) {
                const message =
                    error instanceof Error ? error.message : String(error);
                throw new ConfigurationError(
                    `Invalid JSON: configuration file could not be sanitized (${message})`,
                );
            }

            return validateConfig(transformSnakeToCamel(sanitized));
        },

        defaults(): ConvergeConfig {
            return validateConfig({});
        },

        applyOverrides(
            config: ConvergeConfig,
            overrides: ConvergeConfigOverrides,
        ): ConvergeConfig {
            let { maxRetries, timeoutMs, concurrency } = config;

            if (overrides.maxRetries !== undefined) {
                maxRetries = parseCount("max-retries", overrides.maxRetries, 0);
            }
            if (overrides.concurrency !== undefined) {
                concurrency = parseCount(
                    "concurrency",
                    overrides.concurrency,
                    1,
                );
            }
            if (overrides.timeout !== undefined) {
                const parsed = parseDuration(overrides.timeout);
                if (parsed === null) {
                    throw new ConfigurationError(
                        `--timeout must be a positive duration such as 500ms, 30s or 2m, got "${overrides.timeout}"`,
                    );
                }
                timeoutMs = parsed;
            }

            return { ...config, maxRetries, timeoutMs, concurrency };
        },
    };
}
