import { z } from "zod";
import { parseDuration } from "../entities/duration.js";

const DurationSchema = z
    .union([z.string(), z.number()])
    .transform((value, ctx) => {
        const ms = parseDuration(value);
        if (ms === null) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "must be a positive duration such as 500ms, 30s or 2m",
            });
            return z.NEVER;
        }
        return ms;
    });

export const ConvergeConfigSchema = z.object({
    maxRetries: z.number().int().min(0).max(10).default(3),
    timeout: DurationSchema.default("30s"),
    concurrency: z.number().int().min(1).max(64).default(4),
    backoff: z
        .object({
            initialDelay: DurationSchema.default("200ms"),
            maxDelay: DurationSchema.default("5s"),
        })
        .default({}),
    templateVariables: z.record(z.string()).default({}),
});
