import { z } from "zod";
import { RESOURCE_KINDS } from "../entities/declaration.js";

const ScalarSchema = z.union([z.string(), z.number().int(), z.boolean()]);

const StoredResourceSchema = z.object({
    kind: z.enum(RESOURCE_KINDS),
    parameters: z.record(ScalarSchema),
    attributes: z.record(ScalarSchema).default({}),
});

export const LocalCloudStateSchema = z.object({
    resources: z.array(StoredResourceSchema).default([]),
});

export type StoredResource = z.infer<typeof StoredResourceSchema>;
export type LocalCloudState = z.infer<typeof LocalCloudStateSchema>;
