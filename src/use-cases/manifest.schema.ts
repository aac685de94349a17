import { z } from "zod";

// Scalar checks happen per declaration so errors can name the offending id
const RawDeclarationSchema = z.object({
    id: z.string(),
    kind: z.string(),
    parameters: z.record(z.unknown()).default({}),
    requires: z.array(z.string()).default([]),
});

export const ManifestSchema = z.object({
    declarations: z.array(RawDeclarationSchema),
});

export type ManifestInput = z.infer<typeof ManifestSchema>;
