import { z } from "zod";

export const DraftFormatSchema = z.enum(["json", "yaml"]);

export const ConfigSchema = z.object({
  drafts: z
    .object({ format: DraftFormatSchema.default("json") })
    .default({}),
  debug: z.boolean().default(false),
});

export type DraftFormat = z.infer<typeof DraftFormatSchema>;
export type Config = z.infer<typeof ConfigSchema>;
