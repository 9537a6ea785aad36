import { z } from "zod";

const positiveMs = z.number().int().positive();

export const queueConfigSchema = z
  .object({
    timeoutMs: positiveMs.optional(),
    stableDelayMs: positiveMs.optional(),
  })
  .strict();
