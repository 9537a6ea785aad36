import { queueConfigSchema } from "../config/config-schema.js";

/** Queue tunables; every field is optional and falls back to DEFAULT_CONFIG. */
export interface QueueConfig {
  /** How long to wait for a response after a send before delivering TIMEOUT. */
  timeoutMs?: number; // default: 500
  /** Quiet period that coalesces bursts of subprocess output into one resume. */
  stableDelayMs?: number; // default: 100
}

export type ResolvedConfig = Required<QueueConfig>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  timeoutMs: 500,
  stableDelayMs: 100,
};

export function resolveConfig(config: QueueConfig = {}): ResolvedConfig {
  const validation = queueConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new Error(`Invalid configuration: ${validation.error.message}`);
  }

  return {
    timeoutMs: config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    stableDelayMs: config.stableDelayMs ?? DEFAULT_CONFIG.stableDelayMs,
  };
}
