import { z } from "zod";

import { LOG_LEVELS } from "./logger.js";

// Choices a UI typically offers; the engine accepts any positive tolerance.
export const TOLERANCE_OPTIONS = [10, 20, 30, 40, 50] as const;

export const DEFAULT_ANALYSIS_CONFIG = {
  tolerance: 30,
  topK: 10,
  topKPerVendor: 3,
  logLevel: "info",
} as const satisfies AnalysisConfig;

const AnalysisConfigSchema = z.object({
  tolerance: z
    .number()
    .refine(Number.isFinite, "Must be a finite number")
    .refine((v) => v > 0, "Must be a positive percentage"),
  topK: z.number().int().positive(),
  topKPerVendor: z.number().int().positive(),
  logLevel: z.enum(LOG_LEVELS),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

const ENV_KEYS: Record<keyof AnalysisConfig, string> = {
  tolerance: "INVENTORY_TOLERANCE",
  topK: "INVENTORY_TOP_K",
  topKPerVendor: "INVENTORY_TOP_K_PER_VENDOR",
  logLevel: "INVENTORY_LOG_LEVEL",
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid inventory configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const normalize = (value?: string) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const numberOr = (value: string | undefined, fallback: number) =>
  value === undefined ? fallback : Number(value);

function envKeyFor(path: readonly PropertyKey[]): string {
  const head = path[0];
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    if (field === head) return envKey;
  }
  return String(head ?? "config");
}

/**
 * Read analysis defaults from the environment. Blank values fall back to
 * DEFAULT_ANALYSIS_CONFIG; anything present must be valid.
 */
export function getAnalysisConfig(env: NodeJS.ProcessEnv = process.env): AnalysisConfig {
  const candidate = {
    tolerance: numberOr(normalize(env.INVENTORY_TOLERANCE), DEFAULT_ANALYSIS_CONFIG.tolerance),
    topK: numberOr(normalize(env.INVENTORY_TOP_K), DEFAULT_ANALYSIS_CONFIG.topK),
    topKPerVendor: numberOr(normalize(env.INVENTORY_TOP_K_PER_VENDOR), DEFAULT_ANALYSIS_CONFIG.topKPerVendor),
    logLevel: normalize(env.INVENTORY_LOG_LEVEL)?.toLowerCase() ?? DEFAULT_ANALYSIS_CONFIG.logLevel,
  };

  const parsed = AnalysisConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${envKeyFor(i.path)}: ${i.message}`));
  }
  return parsed.data;
}
