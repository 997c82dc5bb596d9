import { z } from "zod";

export const EngineConfigSchema = z.object({
  maxItemsPerCategory: z.coerce.number().int().positive().default(10),
  maxContextTokens: z.coerce.number().int().positive().default(1500),
  charsPerToken: z.coerce.number().positive().default(4),
  cueSaturation: z.coerce.number().int().min(1).default(2),
  sheetOrder: z.enum(["cell_count", "store"]).default("cell_count"),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

const ENV_KEYS = {
  maxItemsPerCategory: "CELLSCOPE_MAX_ITEMS_PER_CATEGORY",
  maxContextTokens: "CELLSCOPE_MAX_CONTEXT_TOKENS",
  charsPerToken: "CELLSCOPE_CHARS_PER_TOKEN",
  cueSaturation: "CELLSCOPE_CUE_SATURATION",
  sheetOrder: "CELLSCOPE_SHEET_ORDER",
  logLevel: "LOG_LEVEL",
} as const satisfies Record<keyof EngineConfig, string>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

function parseConfig(input: Record<string, unknown>, describePath: (field: string) => string): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${describePath(String(issue.path[0] ?? ""))}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return parseConfig(overrides, (field) => field);
}

function readStringEnv(value: string | undefined): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const input: Record<string, unknown> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = readStringEnv(env[key]);
    if (value !== undefined) input[field] = field === "logLevel" ? value.toLowerCase() : value;
  }
  const envKeyOf = new Map<string, string>(Object.entries(ENV_KEYS));
  return parseConfig(input, (field) => envKeyOf.get(field) ?? field);
}
