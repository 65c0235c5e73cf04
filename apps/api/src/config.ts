import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1),
  AGENT_MODEL: z.string().min(1).default("gpt-4o-mini"),
  JUDGE_MODEL: z.string().min(1).default("gpt-4o"),
  AGENT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  AGENT_MAX_TOKENS: z.coerce.number().int().positive().default(200),
  MAX_ROUNDS: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  CORS_ORIGINS: z
    .string()
    .default("")
    .transform((raw) =>
      raw
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    ),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  readonly keys: string[];

  constructor(keys: string[], message: string) {
    super(message);
    this.name = "ConfigError";
    this.keys = keys;
  }
}

/** Parse and validate configuration from environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join(".")))];
    throw new ConfigError(keys, `Invalid configuration: ${keys.join(", ")}`);
  }
  return parsed.data;
}
