import { z } from "zod";

export const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    WHATSAPP_ACCESS_TOKEN: z.string().min(1),
    WHATSAPP_PHONE_NUMBER_ID: z.string().min(1),
    VERIFY_TOKEN: z.string().min(1),
    APP_SECRET: z.string().optional(),
    GRAPH_API_VERSION: z.string().default("v21.0"),
    GOOGLE_DRIVE_ROOT_FOLDER_ID: z.string().min(1),
    GOOGLE_SERVICE_ACCOUNT_JSON: z.string().optional(),
    SESSION_STORE: z.enum(["memory", "redis"]).default("memory"),
    SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
    SESSION_IN_MEMORY_LIMIT: z.coerce.number().int().positive().default(50_000),
    REDIS_MODE: z.enum(["tcp", "rest"]).default("tcp"),
    REDIS_URL: z.string().optional(),
    UPSTASH_REDIS_REST_URL: z.string().optional(),
    UPSTASH_REDIS_REST_TOKEN: z.string().optional(),
    REDIS_SESSION_PREFIX: z.string().default("inventory:sessions:"),
    UPLOAD_CONCURRENCY: z.coerce.number().int().min(1).max(8).default(1),
    PROGRESS_EVERY: z.coerce.number().int().positive().default(3),
    MEDIA_MAX_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
    IDEMPOTENCY_TTL_SECONDS: z.coerce.number().int().positive().default(6 * 60 * 60),
  })
  .superRefine((val, ctx) => {
    if (val.SESSION_STORE !== "redis") return;
    if (val.REDIS_MODE === "tcp" && !val.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "REDIS_URL is required when SESSION_STORE=redis and REDIS_MODE=tcp",
        path: ["REDIS_URL"],
      });
    }
    if (val.REDIS_MODE === "rest" && (!val.UPSTASH_REDIS_REST_URL || !val.UPSTASH_REDIS_REST_TOKEN)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN are required when REDIS_MODE=rest",
        path: ["UPSTASH_REDIS_REST_URL"],
      });
    }
  });

export type EnvConfig = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Parses the environment, empty strings count as unset. */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }
  return parsed.data;
}
