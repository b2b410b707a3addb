import { z } from "zod";

const trueLike = new Set(["1", "true", "yes", "y", "on"]);
const falseLike = new Set(["0", "false", "no", "n", "off"]);

function parseBooleanEnv(defaultValue: boolean) {
  return z.preprocess((value) => {
    if (value === undefined || value === null || value === "") {
      return undefined;
    }

    if (typeof value === "boolean") {
      return value;
    }

    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (trueLike.has(normalized)) {
        return true;
      }
      if (falseLike.has(normalized)) {
        return false;
      }
    }

    return value;
  }, z.boolean().default(defaultValue));
}

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_SSL: parseBooleanEnv(false),
  API_JWT_SECRET: z.string().min(1),
  API_CORS_ORIGIN: z.string().min(1).default("http://localhost:3000"),
  API_PORT: z.coerce.number().int().positive().default(4000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  SENTRY_DSN: z.string().optional().default(""),
  SENTRY_ENVIRONMENT: z.string().optional().default("development"),
  SENTRY_RELEASE: z.string().optional().default(""),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).optional(),
  BILLING_TRANSIENT_RETRY_LIMIT: z.coerce.number().int().min(0).max(3).default(1),
});

export type ApiEnv = z.infer<typeof envSchema>;

let cachedEnv: ApiEnv | null = null;

export function getApiEnv(): ApiEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid API environment configuration: ${issues.join("; ")}`);
  }

  cachedEnv = parsed.data;
  return cachedEnv;
}

export function resetApiEnvCache() {
  cachedEnv = null;
}

export function isProductionEnvironment(environment: string) {
  const normalized = environment.trim().toLowerCase();
  return normalized === "production" || normalized === "prod";
}
