import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  PORT: z.coerce.number().int().positive().default(8080),
  CORS_ORIGINS: optionalString,

  MYSQL_HOST: optionalString,
  MYSQL_PORT: z.coerce.number().int().positive().default(3306),
  MYSQL_DATABASE: optionalString,
  MYSQL_USER: optionalString,
  MYSQL_PASSWORD: optionalString,
  LOCAL_DB_PATH: optionalString,
  LOCAL_DB_DIR: optionalString,
  PORTABLE_EXECUTABLE_DIR: optionalString,

  ADMIN_USERNAME: z.string().min(1).default("admin"),
  ADMIN_PASSWORD: z.string().min(6).default("password123"),
  ADMIN_EMAIL: z.string().email().default("admin@example.com"),

  ASAAS_API_KEY: optionalString,
  ASAAS_ENVIRONMENT: z.enum(["sandbox", "production"]).default("sandbox"),
  ASAAS_WEBHOOK_TOKEN: optionalString,
  ISSUANCE_RETRY_INTERVAL_MINUTES: z.coerce.number().int().min(0).default(15),
});

export type Env = z.infer<typeof envSchema>;

let cached: Env | null = null;

export function getEnv(): Env {
  if (cached) return cached;
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  cached = parsed.data;
  return cached;
}

/** Drops the cached configuration so the next read sees `process.env` again. */
export function resetEnv() {
  cached = null;
}
