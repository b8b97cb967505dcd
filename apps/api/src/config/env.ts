import { z } from "zod";

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: z.coerce.number().int().min(1).max(65535).default(4000),
    STORE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
    DATABASE_URL: z.string().min(1).optional(),
    PG_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
    CORS_ORIGIN: z.string().default("http://localhost:5173"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    LOG_PRETTY: z
      .enum(["true", "false"])
      .default("false")
      .transform((value) => value === "true"),
    MIGRATIONS_DIR: z.string().optional()
  })
  .superRefine((value, ctx) => {
    if (value.STORE_DRIVER === "postgres" && !value.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when STORE_DRIVER is postgres"
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv) => envSchema.safeParse(source);

export const loadEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  const parsed = parseEnv(source);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("Invalid environment variables", parsed.error.flatten().fieldErrors);
    process.exit(1);
  }
  return parsed.data;
};

export const corsOriginsFrom = (env: Pick<Env, "CORS_ORIGIN">): string[] => {
  return env.CORS_ORIGIN.split(",").map((origin) => origin.trim());
};
