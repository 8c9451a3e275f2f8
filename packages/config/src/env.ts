import { z } from "zod";
import type { AppConfig } from "@relaymail/types";

const ADMIN_PASSWORD_HASH_REGEX = /^pbkdf2\$\d+\$[0-9a-f]+\$[0-9a-f]+$/;

function positiveInt(defaultValue: string) {
  return z.string().default(defaultValue).transform(Number).pipe(z.number().int().positive());
}

/**
 * Zod schema for every environment variable the API and worker read.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]),
    PORT: positiveInt("3000"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string()
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
        message: "DATABASE_URL must start with postgresql://",
      }),
    DATABASE_POOL_MAX: positiveInt("20"),

    // ---------- Redis ----------
    REDIS_URL: z.string().min(1, "REDIS_URL is required"),

    // ---------- Auth ----------
    SESSION_SECRET: z.string().min(32, "SESSION_SECRET must be at least 32 characters"),
    SESSION_EXPIRY_DAYS: positiveInt("30"),
    ADMIN_PASSWORD_HASH: z
      .string()
      .regex(ADMIN_PASSWORD_HASH_REGEX, "ADMIN_PASSWORD_HASH must be pbkdf2$<iterations>$<salt>$<hash>"),

    // ---------- CORS ----------
    CORS_ORIGINS: z
      .string()
      .min(1, "CORS_ORIGINS is required")
      .refine((val) => !val.split(",").some((origin) => origin.trim() === "*"), {
        message: 'CORS_ORIGINS must not contain "*"; list explicit origins',
      })
      .transform((val) =>
        val
          .split(",")
          .map((origin) => origin.trim())
          .filter((origin) => origin.length > 0),
      ),

    // ---------- AWS SES ----------
    AWS_REGION: z.string().min(1, "AWS_REGION is required"),
    AWS_ACCESS_KEY_ID: z.string().optional(),
    AWS_SECRET_ACCESS_KEY: z.string().optional(),

    // ---------- Cloudflare ----------
    CLOUDFLARE_API_TOKEN: z.string().optional(),
    CLOUDFLARE_ZONE_ID: z.string().optional(),

    // ---------- Verification ----------
    VERIFICATION_TIMEOUT_HOURS: positiveInt("72"),
    VERIFICATION_POLL_INTERVAL_MINUTES: positiveInt("5"),
    PROVIDER_TIMEOUT_MS: positiveInt("10000"),

    // ---------- Rate Limiting ----------
    RATE_LIMIT_LOGIN_PER_MINUTE: positiveInt("5"),
    RATE_LIMIT_API_PER_MINUTE: positiveInt("100"),

    // ---------- Retention ----------
    SENT_EMAIL_RETENTION_DAYS: z
      .string()
      .optional()
      .transform((val) => (val === undefined || val === "" ? 0 : Number(val)))
      .pipe(z.number().int().nonnegative()),
    API_KEY_RETENTION_DAYS: positiveInt("90"),
  })
  .superRefine((env, ctx) => {
    if (Boolean(env.CLOUDFLARE_API_TOKEN) !== Boolean(env.CLOUDFLARE_ZONE_ID)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CLOUDFLARE_ZONE_ID"],
        message: "CLOUDFLARE_API_TOKEN and CLOUDFLARE_ZONE_ID must be set together",
      });
    }
    if (Boolean(env.AWS_ACCESS_KEY_ID) !== Boolean(env.AWS_SECRET_ACCESS_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["AWS_SECRET_ACCESS_KEY"],
        message: "AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set together",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const cloudflare =
    parsed.CLOUDFLARE_API_TOKEN && parsed.CLOUDFLARE_ZONE_ID
      ? { apiToken: parsed.CLOUDFLARE_API_TOKEN, zoneId: parsed.CLOUDFLARE_ZONE_ID }
      : null;

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    auth: {
      sessionSecret: parsed.SESSION_SECRET,
      sessionExpiryDays: parsed.SESSION_EXPIRY_DAYS,
      adminPasswordHash: parsed.ADMIN_PASSWORD_HASH,
    },

    cors: {
      origins: parsed.CORS_ORIGINS,
    },

    aws: {
      region: parsed.AWS_REGION,
      accessKeyId: parsed.AWS_ACCESS_KEY_ID,
      secretAccessKey: parsed.AWS_SECRET_ACCESS_KEY,
    },

    cloudflare,

    verification: {
      timeoutHours: parsed.VERIFICATION_TIMEOUT_HOURS,
      pollIntervalMinutes: parsed.VERIFICATION_POLL_INTERVAL_MINUTES,
      providerTimeoutMs: parsed.PROVIDER_TIMEOUT_MS,
    },

    rateLimit: {
      loginPerMinute: parsed.RATE_LIMIT_LOGIN_PER_MINUTE,
      apiPerMinute: parsed.RATE_LIMIT_API_PER_MINUTE,
    },

    retention: {
      sentEmailDays: parsed.SENT_EMAIL_RETENTION_DAYS > 0 ? parsed.SENT_EMAIL_RETENTION_DAYS : null,
      apiKeyDays: parsed.API_KEY_RETENTION_DAYS,
    },
  };
}
