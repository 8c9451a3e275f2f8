export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  redis: RedisConfig;
  auth: AuthConfig;
  cors: CorsConfig;
  aws: AwsConfig;
  cloudflare: CloudflareConfig | null;
  verification: VerificationConfig;
  rateLimit: RateLimitConfig;
  retention: RetentionConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface AuthConfig {
  sessionSecret: string;
  sessionExpiryDays: number;
  adminPasswordHash: string;
}

export interface CorsConfig {
  origins: string[];
}

export interface AwsConfig {
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

export interface CloudflareConfig {
  apiToken: string;
  zoneId: string;
}

export interface VerificationConfig {
  timeoutHours: number;
  pollIntervalMinutes: number;
  providerTimeoutMs: number;
}

export interface RateLimitConfig {
  loginPerMinute: number;
  apiPerMinute: number;
}

export interface RetentionConfig {
  /** Null disables the sent-email sweep. */
  sentEmailDays: number | null;
  apiKeyDays: number;
}
