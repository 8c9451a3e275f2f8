import { z } from "zod";
import type CircuitBreaker from "opossum";
import type { Logger } from "@relaymail/logger";
import {
  ExternalServiceError,
  createCircuitBreaker,
  errorMessage,
  withRetry,
} from "@relaymail/errors";
import type { DnsRecordInput, IDnsPublisher } from "./dns-publisher.interface.js";

const CLOUDFLARE_API_BASE = "https://api.cloudflare.com/client/v4";
const SERVICE = "cloudflare";
const AUTO_TTL = 1;

export interface CloudflarePublisherConfig {
  apiToken: string;
  zoneId: string;
  timeoutMs: number;
  logger: Logger;
  /** Retries for record creation. Default: 2 */
  maxRetries?: number;
  fetch?: typeof fetch;
}

const cloudflareErrorSchema = z.object({ code: z.number(), message: z.string() });

const dnsRecordSchema = z.object({
  id: z.string(),
  type: z.string(),
  name: z.string(),
  content: z.string(),
});

function envelope<T extends z.ZodTypeAny>(result: T) {
  return z.object({
    success: z.boolean(),
    errors: z.array(cloudflareErrorSchema).default([]),
    result: result.nullable().optional(),
  });
}

const baseEnvelopeSchema = envelope(z.unknown());
const createResponseSchema = envelope(dnsRecordSchema);
const listResponseSchema = envelope(z.array(dnsRecordSchema));
const deleteResponseSchema = envelope(z.object({ id: z.string() }));

/**
 * A request Cloudflare refused with a reason. Not retried.
 */
export class CloudflareRejectedError extends ExternalServiceError {
  constructor(message: string) {
    super(message, SERVICE);
  }
}

interface CloudflareRequest {
  method: "GET" | "POST" | "DELETE";
  path: string;
  body?: unknown;
}

interface CloudflareResponse {
  status: number;
  payload: unknown;
}

/**
 * Publishes records into one Cloudflare zone over the v4 REST API.
 */
export class CloudflarePublisher implements IDnsPublisher {
  readonly name = SERVICE;
  readonly enabled = true;
  private readonly apiToken: string;
  private readonly zoneId: string;
  private readonly logger: Logger;
  private readonly maxRetries: number;
  private readonly fetchFn: typeof fetch;
  private readonly breaker: CircuitBreaker<[CloudflareRequest], CloudflareResponse>;

  constructor(config: CloudflarePublisherConfig) {
    this.apiToken = config.apiToken;
    this.zoneId = config.zoneId;
    this.logger = config.logger;
    this.maxRetries = config.maxRetries ?? 2;
    this.fetchFn = config.fetch ?? fetch;
    this.breaker = createCircuitBreaker(
      "cloudflare.api",
      (request: CloudflareRequest) => this.send(request),
      {
        timeout: config.timeoutMs,
        onStateChange: (name, state) => {
          this.logger.warn({ breaker: name, state }, "Circuit breaker state changed");
        },
      },
    );
  }

  async createRecord(record: DnsRecordInput): Promise<string> {
    this.logger.info(
      { type: record.type, name: record.name, content: record.value },
      "Creating DNS record",
    );

    const body = {
      type: record.type,
      name: record.name,
      content: record.value,
      ttl: AUTO_TTL,
      proxied: false,
      ...(record.type === "MX" ? { priority: record.priority } : {}),
    };

    const parsed = await withRetry(
      async () => {
        const response = await this.request({
          method: "POST",
          path: `/zones/${this.zoneId}/dns_records`,
          body,
        });
        return this.parse(createResponseSchema, response, "create DNS record");
      },
      {
        maxRetries: this.maxRetries,
        baseDelayMs: 500,
        shouldRetry: (error) => !(error instanceof CloudflareRejectedError),
        onRetry: (attempt, delayMs, error) => {
          this.logger.warn(
            { attempt, delayMs, error: errorMessage(error) },
            "Retrying DNS record creation",
          );
        },
      },
    );

    if (!parsed.result) {
      throw new ExternalServiceError("Cloudflare returned no record", SERVICE);
    }

    this.logger.info({ recordId: parsed.result.id }, "DNS record created");
    return parsed.result.id;
  }

  async deleteRecordsForDomain(domainName: string): Promise<number> {
    this.logger.info({ domain: domainName }, "Deleting DNS records for domain");

    const response = await this.request({
      method: "GET",
      path: `/zones/${this.zoneId}/dns_records?per_page=100`,
    });
    const records = this.parse(listResponseSchema, response, "list DNS records").result ?? [];

    const owned = records.filter(
      (r) => r.name === domainName || r.name.endsWith(`.${domainName}`),
    );

    let deleted = 0;
    for (const record of owned) {
      try {
        const res = await this.request({
          method: "DELETE",
          path: `/zones/${this.zoneId}/dns_records/${record.id}`,
        });
        this.parse(deleteResponseSchema, res, "delete DNS record");
        deleted++;
      } catch (err) {
        this.logger.warn(
          { recordId: record.id, error: errorMessage(err) },
          "Failed to delete DNS record",
        );
      }
    }
    return deleted;
  }

  private async request(request: CloudflareRequest): Promise<CloudflareResponse> {
    try {
      return await this.breaker.fire(request);
    } catch (err) {
      if (err instanceof ExternalServiceError) throw err;
      throw new ExternalServiceError(`Cloudflare request failed: ${errorMessage(err)}`, SERVICE);
    }
  }

  private async send(request: CloudflareRequest): Promise<CloudflareResponse> {
    const response = await this.fetchFn(`${CLOUDFLARE_API_BASE}${request.path}`, {
      method: request.method,
      headers: {
        Authorization: `Bearer ${this.apiToken}`,
        "Content-Type": "application/json",
      },
      ...(request.body === undefined ? {} : { body: JSON.stringify(request.body) }),
    });
    const payload: unknown = await response.json().catch(() => null);

    // 5xx counts against the breaker and is retried; 4xx is the caller's problem.
    if (response.status >= 500) {
      throw new ExternalServiceError(
        `Cloudflare responded ${String(response.status)}`,
        SERVICE,
      );
    }
    return { status: response.status, payload };
  }

  private parse<T extends z.ZodTypeAny>(
    schema: T,
    response: CloudflareResponse,
    action: string,
  ): z.infer<T> {
    const base = baseEnvelopeSchema.safeParse(response.payload);
    if (!base.success) {
      throw new ExternalServiceError(`Cloudflare returned an unexpected body (${action})`, SERVICE);
    }

    if (response.status >= 400 || !base.data.success) {
      const messages = base.data.errors.map((e) => e.message);
      const detail = messages.length > 0 ? messages.join(", ") : "Unknown error";
      this.logger.error({ action, status: response.status, errors: messages }, "Cloudflare API error");
      throw new CloudflareRejectedError(`Failed to ${action}: ${detail}`);
    }

    const parsed = schema.safeParse(response.payload);
    if (!parsed.success) {
      throw new ExternalServiceError(`Cloudflare returned an unexpected body (${action})`, SERVICE);
    }
    return parsed.data;
  }
}
