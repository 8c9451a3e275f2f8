import { randomUUID } from "node:crypto";
import { z } from "zod";
import type {
  AuthContext,
  CursorPagedResponse,
  Domain,
  SendEmailInput,
  SentEmail,
  SentEmailCursor,
  SentEmailSummary,
} from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import type { IEmailSender } from "@relaymail/providers";
import { assertDomainAccess, canAccessDomain, domainScope } from "@relaymail/auth";
import {
  AppError,
  DomainNotVerifiedError,
  ForbiddenError,
  InvalidRecipientError,
  InvalidSenderError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from "@relaymail/errors";
import type { DomainStore, SentEmailStore } from "./stores.interface.js";
import { assertRecipients, isValidRecipient, isValidSenderPrefix, parseSender } from "./email-address.js";
import { parseInput } from "./validation.js";

export const MAX_RECIPIENTS = 50;
export const MAX_BATCH_SIZE = 100;

const addressList = z
  .union([z.string(), z.array(z.string())])
  .transform((v) => (Array.isArray(v) ? v : [v]));

export const sendEmailSchema = z
  .object({
    from: z.string({ required_error: "from is required" }).trim().min(1, "from is required"),
    to: addressList.refine((v) => v.length > 0, "to must contain at least one address"),
    subject: z.string({ required_error: "subject is required" }).min(1, "subject is required"),
    html: z.string().optional(),
    text: z.string().optional(),
    cc: addressList.optional(),
    bcc: addressList.optional(),
    replyTo: addressList.optional(),
    headers: z.record(z.string()).optional(),
  })
  .refine((v) => Boolean(v.html) || Boolean(v.text), {
    message: "Either html or text is required",
    path: ["html"],
  });

export const testEmailSchema = z.object({
  senderPrefix: z.string({ required_error: "senderPrefix is required" }).trim().min(1, "senderPrefix is required"),
  to: z.string({ required_error: "to is required" }).trim().min(1, "to is required"),
  subject: z.string({ required_error: "subject is required" }).min(1, "subject is required"),
  text: z.string({ required_error: "text is required" }).min(1, "text is required"),
});

export const listEmailsSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
  cursor: z.string().optional(),
  domainId: z.string().optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
});

export type BatchValidationMode = "strict" | "permissive";

export interface BatchResult {
  data: { id: string }[];
  errors?: { index: number; message: string }[];
}

interface PreparedEmail {
  input: SendEmailInput;
  domain: Domain;
}

const cursorSchema = z.object({ id: z.string().min(1), sentAt: z.coerce.date() });

export function encodeCursor(cursor: SentEmailCursor): string {
  return Buffer.from(
    JSON.stringify({ id: cursor.id, sentAt: cursor.sentAt.toISOString() }),
  ).toString("base64url");
}

/**
 * @throws ValidationError for anything {@link encodeCursor} did not produce
 */
export function decodeCursor(encoded: string): SentEmailCursor {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(encoded, "base64url").toString("utf8"));
  } catch {
    throw new ValidationError("Invalid cursor", { cursor: "Invalid cursor" });
  }
  const parsed = cursorSchema.safeParse(raw);
  if (!parsed.success || Number.isNaN(parsed.data.sentAt.getTime())) {
    throw new ValidationError("Invalid cursor", { cursor: "Invalid cursor" });
  }
  return parsed.data;
}

export interface EmailServiceDependencies {
  domains: DomainStore;
  sentEmails: SentEmailStore;
  sender: IEmailSender;
  logger: Logger;
  now?: () => Date;
}

/**
 * Sends on behalf of a verified domain the caller may use. Every check runs
 * before the provider is called.
 */
export class EmailService {
  private readonly domains: DomainStore;
  private readonly sentEmails: SentEmailStore;
  private readonly sender: IEmailSender;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: EmailServiceDependencies) {
    this.domains = deps.domains;
    this.sentEmails = deps.sentEmails;
    this.sender = deps.sender;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  async send(body: unknown, actor: AuthContext): Promise<{ id: string; domain: Domain }> {
    const prepared = await this.prepare(body, actor);
    const id = await this.deliver(prepared, actor);
    return { id, domain: prepared.domain };
  }

  /**
   * Strict mode rejects the whole batch on the first invalid message and
   * sends nothing. Permissive mode sends the valid ones and reports the rest.
   */
  async sendBatch(
    body: unknown,
    mode: BatchValidationMode,
    actor: AuthContext,
  ): Promise<BatchResult> {
    if (!Array.isArray(body) || body.length === 0) {
      throw new ValidationError("Batch must be a non-empty array of emails");
    }
    if (body.length > MAX_BATCH_SIZE) {
      throw new ValidationError(`Batch cannot contain more than ${String(MAX_BATCH_SIZE)} emails`);
    }
    const messages: unknown[] = body;

    if (mode === "strict") {
      const prepared: PreparedEmail[] = [];
      for (const message of messages) {
        prepared.push(await this.prepare(message, actor));
      }
      const data: { id: string }[] = [];
      for (const email of prepared) {
        data.push({ id: await this.deliver(email, actor) });
      }
      return { data };
    }

    const data: { id: string }[] = [];
    const errors: { index: number; message: string }[] = [];
    for (const [index, message] of messages.entries()) {
      try {
        const prepared = await this.prepare(message, actor);
        data.push({ id: await this.deliver(prepared, actor) });
      } catch (err) {
        if (!AppError.isAppError(err)) throw err;
        errors.push({ index, message: err.message });
      }
    }
    return { data, errors };
  }

  async sendTestEmail(domainId: string, body: unknown, actor: AuthContext): Promise<{ id: string; domain: Domain }> {
    assertDomainAccess(actor, domainId);
    const domain = await this.domains.findById(domainId);
    if (!domain) {
      throw new NotFoundError("Domain not found");
    }

    const input = parseInput(testEmailSchema, body);
    if (!isValidSenderPrefix(input.senderPrefix)) {
      throw new InvalidSenderError(`Invalid sender prefix: ${input.senderPrefix}`);
    }
    if (!isValidRecipient(input.to)) {
      throw new InvalidRecipientError(input.to);
    }
    if (domain.status !== "verified") {
      throw new DomainNotVerifiedError(domain.name);
    }

    const prepared: PreparedEmail = {
      domain,
      input: {
        from: `${input.senderPrefix}@${domain.name}`,
        to: [input.to],
        subject: input.subject,
        text: input.text,
      },
    };
    const id = await this.deliver(prepared, actor);
    return { id, domain };
  }

  /**
   * @throws ForbiddenError when the email belongs to a domain outside scope
   */
  async get(id: string, actor: AuthContext): Promise<SentEmail> {
    const email = await this.sentEmails.findById(id);
    if (!email) {
      throw new NotFoundError("Email not found");
    }
    if (!canAccessDomain(actor, email.domainId)) {
      throw new ForbiddenError("API key does not have access to this email");
    }
    return email;
  }

  async list(query: unknown, actor: AuthContext): Promise<CursorPagedResponse<SentEmailSummary>> {
    const params = parseInput(listEmailsSchema, query, "Invalid query parameters");
    if (params.domainId) {
      assertDomainAccess(actor, params.domainId);
    }

    const rows = await this.sentEmails.list({
      domainIds: domainScope(actor),
      ...(params.domainId ? { domainId: params.domainId } : {}),
      ...(params.from ? { from: params.from } : {}),
      ...(params.to ? { to: params.to } : {}),
      ...(params.cursor ? { cursor: decodeCursor(params.cursor) } : {}),
      limit: params.limit + 1,
    });

    const hasMore = rows.length > params.limit;
    const data = hasMore ? rows.slice(0, params.limit) : rows;
    const last = data[data.length - 1];

    return {
      object: "list",
      data,
      has_more: hasMore,
      next_cursor: hasMore && last ? encodeCursor(last) : null,
    };
  }

  /**
   * Field validation, then sender syntax, then recipients, then the domain.
   */
  private async prepare(body: unknown, actor: AuthContext): Promise<PreparedEmail> {
    const input = parseInput(sendEmailSchema, body);
    const sender = parseSender(input.from);

    assertRecipients(input.to);
    assertRecipients(input.cc ?? []);
    assertRecipients(input.bcc ?? []);
    assertRecipients(input.replyTo ?? []);
    if (input.to.length > MAX_RECIPIENTS) {
      throw new ValidationError(`Cannot send to more than ${String(MAX_RECIPIENTS)} recipients`, {
        to: `At most ${String(MAX_RECIPIENTS)} recipients`,
      });
    }

    const domain = await this.domains.findByName(sender.domain);
    if (!domain) {
      throw new DomainNotVerifiedError(sender.domain);
    }
    if (!canAccessDomain(actor, domain.id)) {
      throw new ForbiddenError("API key does not have access to this domain");
    }
    if (domain.status !== "verified") {
      throw new DomainNotVerifiedError(domain.name);
    }

    return { input, domain };
  }

  private async deliver({ input, domain }: PreparedEmail, actor: AuthContext): Promise<string> {
    const messageId = await this.sender.sendEmail(input);

    const email: SentEmail = {
      id: randomUUID(),
      messageId,
      sentAt: this.now(),
      fromAddress: input.from,
      toAddresses: input.to,
      ccAddresses: input.cc ?? null,
      bccAddresses: input.bcc ?? null,
      replyTo: input.replyTo ?? null,
      subject: input.subject,
      htmlBody: input.html ?? null,
      textBody: input.text ?? null,
      domainId: domain.id,
      apiKeyId: actor.apiKeyId,
    };

    // Already sent; a lost history row must not make the caller resend.
    try {
      await this.sentEmails.insert(email);
    } catch (err) {
      this.logger.error(
        { messageId, domainId: domain.id, error: errorMessage(err) },
        "Failed to store sent email",
      );
    }

    return email.id;
  }
}
