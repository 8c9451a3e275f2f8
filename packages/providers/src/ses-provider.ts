import {
  CreateEmailIdentityCommand,
  DeleteEmailIdentityCommand,
  GetAccountCommand,
  GetEmailIdentityCommand,
  SESv2Client,
  SendEmailCommand,
} from "@aws-sdk/client-sesv2";
import type { SendEmailCommandInput } from "@aws-sdk/client-sesv2";
import type CircuitBreaker from "opossum";
import type { DnsRecord } from "@relaymail/types";
import type { Logger } from "@relaymail/logger";
import {
  AppError,
  ExternalServiceError,
  createCircuitBreaker,
  errorMessage,
} from "@relaymail/errors";
import type {
  IIdentityProvider,
  IdentityProvisioning,
  ProviderHealth,
  VerificationDetails,
} from "./identity-provider.interface.js";
import type { IEmailSender, OutboundEmail } from "./email-sender.interface.js";

export interface SesProviderConfig {
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  /** Upper bound for every SES call. */
  timeoutMs: number;
  logger: Logger;
  /** Injected in tests; built from region and credentials otherwise. */
  client?: SESv2Client;
}

const SERVICE = "ses";
const DKIM_TARGET_SUFFIX = "dkim.amazonses.com";

function isAwsError(err: unknown, name: string): boolean {
  return err instanceof Error && err.name === name;
}

/**
 * DKIM CNAMEs for the tokens SES issued: `<token>._domainkey.<domain>` →
 * `<token>.dkim.amazonses.com`.
 */
export function dkimRecords(domainName: string, tokens: readonly string[]): DnsRecord[] {
  return tokens.map((token) => ({
    type: "CNAME",
    name: `${token}._domainkey.${domainName}`,
    value: `${token}.${DKIM_TARGET_SUFFIX}`,
    priority: 0,
    verified: false,
  }));
}

/**
 * AWS SES v2 as identity provider and email sender. Each operation has its
 * own breaker so a failing send path does not block verification polling.
 */
export class SesProvider implements IIdentityProvider, IEmailSender {
  readonly name = SERVICE;
  private readonly client: SESv2Client;
  private readonly region: string;
  private readonly logger: Logger;

  private readonly createBreaker: CircuitBreaker<[string], string[]>;
  private readonly getBreaker: CircuitBreaker<[string], VerificationDetails>;
  private readonly deleteBreaker: CircuitBreaker<[string], void>;
  private readonly sendBreaker: CircuitBreaker<[SendEmailCommandInput], string>;
  private readonly accountBreaker: CircuitBreaker<[], ProviderHealth>;

  constructor(config: SesProviderConfig) {
    this.region = config.region;
    this.logger = config.logger;
    this.client =
      config.client ??
      new SESv2Client({
        region: config.region,
        ...(config.accessKeyId && config.secretAccessKey
          ? {
              credentials: {
                accessKeyId: config.accessKeyId,
                secretAccessKey: config.secretAccessKey,
              },
            }
          : {}),
      });

    const breakerOptions = {
      timeout: config.timeoutMs,
      errorFilter: (err: unknown) =>
        isAwsError(err, "NotFoundException") || isAwsError(err, "AlreadyExistsException"),
      onStateChange: (name: string, state: string) => {
        this.logger.warn({ breaker: name, state }, "Circuit breaker state changed");
      },
    };

    this.createBreaker = createCircuitBreaker(
      "ses.createIdentity",
      (domainName: string) => this.createOrFetchTokens(domainName),
      breakerOptions,
    );
    this.getBreaker = createCircuitBreaker(
      "ses.getIdentity",
      (domainName: string) => this.fetchDetails(domainName),
      breakerOptions,
    );
    this.deleteBreaker = createCircuitBreaker(
      "ses.deleteIdentity",
      async (domainName: string) => {
        await this.client.send(new DeleteEmailIdentityCommand({ EmailIdentity: domainName }));
      },
      breakerOptions,
    );
    this.sendBreaker = createCircuitBreaker(
      "ses.sendEmail",
      async (input: SendEmailCommandInput) => {
        const output = await this.client.send(new SendEmailCommand(input));
        if (!output.MessageId) {
          throw new ExternalServiceError("SES returned no message id", SERVICE);
        }
        return output.MessageId;
      },
      breakerOptions,
    );
    this.accountBreaker = createCircuitBreaker(
      "ses.getAccount",
      () => this.fetchAccountHealth(),
      breakerOptions,
    );
  }

  async createIdentity(domainName: string): Promise<IdentityProvisioning> {
    this.logger.info({ domain: domainName }, "Creating SES domain identity");

    const tokens = await this.guard("createIdentity", () => this.createBreaker.fire(domainName));
    const records = dkimRecords(domainName, tokens);

    this.logger.info(
      { domain: domainName, records: records.length },
      "Created SES domain identity",
    );

    return { identityRef: `ses:${this.region}:${domainName}`, records };
  }

  async isVerified(domainName: string): Promise<boolean> {
    const details = await this.getVerificationDetails(domainName);
    return details.verified;
  }

  async getVerificationDetails(domainName: string): Promise<VerificationDetails> {
    try {
      return await this.getBreaker.fire(domainName);
    } catch (err) {
      if (isAwsError(err, "NotFoundException")) {
        this.logger.warn({ domain: domainName }, "Domain identity not found in SES");
        return { verified: false, status: "NOT_FOUND", signingAttributesOrigin: "", tokens: [] };
      }
      throw this.wrap("getIdentity", err);
    }
  }

  async deleteIdentity(domainName: string): Promise<void> {
    this.logger.info({ domain: domainName }, "Deleting SES domain identity");
    try {
      await this.deleteBreaker.fire(domainName);
    } catch (err) {
      if (isAwsError(err, "NotFoundException")) {
        this.logger.warn({ domain: domainName }, "Domain identity already absent in SES");
        return;
      }
      throw this.wrap("deleteIdentity", err);
    }
  }

  async sendEmail(email: OutboundEmail): Promise<string> {
    const input: SendEmailCommandInput = {
      FromEmailAddress: email.from,
      Destination: {
        ToAddresses: email.to,
        ...(email.cc && email.cc.length > 0 ? { CcAddresses: email.cc } : {}),
        ...(email.bcc && email.bcc.length > 0 ? { BccAddresses: email.bcc } : {}),
      },
      ...(email.replyTo && email.replyTo.length > 0 ? { ReplyToAddresses: email.replyTo } : {}),
      Content: {
        Simple: {
          Subject: { Data: email.subject },
          Body: {
            ...(email.html ? { Html: { Data: email.html } } : {}),
            ...(email.text ? { Text: { Data: email.text } } : {}),
          },
          ...(email.headers && Object.keys(email.headers).length > 0
            ? {
                Headers: Object.entries(email.headers).map(([Name, Value]) => ({ Name, Value })),
              }
            : {}),
        },
      },
    };

    const messageId = await this.guard("sendEmail", () => this.sendBreaker.fire(input));
    this.logger.info({ messageId, to: email.to }, "Email sent");
    return messageId;
  }

  async healthCheck(): Promise<ProviderHealth> {
    try {
      return await this.accountBreaker.fire();
    } catch (err) {
      return { healthy: false, issues: [`SES unreachable: ${errorMessage(err)}`] };
    }
  }

  private async createOrFetchTokens(domainName: string): Promise<string[]> {
    try {
      const output = await this.client.send(
        new CreateEmailIdentityCommand({
          EmailIdentity: domainName,
          DkimSigningAttributes: { NextSigningKeyLength: "RSA_2048_BIT" },
        }),
      );
      return output.DkimAttributes?.Tokens ?? [];
    } catch (err) {
      // Left over from an earlier attempt: reuse its tokens.
      if (isAwsError(err, "AlreadyExistsException")) {
        this.logger.warn({ domain: domainName }, "SES identity already exists, reusing it");
        const details = await this.fetchDetails(domainName);
        return details.tokens;
      }
      throw err;
    }
  }

  private async fetchDetails(domainName: string): Promise<VerificationDetails> {
    const output = await this.client.send(new GetEmailIdentityCommand({ EmailIdentity: domainName }));
    const status = output.DkimAttributes?.Status ?? "NOT_STARTED";
    this.logger.debug({ domain: domainName, status }, "DKIM status");
    return {
      verified: status === "SUCCESS",
      status,
      signingAttributesOrigin: output.DkimAttributes?.SigningAttributesOrigin ?? "",
      tokens: output.DkimAttributes?.Tokens ?? [],
    };
  }

  private async fetchAccountHealth(): Promise<ProviderHealth> {
    const account = await this.client.send(new GetAccountCommand({}));
    const issues: string[] = [];
    if (account.SendingEnabled === false) {
      issues.push("SES sending is disabled for this account");
    }
    if (account.ProductionAccessEnabled === false) {
      issues.push("SES account is in sandbox mode");
    }
    if (account.EnforcementStatus && account.EnforcementStatus !== "HEALTHY") {
      issues.push(`SES enforcement status is ${account.EnforcementStatus}`);
    }
    return { healthy: account.SendingEnabled !== false, issues };
  }

  private async guard<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw this.wrap(operation, err);
    }
  }

  private wrap(operation: string, err: unknown): AppError {
    if (AppError.isAppError(err)) return err;
    this.logger.error({ operation, error: errorMessage(err) }, "SES call failed");
    return new ExternalServiceError(`SES ${operation} failed: ${errorMessage(err)}`, SERVICE);
  }
}
