import type { ProviderHealth } from "./identity-provider.interface.js";

export interface OutboundEmail {
  from: string;
  to: string[];
  subject: string;
  html?: string;
  text?: string;
  cc?: string[];
  bcc?: string[];
  replyTo?: string[];
  headers?: Record<string, string>;
}

export interface IEmailSender {
  readonly name: string;

  /** Returns the provider's message id. */
  sendEmail(email: OutboundEmail): Promise<string>;
  healthCheck(): Promise<ProviderHealth>;
}
