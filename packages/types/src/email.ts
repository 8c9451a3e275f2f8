export interface SendEmailInput {
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

export interface SentEmail {
  id: string;
  messageId: string;
  sentAt: Date;
  fromAddress: string;
  toAddresses: string[];
  ccAddresses: string[] | null;
  bccAddresses: string[] | null;
  replyTo: string[] | null;
  subject: string;
  htmlBody: string | null;
  textBody: string | null;
  domainId: string;
  apiKeyId: string | null;
}

export type SentEmailSummary = Pick<
  SentEmail,
  "id" | "messageId" | "sentAt" | "fromAddress" | "toAddresses" | "subject" | "domainId" | "apiKeyId"
>;

export interface SentEmailCursor {
  id: string;
  sentAt: Date;
}

export interface SentEmailQuery {
  /** Restrict to these domains; "all" for admins. */
  domainIds: string[] | "all";
  domainId?: string;
  from?: Date;
  to?: Date;
  cursor?: SentEmailCursor;
  limit: number;
}
