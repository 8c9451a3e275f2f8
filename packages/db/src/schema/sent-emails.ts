import { index, jsonb, pgTable, text, timestamp } from "drizzle-orm/pg-core";
import { domains } from "./domains.js";

export const sentEmails = pgTable(
  "sent_emails",
  {
    id: text("id").primaryKey(),
    messageId: text("message_id").notNull(),
    sentAt: timestamp("sent_at", { withTimezone: true }).notNull().defaultNow(),
    fromAddress: text("from_address").notNull(),
    toAddresses: jsonb("to_addresses").notNull().$type<string[]>(),
    ccAddresses: jsonb("cc_addresses").$type<string[]>(),
    bccAddresses: jsonb("bcc_addresses").$type<string[]>(),
    replyTo: jsonb("reply_to").$type<string[]>(),
    subject: text("subject").notNull(),
    htmlBody: text("html_body"),
    textBody: text("text_body"),
    domainId: text("domain_id")
      .notNull()
      .references(() => domains.id, { onDelete: "cascade" }),
    // Null for sends made from an admin session
    apiKeyId: text("api_key_id"),
  },
  (t) => [
    index("sent_emails_sent_at_id_idx").on(t.sentAt.desc(), t.id.desc()),
    index("sent_emails_domain_id_idx").on(t.domainId),
  ],
);
