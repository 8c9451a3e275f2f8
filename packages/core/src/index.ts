export type {
  ApiKeyStore,
  AuditRecord,
  AuditStore,
  DomainListQuery,
  DomainStore,
  NewApiKey,
  NewDomain,
  SentEmailStore,
} from "./stores.interface.js";

export { serializeDnsRecords, parseDnsRecords } from "./dns-records.js";
export { domainNameSchema, normalizeDomainName, isValidDomainName } from "./domain-name.js";
export { parseInput } from "./validation.js";
export {
  parseSender,
  isValidRecipient,
  isValidSenderPrefix,
  assertRecipients,
  type ParsedSender,
} from "./email-address.js";

export { AuditRecorder } from "./audit-recorder.js";
export type { AuditSink, AuditRecorderOptions } from "./audit-recorder.js";

export { DomainService } from "./domain-service.js";
export type { DomainServiceDependencies, SetupDispatcher } from "./domain-service.js";

export { DomainVerificationService } from "./domain-verification.js";
export type {
  DomainVerificationDependencies,
  DomainDiagnostics,
  PollSummary,
  RecordDiagnostics,
} from "./domain-verification.js";

export {
  ApiKeyService,
  createApiKeySchema,
  getApiKeyState,
} from "./api-key-service.js";
export type { ApiKeyServiceDependencies, CreatedApiKey } from "./api-key-service.js";

export {
  EmailService,
  MAX_BATCH_SIZE,
  MAX_RECIPIENTS,
  decodeCursor,
  encodeCursor,
  listEmailsSchema,
  sendEmailSchema,
  testEmailSchema,
} from "./email-service.js";
export type {
  BatchResult,
  BatchValidationMode,
  EmailServiceDependencies,
} from "./email-service.js";

export {
  sweepSentEmails,
  archiveRevokedKeys,
  nextChunkSize,
  SENT_EMAIL_SWEEP,
  KEY_ARCHIVE_SWEEP,
} from "./sweeps.js";
export type { SentEmailSweepOptions, KeyArchiveSweepOptions } from "./sweeps.js";
