export { domains, domainStatusEnum } from "./domains.js";
export { apiKeys, apiKeyDomains } from "./api-keys.js";
export { revokedApiKeys } from "./revoked-api-keys.js";
export { auditLogs } from "./audit-logs.js";
export { sentEmails } from "./sent-emails.js";
