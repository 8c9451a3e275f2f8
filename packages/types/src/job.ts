export type JobType = "domain-setup" | "domain-verify" | "cleanup-sent-emails" | "cleanup-revoked-keys";

export interface JobData {
  type: JobType;
}

export interface DomainSetupJobData extends JobData {
  type: "domain-setup";
  domainId: string;
}

export interface DomainVerifyJobData extends JobData {
  type: "domain-verify";
}

export interface CleanupSentEmailsJobData extends JobData {
  type: "cleanup-sent-emails";
}

export interface CleanupRevokedKeysJobData extends JobData {
  type: "cleanup-revoked-keys";
}

export type AnyJobData =
  | DomainSetupJobData
  | DomainVerifyJobData
  | CleanupSentEmailsJobData
  | CleanupRevokedKeysJobData;

export interface SweepResult {
  processed: number;
  batches: number;
  durationMs: number;
  /** True when the run stopped at the per-run batch cap or on abort. */
  incomplete: boolean;
}
