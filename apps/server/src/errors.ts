import { SyncErrorCode, SyncFailure } from "./types.js";

export class DeadlineSyncError extends Error {
  constructor(
    message: string,
    public readonly code: SyncErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "DeadlineSyncError";
  }
}

export class NotAuthenticatedError extends DeadlineSyncError {
  constructor(public readonly student: string) {
    super(`No Google credential stored for ${student}. Student must log in.`, "NOT_AUTHENTICATED");
    this.name = "NotAuthenticatedError";
  }
}

export class CredentialExpiredError extends DeadlineSyncError {
  constructor(
    public readonly student: string,
    reason = "no refresh token available",
    cause?: unknown
  ) {
    super(`Google credential for ${student} expired: ${reason}`, "CREDENTIAL_EXPIRED", cause);
    this.name = "CredentialExpiredError";
  }
}

export class UpstreamUnavailableError extends DeadlineSyncError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super(message, "UPSTREAM_UNAVAILABLE", cause);
    this.name = "UpstreamUnavailableError";
  }
}

export class AssignmentNotFoundError extends DeadlineSyncError {
  constructor(public readonly repositoryName: string) {
    super(`No classroom assignment matches repository ${repositoryName}`, "ASSIGNMENT_NOT_FOUND");
    this.name = "AssignmentNotFoundError";
  }
}

export class InvalidDeadlineError extends DeadlineSyncError {
  constructor(public readonly deadline: string) {
    super(`Invalid deadline: ${JSON.stringify(deadline)}`, "INVALID_DEADLINE");
    this.name = "InvalidDeadlineError";
  }
}

export class InvalidEventPayloadError extends DeadlineSyncError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, "INVALID_EVENT_PAYLOAD");
    this.name = "InvalidEventPayloadError";
  }
}

export function toSyncFailure(error: unknown): SyncFailure {
  if (error instanceof DeadlineSyncError) {
    return { code: error.code, message: error.message };
  }

  return {
    code: "INTERNAL",
    message: error instanceof Error ? error.message : "Unknown error"
  };
}
