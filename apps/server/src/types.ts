export type StudentIdentity = string;

export interface Credential {
  accessToken: string;
  refreshToken?: string;
  /** Epoch milliseconds; null when the provider reported no expiry. */
  expiresAt: number | null;
  scope?: string;
  updatedAt: string;
}

export interface AssignmentDefinition {
  slug: string;
  title: string;
  deadline: string | null;
  acceptedCount: number;
}

export interface AssignmentCacheSnapshot {
  assignments: AssignmentDefinition[];
  fetchedAt: string | null;
}

export interface EventMapping {
  student: StudentIdentity;
  slug: string;
  eventId: string;
  htmlLink: string;
  createdAt: string;
  updatedAt: string;
}

export type EventTimeRange =
  | { kind: "all-day"; date: string }
  | { kind: "timed"; start: string; end: string; timeZone: string };

export type CalendarEventTime =
  | { date: string }
  | { dateTime: string; timeZone: string };

export interface CalendarEventBody {
  summary: string;
  description: string;
  start: CalendarEventTime;
  end: CalendarEventTime;
}

export interface CalendarEventRef {
  id: string;
  htmlLink: string;
}

export type ReconcileAction = "created" | "updated";

export interface CalendarEventLink {
  eventId: string;
  htmlLink: string;
  action: ReconcileAction;
}

export interface RepositoryEvent {
  eventName: string;
  action: string;
  repositoryName: string;
  ownerLogin: string | null;
  createdAt: string | null;
}

export type SyncErrorCode =
  | "NOT_AUTHENTICATED"
  | "CREDENTIAL_EXPIRED"
  | "UPSTREAM_UNAVAILABLE"
  | "ASSIGNMENT_NOT_FOUND"
  | "INVALID_DEADLINE"
  | "INVALID_EVENT_PAYLOAD"
  | "INTERNAL";

export interface SyncFailure {
  code: SyncErrorCode;
  message: string;
}

export type WebhookIgnoreReason = "unsupported-event" | "no-student" | "assignment-not-accepted";

export type WebhookOutcome =
  | { status: "synced"; student: StudentIdentity; slug: string; link: CalendarEventLink }
  | { status: "ignored"; reason: WebhookIgnoreReason; repositoryName?: string }
  | { status: "failed"; student?: StudentIdentity; slug?: string; error: SyncFailure };

export interface SweepPairFailure extends SyncFailure {
  student: StudentIdentity;
  slug: string;
}

export interface SweepResult {
  success: boolean;
  startedAt: string;
  finishedAt: string;
  studentsCount: number;
  assignmentsCount: number;
  created: number;
  updated: number;
  failures: SweepPairFailure[];
  error?: SyncFailure;
}
