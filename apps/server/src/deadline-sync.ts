import { AssignmentCache } from "./assignment-cache.js";
import { isAccepted, matchAssignment } from "./assignment-matcher.js";
import { CredentialStore } from "./credential-store.js";
import { AssignmentNotFoundError, toSyncFailure } from "./errors.js";
import { EventReconciler } from "./event-reconciler.js";
import { SyncStore } from "./store.js";
import { StudentIdentityStrategy, ownerStrategy } from "./student-identity.js";
import {
  AssignmentCacheSnapshot,
  AssignmentDefinition,
  EventMapping,
  RepositoryEvent,
  SweepPairFailure,
  SweepResult,
  WebhookOutcome
} from "./types.js";
import { isRepositoryCreation } from "./webhook.js";
import { nowIso } from "./utils.js";

export interface DeadlineSyncDependencies {
  store: SyncStore;
  credentials: CredentialStore;
  assignments: AssignmentCache;
  reconciler: EventReconciler;
  identityStrategy?: StudentIdentityStrategy;
}

/**
 * Drives deadline reconciliation from webhook deliveries and from a
 * periodic sweep over every connected student and accepted assignment.
 */
export class DeadlineSyncService {
  private readonly store: SyncStore;
  private readonly credentials: CredentialStore;
  private readonly assignments: AssignmentCache;
  private readonly reconciler: EventReconciler;
  private readonly identityStrategy: StudentIdentityStrategy;
  private sweepInterval: ReturnType<typeof setInterval> | null = null;
  private sweepInFlight: Promise<SweepResult> | null = null;
  private lastSweep: SweepResult | null = null;

  constructor(dependencies: DeadlineSyncDependencies) {
    this.store = dependencies.store;
    this.credentials = dependencies.credentials;
    this.assignments = dependencies.assignments;
    this.reconciler = dependencies.reconciler;
    this.identityStrategy = dependencies.identityStrategy ?? ownerStrategy;
  }

  /**
   * Start the periodic sweep (every 10 minutes unless told otherwise)
   */
  start(intervalMs: number = 10 * 60 * 1000): void {
    if (this.sweepInterval) {
      return;
    }

    void this.runScheduledSweep();

    this.sweepInterval = setInterval(() => {
      void this.runScheduledSweep();
    }, intervalMs);
  }

  private async runScheduledSweep(): Promise<void> {
    try {
      await this.runSweep();
    } catch (error) {
      console.error("[deadline-sync] scheduled sweep crashed", error);
    }
  }

  stop(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
  }

  isRunning(): boolean {
    return this.sweepInterval !== null;
  }

  getLastSweep(): SweepResult | null {
    return this.lastSweep;
  }

  async handleWebhook(event: RepositoryEvent): Promise<WebhookOutcome> {
    if (!isRepositoryCreation(event)) {
      return { status: "ignored", reason: "unsupported-event", repositoryName: event.repositoryName };
    }

    let student: string | null = null;
    let slug: string | undefined;

    try {
      const assignments = await this.assignments.getAssignments();
      const assignment = matchAssignment(event.repositoryName, assignments);
      slug = assignment?.slug;

      student = this.identityStrategy.extract(event, assignment);
      if (!student) {
        console.warn(`[deadline-sync] no student identity for repository ${event.repositoryName}`);
        return { status: "ignored", reason: "no-student", repositoryName: event.repositoryName };
      }

      if (!assignment) {
        throw new AssignmentNotFoundError(event.repositoryName);
      }

      if (!isAccepted(assignment)) {
        console.warn(`[deadline-sync] ${assignment.slug} has no accepted students yet; skipping ${student}`);
        return { status: "ignored", reason: "assignment-not-accepted", repositoryName: event.repositoryName };
      }

      const link = await this.reconciler.reconcile(student, assignment);
      console.info(`[deadline-sync] ${link.action} event ${link.eventId} for ${student}/${assignment.slug}`);
      return { status: "synced", student, slug: assignment.slug, link };
    } catch (error) {
      const failure = toSyncFailure(error);
      console.error(`[deadline-sync] webhook sync failed for ${event.repositoryName}`, error);
      return {
        status: "failed",
        student: student ?? undefined,
        slug,
        error: failure
      };
    }
  }

  /**
   * Run a sweep, or join the one already in progress.
   */
  async runSweep(): Promise<SweepResult> {
    if (this.sweepInFlight) {
      return this.sweepInFlight;
    }

    this.sweepInFlight = this.executeSweep();
    try {
      const result = await this.sweepInFlight;
      this.lastSweep = result;
      return result;
    } finally {
      this.sweepInFlight = null;
    }
  }

  async triggerSweep(): Promise<SweepResult> {
    return this.runSweep();
  }

  private async executeSweep(): Promise<SweepResult> {
    const startedAt = nowIso();
    const students = this.credentials.listStudents();

    let accepted: AssignmentDefinition[];
    try {
      accepted = (await this.assignments.getAssignments()).filter(isAccepted);
    } catch (error) {
      console.error("[deadline-sync] sweep aborted: assignment listing unavailable", error);
      return {
        success: false,
        startedAt,
        finishedAt: nowIso(),
        studentsCount: students.length,
        assignmentsCount: 0,
        created: 0,
        updated: 0,
        failures: [],
        error: toSyncFailure(error)
      };
    }

    let created = 0;
    let updated = 0;
    const failures: SweepPairFailure[] = [];

    for (const student of students) {
      for (const assignment of accepted) {
        try {
          const link = await this.reconciler.reconcile(student, assignment);
          if (link.action === "created") {
            created += 1;
          } else {
            updated += 1;
          }
        } catch (error) {
          const failure = toSyncFailure(error);
          console.error(
            `[deadline-sync] sweep failed for ${student}/${assignment.slug}: ${failure.code} ${failure.message}`
          );
          failures.push({ student, slug: assignment.slug, ...failure });
        }
      }
    }

    console.info(
      `[deadline-sync] sweep finished students=${students.length} assignments=${accepted.length} ` +
        `created=${created} updated=${updated} failed=${failures.length}`
    );

    return {
      success: true,
      startedAt,
      finishedAt: nowIso(),
      studentsCount: students.length,
      assignmentsCount: accepted.length,
      created,
      updated,
      failures
    };
  }

  /**
   * Mappings whose assignment no longer appears upstream. Reported only.
   */
  async findOrphanedMappings(): Promise<EventMapping[]> {
    const slugs = new Set((await this.assignments.getAssignments()).map((assignment) => assignment.slug));
    return this.store.listEventMappings().filter((mapping) => !slugs.has(mapping.slug));
  }

  invalidateAssignments(): void {
    this.assignments.invalidate();
  }

  getAssignmentSnapshot(): AssignmentCacheSnapshot {
    return this.assignments.snapshot();
  }

  listMappings(): EventMapping[] {
    return this.store.listEventMappings();
  }

  listStudents(): string[] {
    return this.credentials.listStudents();
  }
}
