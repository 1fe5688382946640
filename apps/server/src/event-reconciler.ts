import { CredentialStore } from "./credential-store.js";
import { normalizeDeadline, toCalendarEventTimes } from "./deadline-normalizer.js";
import { CalendarGateway } from "./google-calendar-client.js";
import { KeyedLock } from "./keyed-lock.js";
import { SyncStore } from "./store.js";
import { AssignmentDefinition, CalendarEventBody, CalendarEventLink, EventTimeRange, StudentIdentity } from "./types.js";
import { toUpstreamError } from "./upstream.js";
import { Clock, pairKey, systemClock } from "./utils.js";

export interface EventReconcilerOptions {
  calendarId?: string;
  timeZone?: string;
  displayDurationMinutes?: number;
  now?: Clock;
}

export function buildEventBody(assignment: AssignmentDefinition, range: EventTimeRange): CalendarEventBody {
  const { start, end } = toCalendarEventTimes(range);
  const deadlineNote = assignment.deadline ? `Deadline: ${assignment.deadline}` : "No deadline published yet.";

  return {
    summary: `${assignment.title} due`,
    description: `GitHub Classroom assignment "${assignment.title}" (${assignment.slug}).\n${deadlineNote}`,
    start,
    end
  };
}

/**
 * Keeps one calendar event per (student, assignment) in line with the
 * assignment's current deadline. The mapping lookup and the create/update
 * that follows run under a lock keyed by the pair.
 */
export class EventReconciler {
  private readonly store: SyncStore;
  private readonly credentials: CredentialStore;
  private readonly calendar: CalendarGateway;
  private readonly lock = new KeyedLock();
  private readonly calendarId: string;
  private readonly timeZone: string | undefined;
  private readonly displayDurationMinutes: number;
  private readonly now: Clock;

  constructor(
    store: SyncStore,
    credentials: CredentialStore,
    calendar: CalendarGateway,
    options: EventReconcilerOptions = {}
  ) {
    this.store = store;
    this.credentials = credentials;
    this.calendar = calendar;
    this.calendarId = options.calendarId ?? "primary";
    this.timeZone = options.timeZone;
    this.displayDurationMinutes = options.displayDurationMinutes ?? 0;
    this.now = options.now ?? systemClock;
  }

  async reconcile(student: StudentIdentity, assignment: AssignmentDefinition): Promise<CalendarEventLink> {
    return this.lock.runExclusive(pairKey(student, assignment.slug), async () => {
      const credential = await this.credentials.ensureValid(student);
      const range = normalizeDeadline(assignment.deadline, {
        timeZone: this.timeZone,
        displayDurationMinutes: this.displayDurationMinutes,
        now: this.now
      });
      const body = buildEventBody(assignment, range);
      const timestamp = new Date(this.now()).toISOString();
      const existing = this.store.getEventMapping(student, assignment.slug);

      if (existing) {
        const updated = await this.callCalendar("update", () =>
          this.calendar.updateEvent(credential, this.calendarId, existing.eventId, body)
        );
        const htmlLink = updated.htmlLink || existing.htmlLink;
        this.store.setEventMapping({ ...existing, htmlLink, updatedAt: timestamp });
        return { eventId: existing.eventId, htmlLink, action: "updated" };
      }

      const created = await this.callCalendar("insert", () =>
        this.calendar.createEvent(credential, this.calendarId, body)
      );
      this.store.setEventMapping({
        student,
        slug: assignment.slug,
        eventId: created.id,
        htmlLink: created.htmlLink,
        createdAt: timestamp,
        updatedAt: timestamp
      });
      return { eventId: created.id, htmlLink: created.htmlLink, action: "created" };
    });
  }

  private async callCalendar<T>(operation: "insert" | "update", call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw toUpstreamError(error, `Google Calendar event ${operation}`);
    }
  }
}
