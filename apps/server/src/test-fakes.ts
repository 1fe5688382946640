import { ClassroomGateway } from "./classroom-client.js";
import { IdentityProvider } from "./credential-store.js";
import { CalendarGateway } from "./google-calendar-client.js";
import { AssignmentDefinition, CalendarEventBody, CalendarEventRef, Credential } from "./types.js";

export interface RecordedCalendarCall {
  operation: "create" | "update";
  accessToken: string;
  calendarId: string;
  eventId?: string;
  body: CalendarEventBody;
}

export class FakeCalendar implements CalendarGateway {
  public readonly calls: RecordedCalendarCall[] = [];
  /** Access tokens whose calls should fail. */
  public readonly failingTokens = new Set<string>();
  public delayMs = 0;
  private sequence = 0;

  private async settle(accessToken: string): Promise<void> {
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.failingTokens.has(accessToken)) {
      const error = new Error("Backend Error");
      Object.assign(error, { response: { status: 503 } });
      throw error;
    }
  }

  async createEvent(credential: Credential, calendarId: string, body: CalendarEventBody): Promise<CalendarEventRef> {
    this.calls.push({ operation: "create", accessToken: credential.accessToken, calendarId, body });
    await this.settle(credential.accessToken);
    this.sequence += 1;
    const id = `evt-${this.sequence}`;
    return { id, htmlLink: `https://calendar.google.com/event?eid=${id}` };
  }

  async updateEvent(
    credential: Credential,
    calendarId: string,
    eventId: string,
    body: CalendarEventBody
  ): Promise<CalendarEventRef> {
    this.calls.push({ operation: "update", accessToken: credential.accessToken, calendarId, eventId, body });
    await this.settle(credential.accessToken);
    return { id: eventId, htmlLink: `https://calendar.google.com/event?eid=${eventId}` };
  }

  count(operation: "create" | "update"): number {
    return this.calls.filter((call) => call.operation === operation).length;
  }
}

export class FakeIdentityProvider implements IdentityProvider {
  public readonly refreshCalls: string[] = [];
  public readonly exchangeCalls: string[] = [];
  public refreshFailure: Error | null = null;
  public refreshedCredential: Credential = {
    accessToken: "refreshed-access-token",
    expiresAt: Date.parse("2026-03-01T13:00:00.000Z"),
    updatedAt: "2026-03-01T12:00:00.000Z"
  };

  async exchangeCode(code: string): Promise<Credential> {
    this.exchangeCalls.push(code);
    return {
      accessToken: `access-for-${code}`,
      refreshToken: `refresh-for-${code}`,
      expiresAt: Date.parse("2026-03-01T13:00:00.000Z"),
      updatedAt: "2026-03-01T12:00:00.000Z"
    };
  }

  async refresh(refreshToken: string): Promise<Credential> {
    this.refreshCalls.push(refreshToken);
    if (this.refreshFailure) {
      throw this.refreshFailure;
    }
    return { ...this.refreshedCredential };
  }
}

export class FakeClassroom implements ClassroomGateway {
  public calls = 0;
  public failure: Error | null = null;

  constructor(public assignments: AssignmentDefinition[] = []) {}

  async listAssignments(): Promise<AssignmentDefinition[]> {
    this.calls += 1;
    if (this.failure) {
      throw this.failure;
    }
    return this.assignments.map((assignment) => ({ ...assignment }));
  }
}

export function validCredential(accessToken: string): Credential {
  return {
    accessToken,
    refreshToken: `refresh-${accessToken}`,
    expiresAt: null,
    updatedAt: "2026-03-01T12:00:00.000Z"
  };
}
