import { google } from "googleapis";
import type { calendar_v3 } from "googleapis";
import { config } from "./config.js";
import { CalendarEventBody, CalendarEventRef, Credential } from "./types.js";
import { toUpstreamError } from "./upstream.js";

/**
 * Calendar operations the reconciler depends on.
 */
export interface CalendarGateway {
  createEvent(credential: Credential, calendarId: string, body: CalendarEventBody): Promise<CalendarEventRef>;
  updateEvent(
    credential: Credential,
    calendarId: string,
    eventId: string,
    body: CalendarEventBody
  ): Promise<CalendarEventRef>;
}

export interface GoogleCalendarClientOptions {
  clientId?: string;
  clientSecret?: string;
  timeoutMs?: number;
}

function toEventRef(event: calendar_v3.Schema$Event): CalendarEventRef {
  if (!event.id) {
    throw new Error("Google Calendar response is missing the event id");
  }

  return {
    id: event.id,
    htmlLink: event.htmlLink ?? ""
  };
}

export class GoogleCalendarClient implements CalendarGateway {
  private readonly clientId: string | undefined;
  private readonly clientSecret: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: GoogleCalendarClientOptions = {}) {
    this.clientId = options.clientId ?? config.GOOGLE_CLIENT_ID;
    this.clientSecret = options.clientSecret ?? config.GOOGLE_CLIENT_SECRET;
    this.timeoutMs = options.timeoutMs ?? config.UPSTREAM_TIMEOUT_MS;
  }

  protected getCalendar(credential: Credential): calendar_v3.Calendar {
    const auth = new google.auth.OAuth2(this.clientId, this.clientSecret);
    auth.setCredentials({
      access_token: credential.accessToken,
      refresh_token: credential.refreshToken,
      expiry_date: credential.expiresAt ?? undefined
    });
    return google.calendar({ version: "v3", auth });
  }

  async createEvent(credential: Credential, calendarId: string, body: CalendarEventBody): Promise<CalendarEventRef> {
    try {
      const response = await this.getCalendar(credential).events.insert(
        { calendarId, requestBody: body },
        { timeout: this.timeoutMs }
      );
      return toEventRef(response.data);
    } catch (error) {
      throw toUpstreamError(error, "Google Calendar event insert");
    }
  }

  async updateEvent(
    credential: Credential,
    calendarId: string,
    eventId: string,
    body: CalendarEventBody
  ): Promise<CalendarEventRef> {
    try {
      const response = await this.getCalendar(credential).events.update(
        { calendarId, eventId, requestBody: body },
        { timeout: this.timeoutMs }
      );
      return toEventRef(response.data);
    } catch (error) {
      throw toUpstreamError(error, "Google Calendar event update");
    }
  }
}
