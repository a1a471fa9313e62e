import { google, type Auth, type calendar_v3 } from "googleapis";
import {
  GatewayError,
  MANAGED_PROPERTY,
  MANAGED_VALUE,
  errorMessage,
  type CalendarEvent,
  type CalendarGateway,
  type DateRange,
  type EventPatch
} from "@schedule-sync/core";

const PAGE_SIZE = 2500;

export type CalendarSummary = {
  id: string;
  summary: string;
  primary: boolean;
  accessRole: string;
};

export type Page<T> = {
  items: T[];
  nextPageToken?: string | null;
};

function wrap(action: string, error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  return new GatewayError(`Failed to ${action}: ${errorMessage(error)}`, error);
}

/** Follows page tokens until the listing is exhausted. */
export async function collectPages<T>(fetchPage: (pageToken?: string) => Promise<Page<T>>): Promise<T[]> {
  const items: T[] = [];
  const seen = new Set<string>();
  let pageToken: string | undefined;

  do {
    const page = await fetchPage(pageToken);
    items.push(...page.items);
    pageToken = page.nextPageToken ?? undefined;
    if (pageToken) {
      if (seen.has(pageToken)) {
        throw new GatewayError(`Calendar API repeated page token ${pageToken}`);
      }
      seen.add(pageToken);
    }
  } while (pageToken);

  return items;
}

function privateProperties(event: calendar_v3.Schema$Event): Record<string, string> | undefined {
  const properties = event.extendedProperties?.private;
  if (!properties) {
    return undefined;
  }
  return { ...properties };
}

/** All-day and id-less events are never ours and are dropped. */
export function fromGoogleEvent(event: calendar_v3.Schema$Event): CalendarEvent | null {
  const start = event.start?.dateTime;
  const end = event.end?.dateTime;
  if (!event.id || !start || !end) {
    return null;
  }

  const converted: CalendarEvent = {
    id: event.id,
    summary: event.summary ?? "",
    start: { dateTime: start, timeZone: event.start?.timeZone ?? undefined },
    end: { dateTime: end, timeZone: event.end?.timeZone ?? undefined }
  };
  if (event.description) {
    converted.description = event.description;
  }
  if (event.colorId) {
    converted.colorId = event.colorId;
  }
  if (event.status) {
    converted.status = event.status;
  }
  const properties = privateProperties(event);
  if (properties) {
    converted.extendedProperties = { private: properties };
  }
  return converted;
}

export function toGoogleEvent(event: CalendarEvent): calendar_v3.Schema$Event {
  return {
    summary: event.summary,
    description: event.description,
    colorId: event.colorId,
    start: { ...event.start },
    end: { ...event.end },
    extendedProperties: event.extendedProperties?.private ? { private: { ...event.extendedProperties.private } } : undefined
  };
}

export class GoogleCalendarGateway implements CalendarGateway {
  constructor(
    private readonly calendar: calendar_v3.Calendar,
    readonly calendarId: string = "primary"
  ) {}

  static create(auth: Auth.GoogleAuth | Auth.OAuth2Client, calendarId?: string): GoogleCalendarGateway {
    return new GoogleCalendarGateway(google.calendar({ version: "v3", auth }), calendarId);
  }

  async listEvents(args: { range?: DateRange; managedOnly: boolean }): Promise<CalendarEvent[]> {
    try {
      const items = await collectPages<calendar_v3.Schema$Event>(async (pageToken) => {
        const response = await this.calendar.events.list({
          calendarId: this.calendarId,
          timeMin: args.range?.timeMin,
          timeMax: args.range?.timeMax,
          singleEvents: true,
          maxResults: PAGE_SIZE,
          pageToken,
          privateExtendedProperty: args.managedOnly ? [`${MANAGED_PROPERTY}=${MANAGED_VALUE}`] : undefined
        });
        return { items: response.data.items ?? [], nextPageToken: response.data.nextPageToken };
      });
      return items.flatMap((item) => {
        const event = fromGoogleEvent(item);
        return event ? [event] : [];
      });
    } catch (error) {
      throw wrap(`list events in ${this.calendarId}`, error);
    }
  }

  async insert(event: CalendarEvent): Promise<string> {
    let id: string | null | undefined;
    try {
      const response = await this.calendar.events.insert({
        calendarId: this.calendarId,
        requestBody: toGoogleEvent(event)
      });
      id = response.data.id;
    } catch (error) {
      throw wrap(`insert "${event.summary}"`, error);
    }
    if (!id) {
      throw new GatewayError(`Calendar API returned no id for "${event.summary}"`);
    }
    return id;
  }

  async patch(id: string, fields: EventPatch): Promise<void> {
    try {
      await this.calendar.events.patch({
        calendarId: this.calendarId,
        eventId: id,
        requestBody: { ...fields }
      });
    } catch (error) {
      throw wrap(`patch event ${id}`, error);
    }
  }

  async delete(id: string): Promise<void> {
    try {
      await this.calendar.events.delete({ calendarId: this.calendarId, eventId: id });
    } catch (error) {
      throw wrap(`delete event ${id}`, error);
    }
  }

  async listCalendars(): Promise<CalendarSummary[]> {
    try {
      const items = await collectPages<calendar_v3.Schema$CalendarListEntry>(async (pageToken) => {
        const response = await this.calendar.calendarList.list({ pageToken });
        return { items: response.data.items ?? [], nextPageToken: response.data.nextPageToken };
      });
      return items.flatMap((item) =>
        item.id
          ? [
              {
                id: item.id,
                summary: item.summaryOverride ?? item.summary ?? item.id,
                primary: item.primary === true,
                accessRole: item.accessRole ?? "unknown"
              }
            ]
          : []
      );
    } catch (error) {
      throw wrap("list calendars", error);
    }
  }
}
