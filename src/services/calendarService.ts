import { randomUUID } from 'crypto';
import { readFile, rename, writeFile } from 'fs/promises';
import { Auth, calendar_v3, google } from 'googleapis';
import { z } from 'zod';
import { describeError, isNbaApiError, NbaApiError } from '../lib/errors';
import type { CalendarEventResponse, CalendarEventSummary, GameEvent } from '../types/calendar';

const PRIMARY_CALENDAR = 'primary';

export interface CalendarService {
  isAuthenticated(): Promise<boolean>;
  listUpcomingEvents(maxResults: number): Promise<CalendarEventSummary[]>;
  addEvent(event: GameEvent): Promise<CalendarEventResponse>;
}

// Authorized-user token file, as written by Google's OAuth client libraries
const storedTokenSchema = z.object({
  token: z.string().optional(),
  refresh_token: z.string().optional(),
  token_uri: z.string().url().optional(),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  scopes: z.array(z.string()).optional(),
  expiry: z.string().optional(),
}).passthrough();

type StoredToken = z.infer<typeof storedTokenSchema>;

interface GoogleSession {
  auth: Auth.OAuth2Client;
  calendar: calendar_v3.Calendar;
}

export interface GoogleCalendarServiceOptions {
  tokenPath: string;
  timeZone: string;
  now?: () => Date;
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return undefined;
  }
  const { response } = error;
  if (typeof response === 'object' && response !== null && 'status' in response && typeof response.status === 'number') {
    return response.status;
  }
  return undefined;
}

/**
 * Google Calendar over the googleapis client. One OAuth2 client is kept per
 * service, so concurrent requests share a single token refresh; refreshed
 * tokens are written back to the token file one at a time.
 */
export class GoogleCalendarService implements CalendarService {
  private readonly now: () => Date;
  private session?: Promise<GoogleSession>;
  private storedToken: StoredToken = {};
  private pendingSave: Promise<void> = Promise.resolve();

  constructor(private readonly options: GoogleCalendarServiceOptions) {
    this.now = options.now ?? (() => new Date());
  }

  private notAuthenticated(reason: string): NbaApiError {
    return new NbaApiError('CALENDAR_NOT_AUTHENTICATED', `Calendar service not authenticated: ${reason}`);
  }

  private async readToken(): Promise<StoredToken> {
    let contents: string;
    try {
      contents = await readFile(this.options.tokenPath, 'utf8');
    } catch (error) {
      throw this.notAuthenticated(`cannot read ${this.options.tokenPath} (${describeError(error)})`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch {
      throw this.notAuthenticated(`${this.options.tokenPath} is not valid JSON`);
    }

    const parsed = storedTokenSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.notAuthenticated(`${this.options.tokenPath} is not an authorized-user token`);
    }
    return parsed.data;
  }

  private async writeToken(token: StoredToken): Promise<void> {
    const temp = `${this.options.tokenPath}.${process.pid}.${randomUUID()}.tmp`;
    await writeFile(temp, JSON.stringify(token, null, 2), 'utf8');
    await rename(temp, this.options.tokenPath);
  }

  private queueTokenSave(tokens: Auth.Credentials): void {
    const updated: StoredToken = {
      ...this.storedToken,
      token: tokens.access_token ?? this.storedToken.token,
      refresh_token: tokens.refresh_token ?? this.storedToken.refresh_token,
      expiry: tokens.expiry_date ? new Date(tokens.expiry_date).toISOString() : undefined,
    };
    this.storedToken = updated;

    this.pendingSave = this.pendingSave
      .then(() => this.writeToken(updated))
      .then(() => console.log('🔑 Saved refreshed Google Calendar token'))
      .catch(error => console.error(`❌ Failed to save refreshed Google Calendar token: ${describeError(error)}`));
  }

  private async openSession(): Promise<GoogleSession> {
    const token = await this.readToken();
    this.storedToken = token;

    const auth = new google.auth.OAuth2({
      clientId: token.client_id,
      clientSecret: token.client_secret,
    });
    const expiry = token.expiry ? Date.parse(token.expiry) : Number.NaN;
    auth.setCredentials({
      access_token: token.token ?? null,
      refresh_token: token.refresh_token ?? null,
      expiry_date: Number.isNaN(expiry) ? null : expiry,
    });
    auth.on('tokens', tokens => this.queueTokenSave(tokens));

    return { auth, calendar: google.calendar({ version: 'v3', auth }) };
  }

  private async getSession(): Promise<GoogleSession> {
    if (!this.session) {
      this.session = this.openSession();
    }
    try {
      return await this.session;
    } catch (error) {
      // A token file that is missing now may be written later
      this.session = undefined;
      throw error;
    }
  }

  /**
   * Session with a usable access token, refreshing it first if it expired
   */
  private async authorize(): Promise<GoogleSession> {
    const session = await this.getSession();

    let accessToken: string | null | undefined;
    try {
      ({ token: accessToken } = await session.auth.getAccessToken());
    } catch (error) {
      throw this.notAuthenticated(`token refresh failed (${describeError(error)})`);
    }
    await this.pendingSave;

    if (!accessToken) {
      throw this.notAuthenticated('no access token available');
    }
    return session;
  }

  private async callCalendar<T>(
    action: string,
    call: (calendar: calendar_v3.Calendar) => Promise<T>
  ): Promise<T> {
    const { calendar } = await this.authorize();
    try {
      return await call(calendar);
    } catch (error) {
      const status = httpStatusOf(error);
      if (status === 401) {
        throw this.notAuthenticated('access token rejected');
      }
      const message = status !== undefined
        ? `Calendar API responded with status ${status}`
        : `Calendar request failed: ${describeError(error)}`;
      throw new NbaApiError('CALENDAR_ERROR', message, action, { cause: error });
    }
  }

  async isAuthenticated(): Promise<boolean> {
    try {
      await this.authorize();
      return true;
    } catch (error) {
      if (isNbaApiError(error, 'CALENDAR_NOT_AUTHENTICATED')) {
        console.warn(`⚠️ ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  async listUpcomingEvents(maxResults: number): Promise<CalendarEventSummary[]> {
    const response = await this.callCalendar('events.list', calendar => calendar.events.list({
      calendarId: PRIMARY_CALENDAR,
      timeMin: this.now().toISOString(),
      maxResults,
      singleEvents: true,
      orderBy: 'startTime',
    }));

    return (response.data.items ?? []).map(event => ({
      id: event.id ?? null,
      summary: event.summary ?? null,
      start: event.start?.dateTime ?? event.start?.date ?? null,
      htmlLink: event.htmlLink ?? null,
    }));
  }

  async addEvent(event: GameEvent): Promise<CalendarEventResponse> {
    for (const value of [event.start_datetime, event.end_datetime]) {
      if (Number.isNaN(Date.parse(value))) {
        throw new NbaApiError('INVALID_PARAMETER', `Invalid event datetime: ${value}`);
      }
    }

    const requestBody: calendar_v3.Schema$Event = {
      summary: event.summary,
      location: event.location ?? '',
      description: event.description ?? '',
      start: { dateTime: event.start_datetime, timeZone: this.options.timeZone },
      end: { dateTime: event.end_datetime, timeZone: this.options.timeZone },
      reminders: {
        useDefault: false,
        overrides: [
          { method: 'email', minutes: 24 * 60 },
          { method: 'popup', minutes: 90 },
        ],
      },
    };

    const response = await this.callCalendar('events.insert', calendar => calendar.events.insert({
      calendarId: PRIMARY_CALENDAR,
      requestBody,
    }));

    console.log(`📅 Created calendar event for game ${event.game_id}`);
    return {
      id: response.data.id ?? null,
      htmlLink: response.data.htmlLink ?? null,
      status: 'created',
    };
  }
}
