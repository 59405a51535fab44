export interface GameEvent {
  summary: string;
  location?: string | null;
  description?: string | null;
  start_datetime: string;
  end_datetime: string;
  game_id: number;
  home_team: string;
  visitor_team: string;
}

export interface CalendarEventResponse {
  id: string | null;
  htmlLink: string | null;
  status: 'created';
}

export interface CalendarEventSummary {
  id: string | null;
  summary: string | null;
  start: string | null;
  htmlLink: string | null;
}

export interface CalendarAuthStatus {
  authenticated: boolean;
  message: string;
}
