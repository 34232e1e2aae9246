import type { ToolSpec } from "../../types/tools.js";
import { MissingField } from "../../errors.js";

export interface CalendarEventRequest {
  date: string;
  start_time: string;
  session_name: string;
  duration_minutes?: number;
}

export interface CalendarEvent {
  event_id: string;
  title: string;
  date: string;
  start_time: string;
  duration_minutes: number;
}

export type CalendarTool = ToolSpec<CalendarEventRequest, CalendarEvent>;

// Stub: echoes the session with a derived id. A real calendar client plugs in through buildToolRegistry.
export const createCalendarEvent: CalendarTool = {
  name: "create_calendar_event",
  description: "Create one calendar entry for a scheduled workout session",
  invoke(args) {
    const duration = args.duration_minutes;
    if (duration === undefined) throw new MissingField("duration_minutes");
    return {
      event_id: `evt_${args.date}_${args.start_time}`,
      title: args.session_name,
      date: args.date,
      start_time: args.start_time,
      duration_minutes: duration
    };
  }
};
