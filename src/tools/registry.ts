import { createCalendarEvent, type CalendarTool } from "./calendar/create_event.js";

export interface ToolRegistry {
  create_calendar_event: CalendarTool;
}

export function buildToolRegistry(overrides: Partial<ToolRegistry> = {}): ToolRegistry {
  return {
    create_calendar_event: createCalendarEvent,
    ...overrides
  };
}
