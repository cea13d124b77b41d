// src/services/integrations/appleCalendar.ts
// macOS Calendar adapter (osascript)

import { errorMessage } from "../../domain/errors";
import { isDateOnly, isTimeOfDay } from "../../utils/date";
import { escapeAppleScript, FIELD_SEPARATOR, ScriptRunner } from "./appleScript";
import {
  CalendarEvent,
  CalendarGateway,
  CollaboratorOutcome,
  EventWindow,
  ScheduledEvent,
} from "./types";

export class AppleCalendar implements CalendarGateway {
  constructor(
    private readonly calendarName: string,
    private readonly runScript: ScriptRunner
  ) {}

  async scheduleEvent(
    title: string,
    date: string,
    time: string
  ): Promise<CollaboratorOutcome<ScheduledEvent>> {
    if (!isDateOnly(date) || !isTimeOfDay(time)) {
      return { success: false, error: `Invalid date/time: ${date} ${time}` };
    }
    const [year, month, day] = date.split("-").map(Number);
    const [hour, minute] = time.split(":").map(Number);

    // day is reset to 1 first so that changing the month cannot overflow
    // (e.g. Jan 31 -> "Feb 31" -> Mar 3)
    const script = `
    tell application "Calendar"
        set targetCalendar to first calendar whose name is "${escapeAppleScript(this.calendarName)}"

        set eventDate to current date
        set day of eventDate to 1
        set year of eventDate to ${year}
        set month of eventDate to ${month}
        set day of eventDate to ${day}
        set hours of eventDate to ${hour}
        set minutes of eventDate to ${minute}
        set seconds of eventDate to 0

        set endDate to eventDate + (1 * hours)

        make new event at end of events of targetCalendar with properties {summary:"${escapeAppleScript(title)}", start date:eventDate, end date:endDate}
    end tell
    return "success"
    `;

    try {
      await this.runScript(script);
      console.log(`[AppleCalendar] Scheduled "${title}" on ${date} ${time}`);
      return { success: true, title, date, time, calendar: this.calendarName };
    } catch (err) {
      console.error(`[AppleCalendar] Failed to schedule "${title}":`, errorMessage(err));
      return { success: false, error: errorMessage(err) };
    }
  }

  async listEvents(window: EventWindow): Promise<CollaboratorOutcome<{ events: CalendarEvent[] }>> {
    const script = `
    set startDate to current date
    set time of startDate to 0
    set startDate to startDate - (${window.pastDays} * days)
    set endDate to startDate + (${window.pastDays + window.days} * days)

    set output to ""
    tell application "Calendar"
        set targetCalendar to first calendar whose name is "${escapeAppleScript(this.calendarName)}"
        set eventList to (every event of targetCalendar whose start date >= startDate and start date < endDate)
        repeat with evt in eventList
            set evtTitle to summary of evt
            set evtStart to start date of evt
            set dateStr to (year of evtStart as string) & "-" & text -2 thru -1 of ("0" & ((month of evtStart as number) as string)) & "-" & text -2 thru -1 of ("0" & (day of evtStart as string))
            set timeStr to text -2 thru -1 of ("0" & (hours of evtStart as string)) & ":" & text -2 thru -1 of ("0" & (minutes of evtStart as string))
            set output to output & evtTitle & "${FIELD_SEPARATOR}" & dateStr & "${FIELD_SEPARATOR}" & timeStr & linefeed
        end repeat
    end tell
    return output
    `;

    try {
      const output = await this.runScript(script);
      return { success: true, events: parseEventLines(output) };
    } catch (err) {
      console.error("[AppleCalendar] Failed to list events:", errorMessage(err));
      return { success: false, error: errorMessage(err) };
    }
  }
}

export function parseEventLines(output: string): CalendarEvent[] {
  const events: CalendarEvent[] = [];
  for (const line of output.split("\n")) {
    const parts = line.split(FIELD_SEPARATOR);
    if (parts.length >= 3) {
      events.push({ title: parts[0], date: parts[1], time: parts[2].trim() });
    }
  }
  return events;
}
