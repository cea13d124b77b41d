import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { CollaboratorError } from "../src/domain/errors";
import { AppleCalendar, parseEventLines } from "../src/services/integrations/appleCalendar";
import { AppleReminders } from "../src/services/integrations/appleReminders";
import { escapeAppleScript, ScriptRunner } from "../src/services/integrations/appleScript";

describe("escapeAppleScript", () => {
  it("escapes backslashes before quotes", () => {
    expect(escapeAppleScript('Mom\'s "best" \\ pie')).toBe('Mom\'s \\"best\\" \\\\ pie');
  });
});

describe("AppleCalendar", () => {
  let runScript: Mock<ScriptRunner>;
  let calendar: AppleCalendar;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    runScript = vi.fn<ScriptRunner>().mockResolvedValue("success");
    calendar = new AppleCalendar("Family", runScript);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("creates a one-hour event in the configured calendar", async () => {
    const result = await calendar.scheduleEvent('Dad\'s "famous" chili', "2026-01-31", "18:05");

    expect(result).toEqual({
      success: true,
      title: 'Dad\'s "famous" chili',
      date: "2026-01-31",
      time: "18:05",
      calendar: "Family",
    });
    const script = runScript.mock.calls[0][0];
    expect(script).toContain('first calendar whose name is "Family"');
    expect(script).toContain("set year of eventDate to 2026");
    expect(script).toContain("set month of eventDate to 1\n");
    expect(script).toContain("set day of eventDate to 31");
    expect(script).toContain("set minutes of eventDate to 5");
    expect(script).toContain('summary:"Dad\'s \\"famous\\" chili"');
    expect(script.indexOf("set day of eventDate to 1\n")).toBeLessThan(
      script.indexOf("set month of eventDate")
    );
  });

  it("rejects impossible dates without running a script", async () => {
    const result = await calendar.scheduleEvent("Soup", "2026-02-30", "18:00");

    expect(result).toEqual({ success: false, error: "Invalid date/time: 2026-02-30 18:00" });
    expect(runScript).not.toHaveBeenCalled();
  });

  it("returns the script failure as an outcome", async () => {
    runScript.mockRejectedValue(new CollaboratorError("AppleScript error: Calendar got an error", "osascript"));

    const result = await calendar.scheduleEvent("Soup", "2026-10-20", "18:00");

    expect(result).toEqual({ success: false, error: "AppleScript error: Calendar got an error" });
  });

  it("lists events over the requested window", async () => {
    runScript.mockResolvedValue("Soup|||2026-10-18|||18:00\nTacos|||2026-10-20|||19:30");

    const result = await calendar.listEvents({ days: 7, pastDays: 2 });

    expect(result).toEqual({
      success: true,
      events: [
        { title: "Soup", date: "2026-10-18", time: "18:00" },
        { title: "Tacos", date: "2026-10-20", time: "19:30" },
      ],
    });
    const script = runScript.mock.calls[0][0];
    expect(script).toContain("startDate - (2 * days)");
    expect(script).toContain("startDate + (9 * days)");
  });
});

describe("parseEventLines", () => {
  it("skips lines without all three fields", () => {
    expect(parseEventLines("Soup|||2026-10-18|||18:00 \n\nbroken line")).toEqual([
      { title: "Soup", date: "2026-10-18", time: "18:00" },
    ]);
  });
});

describe("AppleReminders", () => {
  let runScript: Mock<ScriptRunner>;
  let reminders: AppleReminders;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    runScript = vi.fn<ScriptRunner>();
    reminders = new AppleReminders("Grocery", runScript);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("adds one reminder per item to the default list", async () => {
    runScript.mockResolvedValue("success");

    const result = await reminders.add(["eggs", 'flour "00"']);

    expect(result).toEqual({ success: true, count: 2, list: "Grocery" });
    const script = runScript.mock.calls[0][0];
    expect(script).toContain('set targetList to list "Grocery"');
    expect(script).toContain('with properties {name:"eggs"}');
    expect(script).toContain('with properties {name:"flour \\"00\\""}');
  });

  it("clears a named list and reports how many were removed", async () => {
    runScript.mockResolvedValue("4");

    expect(await reminders.clear("Costco")).toEqual({ success: true, removed: 4, list: "Costco" });
    expect(runScript.mock.calls[0][0]).toContain('set targetList to list "Costco"');
  });

  it("treats unparseable clear output as nothing removed", async () => {
    runScript.mockResolvedValue("");

    expect(await reminders.clear()).toEqual({ success: true, removed: 0, list: "Grocery" });
  });

  it("lists incomplete items", async () => {
    runScript.mockResolvedValue("eggs|||milk|||");

    expect(await reminders.list()).toEqual({ success: true, items: ["eggs", "milk"], list: "Grocery" });
  });

  it("reports script failures as outcomes", async () => {
    runScript.mockRejectedValue(new Error("Reminders is not running"));

    expect(await reminders.list()).toEqual({ success: false, error: "Reminders is not running" });
  });
});
