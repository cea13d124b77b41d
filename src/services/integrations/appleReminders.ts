// src/services/integrations/appleReminders.ts
// macOS Reminders adapter (osascript), used for the grocery list

import { errorMessage } from "../../domain/errors";
import { escapeAppleScript, FIELD_SEPARATOR, ScriptRunner } from "./appleScript";
import { CollaboratorOutcome, RemindersGateway } from "./types";

export class AppleReminders implements RemindersGateway {
  constructor(
    private readonly defaultList: string,
    private readonly runScript: ScriptRunner
  ) {}

  /** Adds items to the list, creating the list if needed. */
  async add(
    items: string[],
    listName: string = this.defaultList
  ): Promise<CollaboratorOutcome<{ count: number; list: string }>> {
    const list = escapeAppleScript(listName);
    const reminderLines = items
      .map(
        (item) =>
          `        make new reminder at end of reminders of targetList with properties {name:"${escapeAppleScript(item)}"}`
      )
      .join("\n");

    const script = `
    tell application "Reminders"
        try
            set targetList to list "${list}"
        on error
            set targetList to make new list with properties {name:"${list}"}
        end try
${reminderLines}
    end tell
    return "success"
    `;

    try {
      await this.runScript(script);
      console.log(`[AppleReminders] Added ${items.length} item(s) to "${listName}"`);
      return { success: true, count: items.length, list: listName };
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
  }

  /** Deletes every incomplete reminder from the list. */
  async clear(
    listName: string = this.defaultList
  ): Promise<CollaboratorOutcome<{ removed: number; list: string }>> {
    const script = `
    tell application "Reminders"
        try
            set targetList to list "${escapeAppleScript(listName)}"
        on error
            return "0"
        end try
        set incompleteItems to (every reminder of targetList whose completed is false)
        set itemCount to count of incompleteItems
        repeat with r in incompleteItems
            delete r
        end repeat
        return itemCount as string
    end tell
    `;

    try {
      const output = await this.runScript(script);
      const removed = output ? Number.parseInt(output, 10) : 0;
      return { success: true, removed: Number.isNaN(removed) ? 0 : removed, list: listName };
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
  }

  /** Names of the incomplete reminders on the list. */
  async list(
    listName: string = this.defaultList
  ): Promise<CollaboratorOutcome<{ items: string[]; list: string }>> {
    const script = `
    tell application "Reminders"
        try
            set targetList to list "${escapeAppleScript(listName)}"
        on error
            return ""
        end try
        set output to ""
        set incompleteItems to (every reminder of targetList whose completed is false)
        repeat with r in incompleteItems
            set output to output & name of r & "${FIELD_SEPARATOR}"
        end repeat
        return output
    end tell
    `;

    try {
      const output = await this.runScript(script);
      const items = output.split(FIELD_SEPARATOR).filter((item) => item.length > 0);
      return { success: true, items, list: listName };
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
  }
}
