import { execFile } from "child_process";
import { promisify } from "util";
import { CollaboratorError, errorMessage } from "../../domain/errors";

const execFileAsync = promisify(execFile);

/** Runs an AppleScript and resolves with its trimmed stdout. */
export type ScriptRunner = (script: string) => Promise<string>;

export function createAppleScriptRunner(timeoutMs: number): ScriptRunner {
  return async (script: string) => {
    try {
      const { stdout } = await execFileAsync("osascript", ["-e", script], { timeout: timeoutMs });
      return stdout.trim();
    } catch (err) {
      const stderr =
        typeof err === "object" && err !== null && "stderr" in err && typeof err.stderr === "string"
          ? err.stderr.trim()
          : "";
      throw new CollaboratorError(`AppleScript error: ${stderr || errorMessage(err)}`, "osascript");
    }
  };
}

/** Quote a value for use inside an AppleScript string literal. */
export function escapeAppleScript(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/** Field separator used when scripts return several values per line. */
export const FIELD_SEPARATOR = "|||";
