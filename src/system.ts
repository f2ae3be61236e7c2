// CHANGE: OS services for the clone and open-in-browser actions.
// WHY: Both are best-effort; callers receive a rejection instead of a crash when no tool is present.

import { spawn } from "child_process";
import { debug } from "./logger.js";

interface Command {
  readonly file: string;
  readonly args: readonly string[];
}

/**
 * Clipboard writer used by the clone action.
 */
export interface Clipboard {
  write(text: string): Promise<void>;
}

/**
 * Opens a URL in the user's default browser.
 */
export type UrlOpener = (url: string) => Promise<void>;

function clipboardCommands(platform: NodeJS.Platform): Command[] {
  if (platform === "darwin") {
    return [{ file: "pbcopy", args: [] }];
  }
  if (platform === "win32") {
    return [{ file: "clip", args: [] }];
  }
  return [
    { file: "wl-copy", args: [] },
    { file: "xclip", args: ["-selection", "clipboard"] },
    { file: "xsel", args: ["--clipboard", "--input"] }
  ];
}

function pipeInto(command: Command, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command.file, [...command.args], { stdio: ["pipe", "ignore", "ignore"] });
    child.once("error", reject);
    child.once("close", code => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(`${command.file} exited with code ${code ?? "unknown"}`));
      }
    });
    child.stdin?.once("error", reject);
    child.stdin?.end(text);
  });
}

/**
 * Clipboard backed by the platform's copy utility, trying each candidate in turn.
 */
export function systemClipboard(platform: NodeJS.Platform = process.platform): Clipboard {
  return {
    async write(text: string): Promise<void> {
      let lastError: unknown = new Error("No clipboard utility available");
      for (const command of clipboardCommands(platform)) {
        try {
          await pipeInto(command, text);
          return;
        } catch (error) {
          debug(`Clipboard via ${command.file} failed`);
          lastError = error;
        }
      }
      throw lastError;
    }
  };
}

export function openCommand(url: string, platform: NodeJS.Platform = process.platform): Command {
  if (platform === "darwin") {
    return { file: "open", args: [url] };
  }
  if (platform === "win32") {
    return { file: "cmd", args: ["/c", "start", "", url] };
  }
  return { file: "xdg-open", args: [url] };
}

/**
 * Launch the default browser detached from the terminal session.
 */
export const openInBrowser: UrlOpener = url =>
  new Promise((resolve, reject) => {
    const command = openCommand(url);
    const child = spawn(command.file, [...command.args], { stdio: "ignore", detached: true });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
