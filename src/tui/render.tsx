// CHANGE: Mount the Ink view and run the session until the user quits.
// WHY: Loaded lazily so commands that never open a terminal do not import Ink.

import { render } from "ink";
import type { BrowserSession } from "../browser/session.js";
import { describeError } from "../errors.js";
import { error as logError } from "../logger.js";
import { BrowserApp } from "./BrowserApp.js";

/**
 * Render the session in the terminal and resolve once the user quits.
 *
 * The session is terminated on every exit path, which closes its API client.
 */
export async function runBrowser(session: BrowserSession): Promise<void> {
  const instance = render(<BrowserApp session={session} />, { exitOnCtrlC: false });
  session.start().catch(error => {
    logError(`Initial load failed: ${describeError(error)}`);
  });
  try {
    await instance.waitUntilExit();
  } finally {
    session.quit();
  }
}
