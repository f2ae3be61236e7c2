// CHANGE: Load optional user settings and resolve the GitHub token.
// WHY: Environment wins over the settings file; the gh CLI is the last resort.

import { execFile } from "child_process";
import fs from "fs-extra";
import { promisify } from "util";
import { GITHUB, SETTINGS } from "./config.js";
import { AuthenticationError, describeError } from "./errors.js";
import { debug, info } from "./logger.js";
import type { JsonValue } from "./types.js";

const execFileAsync = promisify(execFile);

/**
 * Contents of the settings file.
 *
 * @property token - Personal access token, used when no environment token is set.
 * @property perPage - Page size for listing calls, 1–100.
 */
export interface Settings {
  readonly token?: string;
  readonly perPage?: number;
}

function isRecord(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read settings from disk if present.
 *
 * @param path - Settings file location.
 * @returns Parsed settings; empty when the file is absent or unreadable.
 */
export async function loadSettings(path: string = SETTINGS.PATH): Promise<Settings> {
  if (!(await fs.pathExists(path))) {
    debug(`Settings file ${path} absent, using defaults.`);
    return {};
  }
  try {
    const parsed: JsonValue = await fs.readJson(path);
    if (!isRecord(parsed)) {
      info(`Settings file ${path} is not an object, using defaults.`);
      return {};
    }
    const perPage = parsed.perPage;
    return {
      token: typeof parsed.token === "string" && parsed.token.length > 0 ? parsed.token : undefined,
      perPage:
        typeof perPage === "number" && Number.isInteger(perPage) && perPage >= 1 && perPage <= 100 ? perPage : undefined
    };
  } catch (error) {
    info(`Settings read failed (${describeError(error)}), using defaults.`);
    return {};
  }
}

async function ghCliToken(): Promise<string | undefined> {
  try {
    const { stdout } = await execFileAsync("gh", ["auth", "token"]);
    const token = stdout.trim();
    return token.length > 0 ? token : undefined;
  } catch (error) {
    debug(`gh auth token unavailable: ${describeError(error)}`);
    return undefined;
  }
}

/**
 * Resolve the token used to authenticate API calls.
 *
 * Order: `GITHUB_TOKEN`/`GH_TOKEN`, settings file, `gh auth token`.
 *
 * @throws AuthenticationError when no source yields a token.
 */
export async function resolveToken(
  settings: Settings,
  sources: { readonly env?: string; readonly ghCli?: () => Promise<string | undefined> } = {}
): Promise<string> {
  const envToken = sources.env ?? GITHUB.TOKEN;
  if (envToken) {
    return envToken;
  }
  if (settings.token) {
    return settings.token;
  }
  const cliToken = await (sources.ghCli ?? ghCliToken)();
  if (cliToken) {
    return cliToken;
  }
  throw new AuthenticationError(
    "No GitHub token found. Please set GITHUB_TOKEN environment variable or authenticate with 'gh auth login'"
  );
}
