// CHANGE: Centralise configuration source with environment validation.
// WHY: HTTP limits and browser constants are read once at startup and never mutated.

import * as dotenv from "dotenv";
import { homedir } from "os";
import { join } from "path";

dotenv.config();

function readInt(name: string, fallback: number): number {
  const parsed = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * GitHub endpoint and credentials taken from the environment.
 *
 * Invariant: `TOKEN` is empty when neither `GITHUB_TOKEN` nor `GH_TOKEN` is set.
 */
export const GITHUB = {
  API_URL: process.env.GITHUB_API_URL ?? "https://api.github.com",
  TOKEN: process.env.GITHUB_TOKEN ?? process.env.GH_TOKEN ?? "",
  USER_AGENT: "repodeck/0.1.0"
} as const;

/**
 * Network-level configuration for HTTP operations.
 *
 * Invariant: `CONCURRENCY`, `PER_PAGE` and `MAX_PAGES` are positive.
 */
export const NET = {
  TIMEOUT: readInt("HTTP_TIMEOUT", 30000),
  CONCURRENCY: readInt("REPODECK_CONCURRENCY", 4),
  PER_PAGE: Math.min(readInt("REPODECK_PER_PAGE", 100), 100),
  MAX_PAGES: readInt("REPODECK_MAX_PAGES", 10)
} as const;

/**
 * Rendering limits for the interactive browser.
 */
export const BROWSER = {
  DESCRIPTION_WIDTH: 40,
  NOTIFICATION_LIMIT: 5,
  VISIBLE_ROWS: readInt("REPODECK_VISIBLE_ROWS", 20)
} as const;

/**
 * Location of the optional settings file.
 */
export const SETTINGS = {
  PATH: process.env.REPODECK_CONFIG ?? join(homedir(), ".config", "repodeck", "config.json")
} as const;
