// CHANGE: CLI orchestration for the interactive browse commands.
// WHY: Actions are injectable so the command tree can be verified without launching a terminal UI.

import { Command } from "commander";
import { GitHubClient } from "./api.js";
import { BrowserSession } from "./browser/session.js";
import { AuthenticationError, describeError } from "./errors.js";
import { debug, error as logError, setLogLevel } from "./logger.js";
import { loadSettings, resolveToken } from "./settings.js";
import { systemClipboard } from "./system.js";
import type { RepositorySource } from "./types.js";

/**
 * Options accepted by both browse subcommands.
 *
 * @property user - Account to browse; the authenticated user when omitted.
 */
export interface BrowseOptions {
  readonly user?: string;
}

export interface CliActions {
  readonly browse: (source: RepositorySource, options: BrowseOptions) => Promise<void>;
}

/**
 * Resolve credentials, build a session and run the terminal browser until the user quits.
 */
export async function browseAction(source: RepositorySource, options: BrowseOptions): Promise<void> {
  const settings = await loadSettings();
  const token = await resolveToken(settings);
  const client = new GitHubClient({ token, perPage: settings.perPage });
  const session = new BrowserSession({
    client,
    account: options.user,
    source,
    clipboard: systemClipboard()
  });
  debug(`Starting ${source} browser for ${options.user ?? "authenticated user"}`);
  const { runBrowser } = await import("./tui/render.js");
  await runBrowser(session);
}

/**
 * Construct commander program with configured commands.
 *
 * @param actions - Command handlers; defaults to the real browser.
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(actions: CliActions = { browse: browseAction }): Command {
  const program = new Command();
  program
    .name("repodeck")
    .description("Interactive terminal browser for GitHub repositories")
    .version("0.1.0")
    .option("--debug", "Enable debug logging");

  program.hook("preAction", command => {
    if (command.opts().debug === true) {
      setLogLevel("debug");
    }
  });

  const browseCommand = program.command("browse").description("Interactive repository browser");
  browseCommand
    .command("repos")
    .description("Launch interactive repository browser")
    .option("-u, --user <login>", "Username to browse repositories for (defaults to authenticated user)")
    .action(async (options: BrowseOptions) => actions.browse("repositories", { user: options.user }));
  browseCommand
    .command("starred")
    .description("Launch interactive browser for starred repositories only")
    .option("-u, --user <login>", "Username to browse starred repositories for (defaults to authenticated user)")
    .action(async (options: BrowseOptions) => actions.browse("starred", { user: options.user }));

  return program;
}

/**
 * Log a failed command; authentication failures come with setup hints.
 */
export function reportFailure(error: unknown): void {
  if (error instanceof AuthenticationError) {
    logError(`Authentication error: ${error.message}`);
    logError("To authenticate: set the GITHUB_TOKEN environment variable, or run: gh auth login");
    return;
  }
  logError(`Error: ${describeError(error)}`);
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[], actions?: CliActions): Promise<void> {
  const program = buildProgram(actions);
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (error) {
    reportFailure(error);
    process.exitCode = 1;
  }
}
