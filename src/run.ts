import { Command } from "commander";
import chalk from "chalk";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { createDomainChecker } from "./check";
import { loadRegistrarConfig, type RegistrarConfig } from "./config";
import { farewellBanner, formatJson, formatOutcome, introBanner, persistReport, usernameTable, type JsonReport } from "./display";
import { createRegistrarClient, type RegistrarClient } from "./domain/namecheap";
import { IntegrationError, errorMessage } from "./errors";
import { createLogger, writeStderr, writeStdout, type Logger, type Writer } from "./log";
import { createPrompter, parsePlatformSelection, promptDomain, promptPlatforms, type Prompter } from "./prompt";
import { createUsernameChecker, type UsernameChecker } from "./social";
import type { CheckOpts, Platform } from "./types";
import { usernameFromDomain } from "./util";

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

const readVersion = (): string => {
  const parsed: unknown = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf8"));
  return typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string"
    ? parsed.version
    : "0.0.0";
};

// --- options ---

export type RawOpts = {
  readonly domain?: string;
  readonly json?: boolean;
  readonly platforms?: string;
  readonly social: boolean;
  readonly out?: string;
};

export const parseCheckOpts = (raw: RawOpts): CheckOpts => {
  const selection = raw.platforms === undefined ? null : parsePlatformSelection(raw.platforms);
  if (selection && !selection.ok) throw new CliError(selection.reason);

  return {
    domain: raw.domain?.trim() || null,
    json: raw.json ?? false,
    platforms: selection ? selection.platforms : null,
    social: raw.social,
    out: raw.out ?? null,
  };
};

// --- collaborators ---

export type RunDeps = {
  readonly env?: NodeJS.ProcessEnv;
  readonly registrar?: (config: RegistrarConfig) => RegistrarClient;
  readonly usernames?: (logger: Logger) => UsernameChecker;
  readonly prompter?: () => Prompter;
  readonly stdout?: Writer;
  readonly stderr?: Writer;
};

const defaultUsernames = (logger: Logger): UsernameChecker => createUsernameChecker({ logger });

const resolveDomain = async (opts: CheckOpts, prompter: Prompter | null): Promise<string> => {
  if (opts.domain) return opts.domain;
  if (!prompter) throw new CliError("No domain provided. Use --domain=<value>.");
  return promptDomain(prompter);
};

const resolvePlatforms = async (
  opts: CheckOpts,
  prompter: Prompter | null,
): Promise<readonly Platform[] | null> => {
  if (!opts.social) return null;
  if (opts.platforms) return opts.platforms;
  if (!prompter) return null;
  const wanted = await prompter.confirm(chalk.cyan("📱 Check if the username is available on social platforms?"));
  return wanted ? promptPlatforms(prompter) : null;
};

export const run = async (opts: CheckOpts, deps: RunDeps = {}): Promise<void> => {
  // Missing credentials stop the run before any prompt or request.
  const config = loadRegistrarConfig(deps.env ?? process.env);
  const write = deps.stdout ?? writeStdout;
  const logger = createLogger(deps.stderr ?? writeStderr, { quiet: opts.json });
  const domains = createDomainChecker((deps.registrar ?? createRegistrarClient)(config));
  const usernames = (deps.usernames ?? defaultUsernames)(logger);

  const interactive = !opts.json && (opts.domain === null || (opts.social && opts.platforms === null));
  const prompter = interactive ? (deps.prompter ?? createPrompter)() : null;

  try {
    if (!opts.json) write(introBanner());

    const input = await resolveDomain(opts, prompter);
    logger.info(`Checking ${input}...`);
    const outcome = await domains.check(input);
    if (!opts.json) write(formatOutcome(outcome));

    const platforms = await resolvePlatforms(opts, prompter);
    const username = usernameFromDomain(outcome.domain);
    if (platforms) logger.info(`Checking ${platforms.length} platform(s) for '${username}'...`);
    const results = platforms ? await usernames.checkUsername(username, platforms) : null;

    const report: JsonReport = results ? { domain: outcome, usernames: { username, results } } : { domain: outcome };

    if (opts.json) {
      write(formatJson(report));
    } else {
      if (results) write(usernameTable(username, results));
      write(`\n${farewellBanner()}`);
    }

    if (opts.out) {
      await persistReport(report, opts.out);
      logger.info(`Saved results to ${opts.out}`);
    }
  } finally {
    prompter?.close();
  }
};

export const formatFailure = (err: unknown): string =>
  err instanceof IntegrationError ? `Domain check failed: ${err.message}` : errorMessage(err);

// --- command ---

export const createProgram = (deps: RunDeps = {}): Command =>
  new Command()
    .name("namescout")
    .description("Check domain and social media username availability")
    .version(readVersion())
    .option("--domain <value>", "Domain or bare name to check (e.g. 'example' or 'example.com')")
    .option("--json", "Print a single JSON report and skip all prompts")
    .option("--platforms <list>", "Platforms to check (comma-separated keys, or 'all')")
    .option("--no-social", "Skip the social username check")
    .option("--out <file>", "Also write the results to a CSV file")
    .action(async (raw: RawOpts) => {
      await run(parseCheckOpts(raw), deps);
    });

/** Runs the command for user arguments (no node/script prefix) and returns the exit code. */
export const main = async (argv: readonly string[], deps: RunDeps = {}): Promise<number> => {
  try {
    await createProgram(deps).parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    (deps.stderr ?? writeStderr)(chalk.red(`Error: ${formatFailure(err)}\n`));
    return 1;
  }
};
