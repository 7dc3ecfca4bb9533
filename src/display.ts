import chalk from "chalk";
import { writeFile } from "node:fs/promises";
import { toCsv } from "./csv";
import type { DomainQueryOutcome, DomainSuggestion, UsernameCheckResult } from "./types";

const BOX_WIDTH = 60;

// --- boxes ---

const center = (text: string, width: number): string => {
  const pad = Math.max(0, width - [...text].length);
  const left = Math.floor(pad / 2);
  return " ".repeat(left) + text + " ".repeat(pad - left);
};

const box = (title: string, lines: readonly string[], color: (s: string) => string): string =>
  [
    color(` ${title}`),
    ...["", ...lines, ""].map((l) => center(l, BOX_WIDTH)),
    color("─".repeat(BOX_WIDTH)),
  ].join("\n") + "\n";

export const introBanner = (): string =>
  box("🚀 Welcome to namescout", [
    "The fastest way to check domain and",
    "social media username availability!",
  ], chalk.cyan);

export const farewellBanner = (): string =>
  box("👋", ["Thanks for using namescout!", "Start building your brand today. ✨"], chalk.magenta);

export const statusBox = (message: string): string =>
  message.trim() === "" ? "" : `\n${box("✦ Domain Status", [message], chalk.white)}`;

export const purchaseLinkLine = (link: string): string =>
  `\n🔗 ${chalk.green("Purchase here:")} ${chalk.underline(link)}\n\n`;

// --- tables ---

const statusLabel = (available: boolean): string =>
  available ? "✔ Available" : "✘ Taken";

const paintStatus = (label: string, available: boolean): string =>
  available ? chalk.green(label) : chalk.red(label);

/** Two-column table; padding is computed on plain text before colouring. */
export const formatTable = (
  headers: readonly [string, string],
  rows: readonly { readonly label: string; readonly available: boolean }[],
): string => {
  const width = Math.max(headers[0].length, ...rows.map((r) => r.label.length));
  const head = `  ${chalk.bold(headers[0].padEnd(width))}   ${chalk.bold(headers[1])}`;
  const rule = `  ${"─".repeat(width)}   ${"─".repeat(11)}`;
  const body = rows.map(
    (r) => `  ${r.label.padEnd(width)}   ${paintStatus(statusLabel(r.available), r.available)}`,
  );
  return [head, rule, ...body].join("\n") + "\n";
};

export const suggestionTable = (suggestions: readonly DomainSuggestion[]): string =>
  "\nTop Domain Extensions:\n" +
  formatTable(["Domain", "Status"], suggestions.map((s) => ({ label: s.domain, available: s.available })));

const capitalize = (s: string): string => s.charAt(0).toUpperCase() + s.slice(1);

export const usernameTable = (username: string, results: readonly UsernameCheckResult[]): string =>
  `\nUsername: ${chalk.bold(username)}\n` +
  formatTable(["Platform", "Status"], results.map((r) => ({ label: capitalize(r.platform), available: r.available })));

// --- text output ---

export const formatOutcome = (outcome: DomainQueryOutcome): string =>
  (outcome.suggestions ? suggestionTable(outcome.suggestions) : "") +
  statusBox(outcome.message) +
  (outcome.link ? purchaseLinkLine(outcome.link) : "");

// --- JSON output ---

export type JsonReport = {
  readonly domain: DomainQueryOutcome;
  readonly usernames?: {
    readonly username: string;
    readonly results: readonly UsernameCheckResult[];
  };
};

export const formatJson = (report: JsonReport): string =>
  JSON.stringify(report, null, 2) + "\n";

// --- CSV persistence ---

export const toReportCsv = (report: JsonReport): string => {
  const { domain, usernames } = report;
  const domainRows = domain.suggestions
    ? domain.suggestions.map((s) => ["domain", s.domain, s.available ? "available" : "taken"])
    : [["domain", domain.domain, domain.available ? "available" : "taken"]];
  const usernameRows = (usernames?.results ?? []).map((r) => [
    r.platform,
    usernames?.username ?? "",
    r.available ? "available" : "taken",
  ]);
  return toCsv([["kind", "name", "status"], ...domainRows, ...usernameRows]);
};

export const persistReport = async (report: JsonReport, outFile: string): Promise<void> => {
  await writeFile(outFile, toReportCsv(report), "utf8");
};
