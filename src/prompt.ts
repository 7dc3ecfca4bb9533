import chalk from "chalk";
import { createInterface } from "node:readline/promises";
import { PLATFORM_KEYS, isPlatform, type Platform } from "./types";
import { parseList } from "./util";

const ALL_CHOICE = "all";

export type PlatformSelection =
  | { readonly ok: true; readonly platforms: readonly Platform[] }
  | { readonly ok: false; readonly reason: string };

export const parsePlatformSelection = (raw: string): PlatformSelection => {
  const tokens = parseList(raw);
  if (tokens.length === 0) {
    return { ok: false, reason: "You must select at least one platform." };
  }
  if (tokens.includes(ALL_CHOICE)) {
    return tokens.length > 1
      ? { ok: false, reason: `Please select either '${ALL_CHOICE}' or specific platforms, not both.` }
      : { ok: true, platforms: PLATFORM_KEYS };
  }
  const unknown = tokens.filter((t) => !isPlatform(t));
  if (unknown.length > 0) {
    return { ok: false, reason: `Unsupported platform(s): ${unknown.join(", ")}` };
  }
  return { ok: true, platforms: [...new Set(tokens.filter(isPlatform))] };
};

// --- interactive ---

export type Prompter = {
  readonly ask: (question: string) => Promise<string>;
  readonly confirm: (question: string) => Promise<boolean>;
  readonly close: () => void;
};

export const createPrompter = (): Prompter => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  const ask = async (question: string): Promise<string> =>
    (await rl.question(`${chalk.blue(question)} `)).trim();

  const confirm = async (question: string): Promise<boolean> => {
    const answer = (await ask(`${question} (Y/n)`)).toLowerCase();
    return answer === "" || answer === "y" || answer === "yes";
  };

  return { ask, confirm, close: () => rl.close() };
};

export const promptDomain = async (prompter: Prompter): Promise<string> => {
  const answer = await prompter.ask("🌐 Enter domain (e.g. example or example.com):");
  return answer === "" ? promptDomain(prompter) : answer;
};

export const promptPlatforms = async (prompter: Prompter): Promise<readonly Platform[]> => {
  const question =
    `✔ Select platforms to check, comma-separated, or '${ALL_CHOICE}'\n` +
    chalk.dim(`  (${PLATFORM_KEYS.join(", ")}):`);
  const selection = parsePlatformSelection(await prompter.ask(question));
  if (selection.ok) return selection.platforms;

  process.stdout.write(chalk.yellow(`⚠️  ${selection.reason}\n`));
  return promptPlatforms(prompter);
};
