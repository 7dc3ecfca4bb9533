import { describe, expect, it, vi } from "vitest";
import { parsePlatformSelection, promptDomain, promptPlatforms, type Prompter } from "../src/prompt";
import { PLATFORM_KEYS } from "../src/types";

const scriptedPrompter = (answers: readonly string[]): Prompter => {
  const queue = [...answers];
  return {
    ask: vi.fn(async () => queue.shift() ?? ""),
    confirm: vi.fn(async () => true),
    close: vi.fn(),
  };
};

describe("parsePlatformSelection", () => {
  it("expands 'all' to every platform in table order", () => {
    expect(parsePlatformSelection("all")).toEqual({ ok: true, platforms: PLATFORM_KEYS });
  });

  it("accepts comma or space separated keys in any case, without duplicates", () => {
    expect(parsePlatformSelection("GitHub, reddit github")).toEqual({ ok: true, platforms: ["github", "reddit"] });
  });

  it("rejects an empty selection", () => {
    expect(parsePlatformSelection("  ")).toEqual({ ok: false, reason: "You must select at least one platform." });
  });

  it("rejects 'all' mixed with specific platforms", () => {
    expect(parsePlatformSelection("all,github")).toEqual({
      ok: false,
      reason: "Please select either 'all' or specific platforms, not both.",
    });
  });

  it("rejects unknown platforms", () => {
    expect(parsePlatformSelection("github,myspace")).toEqual({ ok: false, reason: "Unsupported platform(s): myspace" });
  });
});

describe("interactive prompts", () => {
  it("asks for platforms until the selection is valid", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const prompter = scriptedPrompter(["", "all, github", "threads"]);

    await expect(promptPlatforms(prompter)).resolves.toEqual(["threads"]);
    expect(prompter.ask).toHaveBeenCalledTimes(3);
    write.mockRestore();
  });

  it("asks for the domain again after an empty answer", async () => {
    const prompter = scriptedPrompter(["", "acme.io"]);

    await expect(promptDomain(prompter)).resolves.toBe("acme.io");
    expect(prompter.ask).toHaveBeenCalledTimes(2);
  });
});
