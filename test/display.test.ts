import chalk from "chalk";
import { beforeAll, describe, expect, it } from "vitest";
import { toCsv } from "../src/csv";
import { formatTable, statusBox, toReportCsv } from "../src/display";

beforeAll(() => {
  chalk.level = 0;
});

describe("formatTable", () => {
  it("pads labels to the widest entry", () => {
    const table = formatTable(["Domain", "Status"], [
      { label: "foo.com", available: true },
      { label: "foo.io", available: false },
    ]);

    expect(table.split("\n")).toEqual([
      "  Domain    Status",
      `  ${"─".repeat(7)}   ${"─".repeat(11)}`,
      "  foo.com   ✔ Available",
      "  foo.io    ✘ Taken",
      "",
    ]);
  });
});

describe("statusBox", () => {
  it("renders nothing for an empty message", () => {
    expect(statusBox("  ")).toBe("");
  });
});

describe("toReportCsv", () => {
  it("writes one row per suggestion and per platform", () => {
    const csv = toReportCsv({
      domain: {
        available: false,
        domain: "foo",
        message: "⚠️ Only a few options are available for ‘foo’. Consider securing one quickly!",
        suggestions: [
          { domain: "foo.com", available: true },
          { domain: "foo.net", available: false },
        ],
        summary: "few",
      },
      usernames: { username: "foo", results: [{ platform: "github", available: true }] },
    });

    expect(csv).toBe("kind,name,status\ndomain,foo.com,available\ndomain,foo.net,taken\ngithub,foo,available\n");
  });

  it("writes a single row for an exact check", () => {
    const csv = toReportCsv({
      domain: { available: true, domain: "brandkit.io", message: "✔ Domain brandkit.io is available!" },
    });

    expect(csv).toBe("kind,name,status\ndomain,brandkit.io,available\n");
  });
});

describe("toCsv", () => {
  it("quotes cells containing separators or quotes", () => {
    expect(toCsv([["a,b", "say \"hi\"", "plain"]])).toBe("\"a,b\",\"say \"\"hi\"\"\",plain\n");
  });

  it("quotes cells containing line breaks", () => {
    expect(toCsv([["two\r\nlines", "x"]])).toBe("\"two\r\nlines\",x\n");
  });
});
