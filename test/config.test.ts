import { describe, expect, it } from "vitest";
import { loadRegistrarConfig } from "../src/config";
import { ConfigurationError } from "../src/errors";

const fullEnv = {
  NAMECHEAP_API_USER: "test-user",
  NAMECHEAP_API_KEY: "test-secret",
  NAMECHEAP_USERNAME: "test-account",
  CLIENT_IP: "127.0.0.1",
};

describe("loadRegistrarConfig", () => {
  it("reads all four credentials", () => {
    expect(loadRegistrarConfig(fullEnv)).toEqual({
      apiUser: "test-user",
      apiKey: "test-secret",
      username: "test-account",
      clientIp: "127.0.0.1",
      sandbox: false,
    });
  });

  it("returns a frozen config", () => {
    expect(Object.isFrozen(loadRegistrarConfig(fullEnv))).toBe(true);
  });

  it("lists every missing or blank variable", () => {
    const env = { ...fullEnv, NAMECHEAP_API_KEY: undefined, CLIENT_IP: "   " };

    const err = (() => {
      try {
        loadRegistrarConfig(env);
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toMatchObject({
      missing: ["NAMECHEAP_API_KEY", "CLIENT_IP"],
      message: "Missing required configuration: NAMECHEAP_API_KEY, CLIENT_IP",
    });
  });

  it.each([
    ["true", true],
    ["1", true],
    ["TRUE", true],
    ["false", false],
    ["", false],
  ] as const)("NAMECHEAP_SANDBOX=%s -> %s", (raw, sandbox) => {
    expect(loadRegistrarConfig({ ...fullEnv, NAMECHEAP_SANDBOX: raw }).sandbox).toBe(sandbox);
  });
});
