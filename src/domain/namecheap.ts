import type { RegistrarConfig } from "../config";
import { IntegrationError, errorMessage } from "../errors";
import type { DomainCheckResult } from "../types";

// --- constants ---

const PRODUCTION_ENDPOINT = "https://api.namecheap.com/xml.response";
const SANDBOX_ENDPOINT = "https://api.sandbox.namecheap.com/xml.response";
const CHECK_COMMAND = "namecheap.domains.check";
const REQUEST_TIMEOUT_MS = 15_000;

export const REGISTRAR_HOST = "www.namecheap.com";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

// --- XML helpers (flat attribute scan; the check response has no nesting we need) ---

const ATTRIBUTE_RE = /([A-Za-z_][\w.-]*)="([^"]*)"/g;
const API_STATUS_RE = /<ApiResponse\b[^>]*\bStatus="([^"]*)"/;
const ERROR_RE = /<Error\b[^>]*>([\s\S]*?)<\/Error>/g;
const COMMAND_RESPONSE_RE = /<CommandResponse\b[^>]*>([\s\S]*?)<\/CommandResponse>/;
const CHECK_RESULT_RE = /<DomainCheckResult\b([^>]*?)\/?>/g;

const decodeEntities = (text: string): string =>
  text
    .replace(/&quot;/g, "\"")
    .replace(/&apos;/g, "'")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&amp;/g, "&");

const parseAttributes = (raw: string): ReadonlyMap<string, string> =>
  new Map([...raw.matchAll(ATTRIBUTE_RE)].map((m) => [m[1], decodeEntities(m[2])] as const));

// --- pure helpers ---

/** The only place the registrar's "true"/"false" strings become booleans. */
export const parseAvailability = (raw: string, domain: string): boolean => {
  switch (raw.trim().toLowerCase()) {
    case "true": return true;
    case "false": return false;
    default:
      throw new IntegrationError(`Unexpected availability flag "${raw}" for ${domain}`);
  }
};

const parsePrice = (raw: string | undefined): number | null => {
  if (raw === undefined) return null;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : null;
};

const toCheckResult = (attrs: ReadonlyMap<string, string>): DomainCheckResult => {
  const domain = attrs.get("Domain");
  const rawStatus = attrs.get("Available");
  if (!domain || rawStatus === undefined) {
    throw new IntegrationError("Invalid API response structure: DomainCheckResult without Domain/Available");
  }
  const premium = attrs.get("IsPremiumName")?.toLowerCase() === "true";

  return {
    domain,
    available: parseAvailability(rawStatus, domain),
    rawStatus,
    premium,
    premiumPriceUSD: premium ? parsePrice(attrs.get("PremiumRegistrationPrice")) : null,
  };
};

export const parseCheckResponse = (
  xml: string,
  requested: readonly string[],
): readonly DomainCheckResult[] => {
  const status = xml.match(API_STATUS_RE)?.[1];
  if (status === undefined) {
    throw new IntegrationError("Invalid API response structure: missing ApiResponse");
  }

  if (status.toUpperCase() === "ERROR") {
    const errors = [...xml.matchAll(ERROR_RE)]
      .map((m) => decodeEntities(m[1].trim()))
      .filter(Boolean);
    throw new IntegrationError(`Registrar error: ${errors.length > 0 ? errors.join("; ") : "unknown error"}`);
  }

  const body = xml.match(COMMAND_RESPONSE_RE)?.[1];
  if (body === undefined) {
    throw new IntegrationError("Invalid API response structure: missing CommandResponse");
  }

  const byName = new Map(
    [...body.matchAll(CHECK_RESULT_RE)]
      .map((m) => toCheckResult(parseAttributes(m[1])))
      .map((r) => [r.domain.toLowerCase(), r] as const),
  );

  return requested.map((name) => {
    const hit = byName.get(name.toLowerCase());
    if (!hit) throw new IntegrationError(`Registrar response has no result for ${name}`);
    return hit;
  });
};

export const buildQuery = (
  config: RegistrarConfig,
  command: string,
  params: Readonly<Record<string, string>> = {},
): URLSearchParams =>
  new URLSearchParams({
    ApiUser: config.apiUser,
    ApiKey: config.apiKey,
    UserName: config.username,
    ClientIp: config.clientIp,
    Command: command,
    ...params,
  });

export const purchaseLink = (domain: string): string =>
  `https://${REGISTRAR_HOST}/domains/registration/results/?domain=${domain}`;

// --- public: client ---

export type RegistrarClient = {
  readonly checkDomains: (names: readonly string[]) => Promise<readonly DomainCheckResult[]>;
};

export type RegistrarClientOpts = {
  readonly fetch?: FetchLike;
  readonly timeoutMs?: number;
};

export const createRegistrarClient = (
  config: RegistrarConfig,
  opts: RegistrarClientOpts = {},
): RegistrarClient => {
  const fetchFn = opts.fetch ?? fetch;
  const timeoutMs = opts.timeoutMs ?? REQUEST_TIMEOUT_MS;
  const endpoint = config.sandbox ? SANDBOX_ENDPOINT : PRODUCTION_ENDPOINT;

  const request = async (command: string, params: Readonly<Record<string, string>>): Promise<string> => {
    const url = `${endpoint}?${buildQuery(config, command, params).toString()}`;

    let res: Response;
    try {
      res = await fetchFn(url, { method: "GET", signal: AbortSignal.timeout(timeoutMs) });
    } catch (e) {
      throw new IntegrationError(`Registrar request failed: ${errorMessage(e)}`, { cause: e });
    }

    if (!res.ok) {
      await res.body?.cancel();
      throw new IntegrationError(`API call failed with HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ""}`);
    }

    try {
      return await res.text();
    } catch (e) {
      throw new IntegrationError(`Registrar response could not be read: ${errorMessage(e)}`, { cause: e });
    }
  };

  const checkDomains = async (names: readonly string[]): Promise<readonly DomainCheckResult[]> => {
    if (names.length === 0) {
      throw new IntegrationError("checkDomains requires at least one domain");
    }
    const xml = await request(CHECK_COMMAND, { DomainList: names.join(",") });
    return parseCheckResponse(xml, names);
  };

  return { checkDomains };
};
