import type { FetchLike } from "./domain/namecheap";
import { errorMessage } from "./errors";
import { silentLogger, type Logger } from "./log";
import { PLATFORMS, isPlatform, type Platform, type UsernameCheckResult } from "./types";
import { formatTemplate } from "./util";

const PROFILE_TIMEOUT_MS = 10_000;

// Several platforms serve a login wall to non-browser user agents
const PROFILE_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:147.0) Gecko/20100101 Firefox/147.0",
  Accept: "text/html,application/xhtml+xml",
  "Accept-Language": "en",
} as const;

/**
 * Decides availability from a profile response. Returning `true` means
 * "looks free"; a platform-specific API check can replace the default.
 */
export type AvailabilityHeuristic = (username: string, res: Response) => Promise<boolean>;

/**
 * Best-effort signal only: anything but 200 (redirects included) counts as "no such profile",
 * and a 200 page that never mentions the username counts as free too.
 * Pages that always answer 200, or never echo the handle, mislead it.
 */
export const profileTextHeuristic: AvailabilityHeuristic = async (username, res) => {
  if (res.status !== 200) {
    await res.body?.cancel();
    return true;
  }
  const body = await res.text();
  return !body.includes(username);
};

export const profileUrl = (username: string, platform: Platform): string =>
  formatTemplate(PLATFORMS[platform], encodeURIComponent(username));

// --- public API ---

export type UsernameChecker = {
  readonly isAvailable: (username: string, platform: string) => Promise<boolean>;
  readonly checkUsername: (
    username: string,
    platforms: readonly string[],
  ) => Promise<readonly UsernameCheckResult[]>;
};

export type UsernameCheckerOpts = {
  readonly fetch?: FetchLike;
  readonly logger?: Logger;
  readonly heuristic?: AvailabilityHeuristic;
  readonly timeoutMs?: number;
};

export const createUsernameChecker = (opts: UsernameCheckerOpts = {}): UsernameChecker => {
  const fetchFn = opts.fetch ?? fetch;
  const logger = opts.logger ?? silentLogger;
  const heuristic = opts.heuristic ?? profileTextHeuristic;
  const timeoutMs = opts.timeoutMs ?? PROFILE_TIMEOUT_MS;

  // A failed request is "taken/unknown", never "available".
  const isAvailable = async (username: string, platform: string): Promise<boolean> => {
    if (!isPlatform(platform)) {
      logger.warn(`Unsupported platform: ${platform}`);
      return false;
    }

    try {
      const res = await fetchFn(profileUrl(username, platform), {
        method: "GET",
        headers: PROFILE_HEADERS,
        redirect: "manual",
        signal: AbortSignal.timeout(timeoutMs),
      });
      return await heuristic(username, res);
    } catch (e) {
      logger.warn(`⚠️ Error checking ${platform}: ${errorMessage(e)}`);
      return false;
    }
  };

  const checkUsername = (username: string, platforms: readonly string[]): Promise<readonly UsernameCheckResult[]> =>
    Promise.all(
      platforms.map(async (platform) => ({ platform, available: await isAvailable(username, platform) })),
    );

  return { isAvailable, checkUsername };
};
