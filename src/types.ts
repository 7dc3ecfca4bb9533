// --- registrar results ---

export type DomainCheckResult = {
  readonly domain: string;
  readonly available: boolean;
  /** Registrar's `Available` attribute, verbatim. */
  readonly rawStatus: string;
  readonly premium: boolean;
  readonly premiumPriceUSD: number | null;
};

// --- domain outcome ---

export type SummaryCategory = "none" | "few" | "some" | "many";

export type DomainSuggestion = {
  readonly domain: string;
  readonly available: boolean;
};

export type DomainQueryOutcome = {
  readonly available: boolean;
  readonly domain: string;
  readonly message: string;
  readonly link?: string;
  readonly suggestions?: readonly DomainSuggestion[];
  readonly summary?: SummaryCategory;
};

// --- social platforms ---

export const PLATFORMS = Object.freeze({
  github: "https://github.com/%s",
  twitter: "https://twitter.com/%s",
  instagram: "https://www.instagram.com/%s",
  facebook: "https://www.facebook.com/%s",
  youtube: "https://www.youtube.com/@%s",
  tiktok: "https://www.tiktok.com/@%s",
  pinterest: "https://www.pinterest.com/%s",
  linkedin: "https://www.linkedin.com/in/%s",
  reddit: "https://www.reddit.com/user/%s",
  threads: "https://www.threads.net/@%s",
} as const);

export type Platform = keyof typeof PLATFORMS;

export const PLATFORM_KEYS: readonly Platform[] = Object.freeze([
  "github",
  "twitter",
  "instagram",
  "facebook",
  "youtube",
  "tiktok",
  "pinterest",
  "linkedin",
  "reddit",
  "threads",
]);

export const isPlatform = (value: string): value is Platform =>
  Object.hasOwn(PLATFORMS, value);

export type UsernameCheckResult = {
  readonly platform: string;
  readonly available: boolean;
};

// --- CLI option types ---

export type CheckOpts = {
  readonly domain: string | null;
  readonly json: boolean;
  readonly platforms: readonly Platform[] | null;
  readonly social: boolean;
  readonly out: string | null;
};
