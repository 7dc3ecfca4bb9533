export { COMMON_TLDS, createDomainChecker, summaryCategory, summaryMessage, suggestionDomains } from "./check";
export type { DomainChecker } from "./check";
export { loadRegistrarConfig } from "./config";
export type { RegistrarConfig } from "./config";
export { createRegistrarClient, parseCheckResponse, purchaseLink } from "./domain/namecheap";
export type { FetchLike, RegistrarClient, RegistrarClientOpts } from "./domain/namecheap";
export { ConfigurationError, IntegrationError, InvalidInputError } from "./errors";
export { createLogger, silentLogger, stderrLogger } from "./log";
export type { Logger } from "./log";
export { main, run } from "./run";
export type { RunDeps } from "./run";
export { createUsernameChecker, profileTextHeuristic, profileUrl } from "./social";
export type { AvailabilityHeuristic, UsernameChecker, UsernameCheckerOpts } from "./social";
export { PLATFORMS, PLATFORM_KEYS, isPlatform } from "./types";
export type { CheckOpts, DomainCheckResult, DomainQueryOutcome, DomainSuggestion, Platform, SummaryCategory, UsernameCheckResult } from "./types";
export { usernameFromDomain } from "./util";
