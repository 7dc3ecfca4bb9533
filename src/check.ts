import { purchaseLink, type RegistrarClient } from "./domain/namecheap";
import type { DomainQueryOutcome, DomainSuggestion, SummaryCategory } from "./types";
import { InvalidInputError } from "./errors";
import { isExactDomain, normalizeInput } from "./util";

export const COMMON_TLDS: readonly string[] = Object.freeze([
  ".com", ".net", ".org", ".io", ".dev", ".app", ".co",
  ".xyz", ".tech", ".site", ".link", ".me", ".info", ".blog",
]);

// --- messages ---

const successMessage = (domain: string): string => `✔ Domain ${domain} is available!`;

const failureMessage = (domain: string): string => `✘ Domain ${domain} is taken.`;

export const summaryCategory = (availableCount: number): SummaryCategory =>
  availableCount <= 0
    ? "none"
    : availableCount <= 3
      ? "few"
      : availableCount <= 6
        ? "some"
        : "many";

export const summaryMessage = (base: string, category: SummaryCategory): string => {
  switch (category) {
    case "none": return `😞 No common domain extensions are available for ‘${base}’. Try a different name.`;
    case "few": return `⚠️ Only a few options are available for ‘${base}’. Consider securing one quickly!`;
    case "some": return `🙂 Some good domain extensions are still available for ‘${base}’.`;
    case "many": return `🎉 Great news! Many domain extensions are available for ‘${base}’.`;
  }
};

export const suggestionDomains = (base: string): readonly string[] =>
  COMMON_TLDS.map((tld) => `${base}${tld}`);

// --- modes ---

const checkExact = async (client: RegistrarClient, domain: string): Promise<DomainQueryOutcome> => {
  const [result] = await client.checkDomains([domain]);
  return result.available
    ? { available: true, domain: result.domain, message: successMessage(domain), link: purchaseLink(domain) }
    : { available: false, domain: result.domain, message: failureMessage(domain) };
};

const checkSuggestions = async (client: RegistrarClient, base: string): Promise<DomainQueryOutcome> => {
  const results = await client.checkDomains(suggestionDomains(base));
  const suggestions: readonly DomainSuggestion[] = results.map((r) => ({ domain: r.domain, available: r.available }));
  const summary = summaryCategory(suggestions.filter((s) => s.available).length);

  return {
    available: false,
    domain: base,
    message: summaryMessage(base, summary),
    suggestions,
    summary,
  };
};

// --- public API ---

export type DomainChecker = {
  readonly check: (input: string) => Promise<DomainQueryOutcome>;
};

export const createDomainChecker = (client: RegistrarClient): DomainChecker => ({
  check: async (input) => {
    const name = normalizeInput(input);
    if (name === "") throw new InvalidInputError("Domain must not be empty.");
    return isExactDomain(name) ? checkExact(client, name) : checkSuggestions(client, name);
  },
});
