export const normalizeInput = (raw: string): string =>
  raw.trim().toLowerCase();

export const isExactDomain = (name: string): boolean =>
  name.includes(".");

/** "acme.com" -> "acme"; a name without a dot comes back unchanged. */
export const usernameFromDomain = (domain: string): string =>
  domain.split(".")[0];

export const parseList = (value: string): string[] =>
  value
    .split(/[\s,]+/)
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);

export const formatTemplate = (template: string, value: string): string =>
  template.replace("%s", () => value);
