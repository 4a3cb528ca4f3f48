import { parse } from "tldts";

const URL_PLACEHOLDERS = new Set(["", "n/a", "na", "none", "null", "-", "--"]);

/**
 * Computes edit distance with a rolling row.
 */
export const levenshteinDistance = (left: string, right: string): number => {
  if (left.length === 0) {
    return right.length;
  }
  if (right.length === 0) {
    return left.length;
  }

  let previous = Array.from({ length: right.length + 1 }, (_, index) => index);
  for (let i = 1; i <= left.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= right.length; j += 1) {
      const cost = left[i - 1] === right[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost,
      );
    }
    previous = current;
  }

  return previous[right.length] ?? 0;
};

/**
 * Normalized Levenshtein similarity in [0, 1].
 */
export const levenshteinSimilarity = (left: string, right: string): number => {
  const longest = Math.max(left.length, right.length);
  if (longest === 0) {
    return 1;
  }
  return 1 - levenshteinDistance(left, right) / longest;
};

/**
 * Standardizes a raw website value; placeholders and unparsable values become undefined.
 */
export const standardizeUrl = (
  raw: string | undefined,
): string | undefined => {
  const trimmed = raw?.trim() ?? "";
  if (URL_PLACEHOLDERS.has(trimmed.toLowerCase())) {
    return undefined;
  }

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    return undefined;
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return undefined;
  }

  const host = url.hostname.toLowerCase().replace(/^www\./, "");
  if (!host.includes(".")) {
    return undefined;
  }

  const port = url.port ? `:${url.port}` : "";
  const path = url.pathname.replace(/\/+$/, "");
  return `${url.protocol}//${host}${port}${path}${url.search}${url.hash}`;
};

/**
 * Returns the registrable domain (public-suffix aware) of a URL or bare host.
 */
export const domainOf = (raw: string | undefined): string | undefined => {
  const standardized = standardizeUrl(raw);
  if (!standardized) {
    return undefined;
  }

  const parsed = parse(new URL(standardized).hostname);
  if (parsed.isIp || !parsed.domain) {
    return undefined;
  }
  return parsed.domain;
};

/**
 * Registrable domain without its public suffix: `acmebio.com` becomes `acmebio`.
 */
export const brandToken = (domainKey: string): string => {
  const parsed = parse(domainKey);
  return parsed.domainWithoutSuffix ?? domainKey.split(".")[0] ?? domainKey;
};

export type NormalizationOptions = {
  legalSuffixes: readonly string[];
  aggregators: readonly string[];
};

/**
 * Produces matching keys for names and domains using the configured suffix and aggregator lists.
 */
export class NormalizationService {
  private readonly suffixes: Set<string>;
  private readonly aggregators: string[];

  constructor(options: NormalizationOptions) {
    this.suffixes = new Set(
      options.legalSuffixes.map((suffix) =>
        suffix.toLowerCase().replace(/[^a-z0-9]/g, ""),
      ),
    );
    this.aggregators = options.aggregators.map((domain) =>
      domain.toLowerCase(),
    );
  }

  normalizeName(name: string): string {
    const cleaned = name
      .toLowerCase()
      .replace(/\([^)]*\)/g, " ")
      .replace(/[-/_&+]/g, " ")
      .replace(/[^a-z0-9\s]/g, "");

    const tokens = cleaned.split(/\s+/).filter((token) => token.length > 0);
    while (tokens.length > 1 && this.suffixes.has(tokens[tokens.length - 1] ?? "")) {
      tokens.pop();
    }
    return tokens.join(" ");
  }

  nameSimilarity(left: string, right: string): number {
    return levenshteinSimilarity(
      this.normalizeName(left),
      this.normalizeName(right),
    );
  }

  /**
   * True for social networks, directories, site builders and link-in-bio hosts.
   */
  isAggregator(domainOrUrl: string | undefined): boolean {
    const standardized = standardizeUrl(domainOrUrl);
    if (!standardized) {
      return false;
    }

    const host = new URL(standardized).hostname;
    const registrable = domainOf(standardized);
    return this.aggregators.some(
      (aggregator) =>
        registrable === aggregator ||
        host === aggregator ||
        host.endsWith(`.${aggregator}`),
    );
  }
}
