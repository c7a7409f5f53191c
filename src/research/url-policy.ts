import { Minimatch } from "minimatch";

/**
 * Exclusion globs are matched against `host/path` (lowercased, no scheme
 * or query), e.g. `{,*.}wsj.com/**` excludes every page on wsj.com.
 */
export class UrlPolicy {
  private readonly matchers: Minimatch[];

  constructor(globs: readonly string[]) {
    this.matchers = globs.map(
      (glob) => new Minimatch(glob.toLowerCase(), { dot: true, nocase: true }),
    );
  }

  static target(url: string): string | null {
    try {
      const parsed = new URL(url);
      if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
        return null;
      }
      return `${parsed.hostname}${parsed.pathname}`.toLowerCase();
    } catch {
      return null;
    }
  }

  /** Unparseable and non-http URLs are always excluded. */
  isExcluded(url: string): boolean {
    const target = UrlPolicy.target(url);
    if (target === null) {
      return true;
    }
    return this.matchers.some((matcher) => matcher.match(target));
  }
}
