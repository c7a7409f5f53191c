import { TransientError, errorMessage } from "../core/errors";
import { createModuleLogger } from "../core/logger";
import type { CostBudget } from "./budget";
import type { CrawlService, CrawledPage } from "./crawl-service";

const log = createModuleLogger("crawl-fallback");

export interface CrawlProvider {
  name: string;
  service: CrawlService;
  /** Charged to the caller's budget before each call. */
  costMicros: number;
}

/**
 * Tries each provider in order and returns the first page with content.
 * A paid provider the budget cannot cover is skipped, not called.
 */
export class FallbackCrawlService implements CrawlService {
  constructor(private readonly providers: readonly CrawlProvider[]) {
    if (providers.length === 0) {
      throw new Error("FallbackCrawlService needs at least one provider");
    }
  }

  async fetch(url: string, signal?: AbortSignal, budget?: CostBudget): Promise<CrawledPage> {
    const failures: string[] = [];

    for (const provider of this.providers) {
      if (signal?.aborted) {
        throw new TransientError(`crawl of ${url} cancelled`);
      }
      if (provider.costMicros > 0 && budget && !budget.tryCharge(provider.costMicros)) {
        failures.push(`${provider.name}: over budget`);
        continue;
      }

      try {
        const page = await provider.service.fetch(url, signal, budget);
        if (failures.length > 0) {
          log.debug("crawl fell back", { url, provider: provider.name, failures });
        }
        return page;
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        failures.push(`${provider.name}: ${errorMessage(error)}`);
      }
    }

    throw new TransientError(`every crawl provider failed: ${failures.join("; ")}`);
  }

  /** Health of the primary provider. */
  async ping(): Promise<void> {
    const [primary] = this.providers;
    await primary?.service.ping();
  }
}
