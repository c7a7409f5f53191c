import type { WorkerConfig } from "../config/worker-config";
import { CancelledError, TransientError, errorMessage } from "../core/errors";
import { createModuleLogger } from "../core/logger";
import type { KnowledgeRecord, ResearchFinding, Subject } from "../core/types";
import { CRAWL_FAILED } from "../core/types";
import {
  type FieldSpec,
  computeCoverage,
  extractFacts,
  missingFields,
  splitSentences,
} from "../knowledge/coverage";
import { mapWithConcurrency } from "../runtime/concurrency";
import type { CrawlService, CrawledPage } from "./crawl-service";
import type { EscalationProvider } from "./escalation-provider";
import type { SearchHit, SearchProvider } from "./search-provider";
import type { CostBudget } from "./budget";
import { UrlPolicy } from "./url-policy";

const log = createModuleLogger("funnel");

const EXCERPT_SENTENCES = 5;

export type FunnelSettings = Pick<
  WorkerConfig,
  | "searchPages"
  | "crawlCandidates"
  | "crawlAttempts"
  | "crawlConcurrency"
  | "relevanceThreshold"
  | "rankDecay"
  | "unmentionedFactor"
  | "coverageThreshold"
  | "excludeUrls"
  | "costs"
>;

export interface FunnelRequest {
  instanceId?: string;
  subject: Subject;
  queries: readonly string[];
  fields: readonly FieldSpec[];
  prior: KnowledgeRecord | null;
  /** Builds the escalation query for the fields still missing. */
  escalationQuery?: (missing: readonly FieldSpec[]) => string;
}

export type FunnelStage = "search" | "filter" | "crawl" | "synthesis";

export interface FunnelStats {
  searchCalls: number;
  searchFailures: number;
  snippets: number;
  promoted: number;
  crawled: number;
  crawlFailed: number;
  escalated: number;
}

export interface FunnelResult {
  findings: ResearchFinding[];
  coverage: number;
  costMicros: number;
  ceilingReached: boolean;
  degraded: string[];
  terminatedAfter: FunnelStage;
  stats: FunnelStats;
}

const compareFindings = (a: ResearchFinding, b: ResearchFinding): number =>
  b.relevance - a.relevance ||
  a.rank - b.rank ||
  (a.url < b.url ? -1 : a.url > b.url ? 1 : 0);

/** Keeps the higher-relevance version of a URL; ties keep the earlier one. */
export const mergeFinding = (
  findings: Map<string, ResearchFinding>,
  finding: ResearchFinding,
): void => {
  const existing = findings.get(finding.url);
  if (!existing || finding.relevance > existing.relevance) {
    findings.set(finding.url, finding);
  }
};

const mentionsSubject = (subject: Subject, text: string): boolean =>
  text.toLowerCase().includes(subject.name.toLowerCase());

export class ResearchFunnel {
  private readonly urlPolicy: UrlPolicy;

  constructor(
    private readonly settings: FunnelSettings,
    private readonly search: SearchProvider,
    private readonly crawl: CrawlService,
    private readonly escalation?: EscalationProvider,
  ) {
    this.urlPolicy = new UrlPolicy(settings.excludeUrls);
  }

  snippetRelevance(subject: Subject, hit: SearchHit): number {
    const decay = this.settings.rankDecay ** Math.max(0, hit.rank - 1);
    const factor = mentionsSubject(subject, `${hit.title} ${hit.snippet}`)
      ? 1
      : this.settings.unmentionedFactor;
    return decay * factor;
  }

  /** Drops excluded and low-relevance snippets and caps the crawl list. */
  filterCandidates(snippets: Iterable<ResearchFinding>): ResearchFinding[] {
    return [...snippets]
      .filter(
        (finding) =>
          !this.urlPolicy.isExcluded(finding.url) &&
          finding.relevance >= this.settings.relevanceThreshold,
      )
      .sort(compareFindings)
      .slice(0, this.settings.crawlCandidates);
  }

  async run(
    request: FunnelRequest,
    budget: CostBudget,
    signal?: AbortSignal,
  ): Promise<FunnelResult> {
    const { subject, fields, prior } = request;
    const stats: FunnelStats = {
      searchCalls: 0,
      searchFailures: 0,
      snippets: 0,
      promoted: 0,
      crawled: 0,
      crawlFailed: 0,
      escalated: 0,
    };
    const degraded: string[] = [];
    let spent = 0;
    let ceilingReached = false;

    const charge = (micros: number): boolean => {
      if (!budget.tryCharge(micros)) {
        ceilingReached = true;
        return false;
      }
      spent += micros;
      return true;
    };

    // Every spend in this run passes through `charge`.
    const tracked: CostBudget = {
      get remainingMicros() {
        return budget.remainingMicros;
      },
      tryCharge: charge,
    };

    const checkCancelled = () => {
      if (signal?.aborted) {
        throw new CancelledError(request.instanceId ?? subject.id);
      }
    };

    let findings = new Map<string, ResearchFinding>();
    const finish = (stage: FunnelStage): FunnelResult => {
      const list = [...findings.values()].sort(compareFindings);
      const result: FunnelResult = {
        findings: list,
        coverage: computeCoverage(prior, list, fields),
        costMicros: spent,
        ceilingReached,
        degraded,
        terminatedAfter: stage,
        stats,
      };
      log.info("funnel finished", {
        subject: subject.id,
        stage,
        findings: list.length,
        coverage: result.coverage,
        costMicros: spent,
        ceilingReached,
      });
      return result;
    };
    const sufficient = () =>
      computeCoverage(prior, findings.values(), fields) >=
      this.settings.coverageThreshold;

    // Broad search
    search: for (const query of request.queries) {
      for (let page = 1; page <= this.settings.searchPages; page += 1) {
        checkCancelled();
        if (!charge(this.settings.costs.searchMicros)) {
          break search;
        }
        stats.searchCalls += 1;
        let hits: SearchHit[];
        try {
          hits = await this.search.search(query, page, signal);
        } catch (error) {
          checkCancelled();
          stats.searchFailures += 1;
          log.warn("search page failed", {
            subject: subject.id,
            query,
            page,
            error: errorMessage(error),
          });
          continue;
        }
        for (const hit of hits) {
          mergeFinding(findings, this.snippetFinding(subject, hit, fields));
        }
      }
    }

    if (stats.searchCalls > 0 && stats.searchFailures === stats.searchCalls) {
      throw new TransientError(
        `every search page failed for ${subject.id} (${stats.searchCalls} calls)`,
      );
    }
    stats.snippets = findings.size;
    if (ceilingReached || sufficient()) {
      return finish("search");
    }

    // Relevance and cost filter
    const candidates = this.filterCandidates(findings.values());
    stats.promoted = candidates.length;
    findings = new Map(candidates.map((finding) => [finding.url, finding]));
    if (sufficient()) {
      return finish("filter");
    }

    // Full-content crawl
    const crawled = await mapWithConcurrency(
      candidates,
      this.settings.crawlConcurrency,
      (candidate) => this.crawlCandidate(candidate, fields, tracked, signal),
    );
    checkCancelled();
    for (const finding of crawled) {
      if (finding.tier === "crawled-full") stats.crawled += 1;
      if (CRAWL_FAILED in finding.facts) stats.crawlFailed += 1;
      findings.set(finding.url, finding);
    }
    if (ceilingReached || sufficient()) {
      return finish("crawl");
    }

    // Synthesis with escalation for the remaining gap
    if (this.escalation) {
      const missing = missingFields(prior, findings.values(), fields);
      const query =
        request.escalationQuery?.(missing) ??
        `${subject.name} ${missing.map((field) => field.keywords[0] ?? field.name).join(" ")}`;
      if (charge(this.settings.costs.escalationMicros)) {
        try {
          const hits = await this.escalation.research(
            query,
            [...findings.keys()],
            signal,
          );
          hits.forEach((hit, index) => {
            if (findings.has(hit.url)) {
              return;
            }
            const facts = extractFacts(hit.text, missing);
            const matched = Object.keys(facts).length;
            findings.set(hit.url, {
              url: hit.url,
              tier: "crawled-full",
              relevance: missing.length > 0 ? matched / missing.length : 0,
              rank: index + 1,
              title: hit.title,
              excerpt: splitSentences(hit.text)
                .slice(0, EXCERPT_SENTENCES)
                .join(" "),
              facts,
              cost_micros: index === 0 ? this.settings.costs.escalationMicros : 0,
              retrieved_at: new Date().toISOString(),
            });
            stats.escalated += 1;
          });
        } catch (error) {
          checkCancelled();
          degraded.push("escalation");
          log.warn("escalation provider failed", {
            subject: subject.id,
            error: errorMessage(error),
          });
        }
      }
    }

    return finish("synthesis");
  }

  private snippetFinding(
    subject: Subject,
    hit: SearchHit,
    fields: readonly FieldSpec[],
  ): ResearchFinding {
    return {
      url: hit.url,
      tier: "search-snippet",
      relevance: this.snippetRelevance(subject, hit),
      rank: hit.rank,
      title: hit.title,
      excerpt: hit.snippet,
      facts: extractFacts(hit.snippet, fields),
      cost_micros: 0,
      retrieved_at: new Date().toISOString(),
    };
  }

  private async crawlCandidate(
    candidate: ResearchFinding,
    fields: readonly FieldSpec[],
    budget: CostBudget,
    signal?: AbortSignal,
  ): Promise<ResearchFinding> {
    let lastError = "not attempted";
    let cost = 0;
    const pageBudget: CostBudget = {
      get remainingMicros() {
        return budget.remainingMicros;
      },
      tryCharge: (micros) => {
        if (!budget.tryCharge(micros)) {
          return false;
        }
        cost += micros;
        return true;
      },
    };

    for (let attempt = 1; attempt <= this.settings.crawlAttempts; attempt += 1) {
      if (signal?.aborted) {
        return candidate;
      }
      if (!pageBudget.tryCharge(this.settings.costs.crawlMicros)) {
        return candidate;
      }

      try {
        const page = await this.crawl.fetch(candidate.url, signal, pageBudget);
        return this.crawledFinding(candidate, page, fields, cost);
      } catch (error) {
        lastError = errorMessage(error);
        log.debug("crawl attempt failed", {
          url: candidate.url,
          attempt,
          error: lastError,
        });
      }
    }

    log.warn("crawl abandoned", { url: candidate.url, error: lastError });
    return {
      ...candidate,
      facts: { ...candidate.facts, [CRAWL_FAILED]: lastError },
      cost_micros: candidate.cost_micros + cost,
    };
  }

  private crawledFinding(
    candidate: ResearchFinding,
    page: CrawledPage,
    fields: readonly FieldSpec[],
    cost: number,
  ): ResearchFinding {
    const facts: Record<string, string> = {
      ...candidate.facts,
      ...extractFacts(page.text, fields),
      ...page.structured_facts,
    };
    const matched = fields.filter((field) => field.name in facts).length;
    const contentScore = fields.length > 0 ? matched / fields.length : 0;

    return {
      url: candidate.url,
      tier: "crawled-full",
      relevance: Math.max(candidate.relevance, contentScore),
      rank: candidate.rank,
      title: page.title ?? candidate.title,
      excerpt: splitSentences(page.text).slice(0, EXCERPT_SENTENCES).join(" "),
      facts,
      cost_micros: candidate.cost_micros + cost,
      retrieved_at: new Date().toISOString(),
    };
  }
}
