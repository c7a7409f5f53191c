import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { ArticleAsset } from "../storage/content-store";
import { defineWorkflowKind, subjectSlug } from "../core/workflow-definition";
import { createModuleLogger } from "../core/logger";
import type { FieldSpec } from "../knowledge/coverage";
import { attempt, buildResearchBrief, generateStructured } from "./shared";

const log = createModuleLogger("article");

const MAX_PRIORITY_SOURCES = 3;

export const ARTICLE_FIELDS: readonly FieldSpec[] = [
  { name: "background", keywords: ["background", "history", "previously"] },
  { name: "key_facts", keywords: ["announced", "according to", "reported"] },
  { name: "stakeholders", keywords: ["spokesperson", "said", "investors"] },
  { name: "figures", keywords: ["million", "billion", "percent"] },
  { name: "timeline", keywords: ["expected to", "scheduled", "deadline"] },
  { name: "impact", keywords: ["impact", "implications", "analysts"] },
];

export const ArticleDraftSchema = Type.Object({
  title: Type.String({ minLength: 1 }),
  summary: Type.String({ minLength: 1 }),
  content: Type.String({ minLength: 1 }),
  sections: Type.Array(Type.Object({ title: Type.String(), content: Type.String() })),
  image_prompts: Type.Array(Type.String()),
  tags: Type.Array(Type.String()),
});

export type ArticleDraft = Static<typeof ArticleDraftSchema>;

const SYSTEM_PROMPT = `You write news articles from research notes.
Respond with a single JSON object with the keys: title, summary,
content (markdown), sections ({title, content}[]), image_prompts (string[],
one short visual description per illustration), tags (string[]).
Cite sources inline as [n] using the numbering in the notes.`;

const aspectRatioFor = (position: number): string =>
  position === 0 ? "16:9" : "4:3";

export const articleWorkflow = defineWorkflowKind<ArticleDraft>({
  kind: "Article",
  fields: ARTICLE_FIELDS,

  buildQueries: (subject) => {
    const queries = [subject.name, `${subject.name} latest news`];
    const sources = (subject.hints.priority_sources ?? "")
      .split(",")
      .map((source) => source.trim())
      .filter(Boolean)
      .slice(0, MAX_PRIORITY_SOURCES);
    for (const source of sources) {
      queries.push(`${subject.name} site:${source}`);
    }
    return queries;
  },

  escalationQuery: (subject, missing) =>
    `${subject.name} ${missing.map((field) => field.keywords[0] ?? field.name).join(" ")}`,

  isDraft: (value): value is ArticleDraft => Value.Check(ArticleDraftSchema, value),

  persistCostMicros: (config) => config.maxArticleImages * config.costs.mediaMicros,

  generateDraft: (ctx) =>
    generateStructured(
      ctx,
      "generate-article",
      ArticleDraftSchema,
      SYSTEM_PROMPT,
      `Article type: ${ctx.subject.hints.article_type ?? "news"}\n${buildResearchBrief(ctx)}`,
    ),

  // Media first, then one transaction for the article and its assets.
  persist: async (draft, ctx) => {
    const prompts = draft.image_prompts.slice(0, ctx.config.maxArticleImages);
    const assets: ArticleAsset[] = [];
    const degraded: string[] = [];

    for (const [position, prompt] of prompts.entries()) {
      const outcome = await attempt(() =>
        ctx.activities.run(
          "generate-media",
          { prompt, position },
          async (signal) => ({
            value: await ctx.pool.media.generateAsset(
              { prompt, aspectRatio: aspectRatioFor(position) },
              signal,
            ),
            costMicros: ctx.config.costs.mediaMicros,
          }),
          { maxCostMicros: ctx.config.costs.mediaMicros },
        ),
      );
      if (outcome.ok) {
        assets.push({ url: outcome.value, prompt });
      } else {
        log.warn("media asset skipped", {
          instance: ctx.instanceId,
          position,
          error: outcome.error.message,
        });
        if (!degraded.includes("media")) {
          degraded.push("media");
        }
      }
    }

    const slug = subjectSlug(ctx.subject.name);
    const stored = await ctx.activities.run(
      "persist-article",
      { instance_id: ctx.instanceId, slug, assets: assets.map((asset) => asset.url) },
      async () => ({
        value: ctx.pool.content.saveArticle(
          {
            slug,
            subject_id: ctx.subject.id,
            instance_id: ctx.instanceId,
            title: draft.title,
            article_type: ctx.subject.hints.article_type ?? "news",
            summary: draft.summary,
            content: draft.content,
            sections: draft.sections,
            coverage: ctx.coverage,
            partial: ctx.partial,
          },
          assets,
        ),
      }),
    );

    return {
      record_id: stored.id,
      slug: stored.slug,
      assets: assets.map((asset) => asset.url),
      degraded,
    };
  },
});
