import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  affordableOutputTokens,
  generationCost,
  parseJsonObject,
} from "../content/generator";
import { CancelledError, TransientError, WorkflowError } from "../core/errors";
import type { KindContext } from "../core/workflow-definition";

const MAX_BRIEF_FINDINGS = 12;
const MAX_EXCERPT_CHARS = 800;
const MIN_OUTPUT_TOKENS = 256;
// Allowance for message framing on top of the prompt text.
const FRAMING_TOKENS = 16;

/**
 * Research brief handed to the model: the merged knowledge record
 * followed by the strongest usable findings with their sources.
 */
export const buildResearchBrief = (ctx: KindContext): string => {
  const lines: string[] = [`Subject: ${ctx.subject.name}`];
  for (const [key, value] of Object.entries(ctx.subject.hints)) {
    lines.push(`${key}: ${value}`);
  }

  const entities = Object.entries(ctx.knowledge.entities).sort(([a], [b]) =>
    a.localeCompare(b),
  );
  if (entities.length > 0) {
    lines.push("", "Known facts:");
    for (const [name, entity] of entities) {
      const value = entity.attributes.value ?? JSON.stringify(entity.attributes);
      lines.push(`- ${name}: ${value} (source: ${entity.source})`);
    }
  }

  if (ctx.knowledge.narrative.length > 0) {
    lines.push("", "Narrative:", ctx.knowledge.narrative);
  }

  const findings = ctx.findings.slice(0, MAX_BRIEF_FINDINGS);
  if (findings.length > 0) {
    lines.push("", "Sources:");
    findings.forEach((finding, index) => {
      lines.push(
        `[${index + 1}] ${finding.title || finding.url} <${finding.url}>`,
        finding.excerpt.slice(0, MAX_EXCERPT_CHARS),
      );
    });
  }

  if (ctx.partial) {
    lines.push(
      "",
      "Research coverage is incomplete. Omit anything the sources do not support.",
    );
  }
  return lines.join("\n");
};

/**
 * One generation activity whose output must parse as JSON and match the
 * schema. Output that does not is retried as a transient failure.
 *
 * The output limit is sized so the worst-case charge fits what the cost
 * ceiling leaves after `ctx.reserveMicros`. Input tokens are bounded by
 * the prompt's UTF-8 length, as no token is shorter than a byte.
 */
export const generateStructured = async <T extends TSchema>(
  ctx: KindContext,
  activity: string,
  schema: T,
  system: string,
  prompt: string,
): Promise<Static<T>> => {
  const costs = ctx.config.costs;
  const inputBound = Buffer.byteLength(system + prompt, "utf8") + FRAMING_TOKENS;
  const cap = ctx.config.services.generation.maxTokens;
  const maxTokens = Math.max(
    Math.min(MIN_OUTPUT_TOKENS, cap),
    affordableOutputTokens(
      costs,
      ctx.activities.budget.remainingMicros - ctx.reserveMicros,
      inputBound,
      cap,
    ),
  );

  return ctx.activities.run<Static<T>>(
    activity,
    {
      subject_id: ctx.subject.id,
      coverage: ctx.coverage,
      knowledge_updated_at: ctx.knowledge.updated_at,
      sources: ctx.findings.map((finding) => finding.url),
    },
    async (signal) => {
      const response = await ctx.pool.generator.generate(
        { system, prompt, maxTokens },
        signal,
      );
      const parsed = parseJsonObject(response.text);
      if (!Value.Check(schema, parsed)) {
        const first = [...Value.Errors(schema, parsed)][0];
        throw new TransientError(
          `${activity} output did not match the expected shape${first ? `: ${first.path} ${first.message}` : ""}`,
        );
      }
      return { value: parsed, costMicros: response.costMicros };
    },
    { maxCostMicros: generationCost(costs, inputBound, maxTokens) },
  );
};

/** Best-effort activity: failures are reported as a degraded dependency. */
export const attempt = async <T>(
  run: () => Promise<T>,
): Promise<{ ok: true; value: T } | { ok: false; error: WorkflowError }> => {
  try {
    return { ok: true, value: await run() };
  } catch (error) {
    if (error instanceof CancelledError || !(error instanceof WorkflowError)) {
      throw error;
    }
    return { ok: false, error };
  }
};
