import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { defineWorkflowKind, subjectSlug } from "../core/workflow-definition";
import type { FieldSpec } from "../knowledge/coverage";
import { buildResearchBrief, generateStructured } from "./shared";

export const COMPANY_FIELDS: readonly FieldSpec[] = [
  { name: "headquarters", keywords: ["headquartered", "headquarters", "based in"] },
  { name: "founded", keywords: ["founded", "established in"] },
  { name: "services", keywords: ["services", "specializes", "specialises", "advises"] },
  { name: "leadership", keywords: ["chief executive", "ceo", "managing partner", "founder"] },
  { name: "deals", keywords: ["acquired", "acquisition", "raised", "transaction"] },
  { name: "team_size", keywords: ["employees", "staff", "team of"] },
];

export const CompanyDraftSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  summary: Type.String({ minLength: 1 }),
  headquarters: Type.Optional(Type.String()),
  founded_year: Type.Optional(Type.Integer()),
  services: Type.Array(Type.String()),
  leadership: Type.Array(Type.Object({ name: Type.String(), role: Type.String() })),
  deals: Type.Array(
    Type.Object({ title: Type.String(), year: Type.Optional(Type.Integer()) }),
  ),
  sections: Type.Array(Type.Object({ title: Type.String(), content: Type.String() })),
  meta_description: Type.Optional(Type.String()),
});

export type CompanyDraft = Static<typeof CompanyDraftSchema>;

const SYSTEM_PROMPT = `You write factual company profiles from research notes.
Respond with a single JSON object with the keys: name, summary, headquarters,
founded_year, services (string[]), leadership ({name, role}[]),
deals ({title, year}[]), sections ({title, content}[]), meta_description.
Use only facts present in the notes; omit optional keys you cannot support.`;

export const companyWorkflow = defineWorkflowKind<CompanyDraft>({
  kind: "Company",
  fields: COMPANY_FIELDS,

  buildQueries: (subject) => {
    const queries = [subject.name, `${subject.name} acquisitions deals`];
    const jurisdiction = subject.hints.jurisdiction;
    if (jurisdiction) {
      queries.push(`${subject.name} ${jurisdiction}`);
    }
    return queries;
  },

  escalationQuery: (subject, missing) =>
    `${subject.name} company ${missing.map((field) => field.name.replace(/_/g, " ")).join(" ")}`,

  isDraft: (value): value is CompanyDraft => Value.Check(CompanyDraftSchema, value),

  generateDraft: (ctx) =>
    generateStructured(
      ctx,
      "generate-company-profile",
      CompanyDraftSchema,
      SYSTEM_PROMPT,
      buildResearchBrief(ctx),
    ),

  persist: async (draft, ctx) => {
    const slug = subjectSlug(ctx.subject.name);
    const stored = await ctx.activities.run(
      "persist-company",
      { instance_id: ctx.instanceId, slug },
      async () => ({
        value: ctx.pool.content.saveCompany({
          slug,
          subject_id: ctx.subject.id,
          instance_id: ctx.instanceId,
          name: draft.name,
          category: ctx.subject.hints.category ?? "company",
          jurisdiction: ctx.subject.hints.jurisdiction ?? "unknown",
          domain: ctx.subject.hints.domain ?? null,
          summary: draft.summary,
          profile: draft,
          coverage: ctx.coverage,
          partial: ctx.partial,
        }),
      }),
    );
    return { record_id: stored.id, slug: stored.slug, assets: [] };
  },
});
