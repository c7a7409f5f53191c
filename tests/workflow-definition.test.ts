import { describe, expect, it } from "vitest";
import { defaultWorkerConfig } from "../src/config/worker-config";
import {
  affordableOutputTokens,
  generationCost,
  parseJsonObject,
} from "../src/content/generator";
import { TransientError } from "../src/core/errors";
import { slugify, subjectSlug } from "../src/core/workflow-definition";
import { articleWorkflow, builtInKinds, companyWorkflow } from "../src/workflows";
import { testSubject } from "./helpers/fakes";

describe("workflow kinds", () => {
  it("registers both built-in kinds", () => {
    expect([...builtInKinds().keys()]).toEqual(["Company", "Article"]);
  });

  it("slugifies subject names", () => {
    expect(slugify("Société Générale & Co.")).toBe("societe-generale-co");
    expect(slugify("  --Acme   Corp--  ")).toBe("acme-corp");
    expect(slugify("a".repeat(100))).toHaveLength(80);
  });

  it("hashes names that have no Latin slug", () => {
    expect(subjectSlug("Acme Corp")).toBe("acme-corp");
    expect(subjectSlug("東京電力")).toBe("s-05bb78db56b9");
    expect(subjectSlug("日本郵政")).toBe("s-47eef5f0b88d");
  });

  it("sizes the output limit to what the budget affords", () => {
    const costs = defaultWorkerConfig.costs;
    expect(affordableOutputTokens(costs, 18_000, 1_000, 4_096)).toBe(1_000);
    expect(affordableOutputTokens(costs, 1_000_000, 1_000, 4_096)).toBe(4_096);
    expect(affordableOutputTokens(costs, 2_000, 1_000, 4_096)).toBe(0);
  });

  it("builds company queries from hints", () => {
    const subject = { ...testSubject(), hints: { jurisdiction: "Delaware" } };
    expect(companyWorkflow.buildQueries(subject)).toEqual([
      "Acme Corp",
      "Acme Corp acquisitions deals",
      "Acme Corp Delaware",
    ]);
    expect(
      companyWorkflow.escalationQuery?.(subject, [
        { name: "team_size", keywords: ["employees"] },
        { name: "founded", keywords: ["founded"] },
      ]),
    ).toBe("Acme Corp company team size founded");
  });

  it("adds at most three priority sources to article queries", () => {
    const subject = {
      ...testSubject("Acme expands", "Article"),
      hints: { priority_sources: "a.example, b.example,,c.example,d.example" },
    };
    expect(articleWorkflow.buildQueries(subject)).toEqual([
      "Acme expands",
      "Acme expands latest news",
      "Acme expands site:a.example",
      "Acme expands site:b.example",
      "Acme expands site:c.example",
    ]);
  });
});

describe("generation helpers", () => {
  it("extracts the JSON object from model output", () => {
    expect(parseJsonObject('```json\n{"name":"Acme","tags":["a"]}\n```')).toEqual({
      name: "Acme",
      tags: ["a"],
    });
    expect(() => parseJsonObject("no object here")).toThrow(TransientError);
    expect(() => parseJsonObject("{ not json }")).toThrow("model output was not valid JSON");
  });

  it("prices tokens from the cost table", () => {
    expect(generationCost(defaultWorkerConfig.costs, 100, 50)).toBe(1_050);
  });
});
