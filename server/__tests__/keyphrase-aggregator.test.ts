import { describe, expect, it } from "vitest";
import type { CandidatePhrase, Document } from "@shared/schema";
import { KeyphraseAggregator, orderForReplay } from "../keyphrase-aggregator";
import { buildConfig } from "./helpers";

function doc(id: string, category: string): Document {
  return { id, category, rawContent: "" };
}

function candidates(document: Document, texts: string[]): CandidatePhrase[] {
  return texts.map(text => ({ text, sourceDocumentId: document.id, category: document.category }));
}

describe("KeyphraseAggregator", () => {
  it("excludes terms admitted from common documents from every other category", () => {
    const aggregator = new KeyphraseAggregator(buildConfig());
    const common = doc("c1", "common");
    const reference = doc("r1", "reference");

    aggregator.ingest(common, candidates(common, ["Access Token"]));
    aggregator.ingest(reference, candidates(reference, ["access token", "ACH payment"]));

    expect(aggregator.getAuditLog()).toEqual([
      { reason: "ExcludedCommonTerm", text: "access token", documentId: "r1", category: "reference" },
    ]);
    expect(aggregator.snapshot().map(c => c.representative)).toEqual(["access token", "ACH payment"]);
    expect(aggregator.isExcluded("Access  TOKEN")).toBe(true);
    expect(aggregator.isExcluded("ACH payment")).toBe(false);
  });

  it("lets later common documents merge into common terms", () => {
    const aggregator = new KeyphraseAggregator(buildConfig());
    const first = doc("c1", "common");
    const second = doc("c2", "common");

    aggregator.ingest(first, candidates(first, ["access token"]));
    aggregator.ingest(second, candidates(second, ["access tokens"]));

    expect(aggregator.getAuditLog()).toEqual([]);
    const [cluster] = aggregator.snapshot();
    expect([...cluster.sourceDocuments]).toEqual(["c1", "c2"]);
  });

  it("audits each rejected phrase with its reason", () => {
    const aggregator = new KeyphraseAggregator(buildConfig());
    const reference = doc("r1", "reference");

    aggregator.ingest(reference, candidates(reference, [
      "API",
      "",
      "one two three four five six",
      "ACH payment",
      "ach payment",
    ]));

    expect(aggregator.getAuditLog().map(entry => [entry.reason, entry.text])).toEqual([
      ["Stoplisted", "API"],
      ["TooShort", ""],
      ["TooLong", "one two three four five six"],
      ["DuplicateInDocument", "ach payment"],
    ]);
    expect(aggregator.snapshot()).toHaveLength(1);
  });

  it("rejects new clusters once quotas are exhausted but still accepts merges", () => {
    const aggregator = new KeyphraseAggregator(buildConfig({
      global_target: 1,
      categories: [{ name: "reference", soft_target: 1, overflow_margin: 0 }],
    }));
    const reference = doc("r1", "reference");

    aggregator.ingest(reference, candidates(reference, ["wire transfer", "routing number", "wire transfers"]));

    expect(aggregator.getAuditLog()).toEqual([
      {
        reason: "QuotaExhausted",
        text: "routing number",
        documentId: "r1",
        category: "reference",
        detail: "category reference and global target exhausted",
      },
    ]);
    const [cluster] = aggregator.snapshot();
    expect([...cluster.variants]).toEqual(["wire transfer", "wire transfers"]);
    expect(aggregator.categoryCounts()).toEqual({ reference: 1 });
  });

  it("flags clusters admitted past their category quota", () => {
    const aggregator = new KeyphraseAggregator(buildConfig({
      global_target: 5,
      categories: [{ name: "reference", soft_target: 1, overflow_margin: 0 }],
    }));
    const reference = doc("r1", "reference");

    aggregator.ingest(reference, candidates(reference, ["wire transfer", "routing number"]));

    expect(aggregator.snapshot().map(c => c.overQuota)).toEqual([false, true]);
  });

  it("tracks every document and category that voted for a cluster", () => {
    const aggregator = new KeyphraseAggregator(buildConfig());
    const reference = doc("r1", "reference");
    const guide = doc("g1", "guide");

    aggregator.ingest(reference, candidates(reference, ["ACH payment"]));
    aggregator.ingest(guide, candidates(guide, ["ACH payments"]));

    const [cluster] = aggregator.snapshot();
    expect([...cluster.sourceDocuments]).toEqual(["r1", "g1"]);
    expect(Object.fromEntries(cluster.categoryVotes)).toEqual({ reference: 1, guide: 1 });
  });
});

describe("orderForReplay", () => {
  it("moves common documents first and keeps arrival order within each group", () => {
    const items = [doc("g1", "guide"), doc("c1", "common"), doc("r1", "reference"), doc("c2", "common")]
      .map(document => ({ document }));

    expect(orderForReplay(items, "common").map(item => item.document.id)).toEqual(["c1", "c2", "g1", "r1"]);
  });
});
