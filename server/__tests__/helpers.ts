import type { KeyphraseCluster, NormalizedPhrase, RunConfig, RunConfigInput } from "@shared/schema";
import { parseRunConfig } from "../config/run-config";

export function buildConfig(overrides: Partial<RunConfigInput> = {}): RunConfig {
  return parseRunConfig({
    global_target: 10,
    categories: [
      { name: "common", soft_target: 3, overflow_margin: 1, priority_weight: 0.5, word_count_range: [1, 4], folders: ["common"] },
      { name: "reference", soft_target: 5, overflow_margin: 2, priority_weight: 2, folders: ["api-reference"] },
      { name: "guide", soft_target: 4, overflow_margin: 1, priority_weight: 1.5, folders: ["guides"] },
    ],
    stoplist: ["api", "documentation", "guide"],
    acronym_table: [{ acronym: "RTP", full_name: "Real-Time Payments" }],
    acronyms: ["ACH", "FedNow"],
    ...overrides,
  });
}

export function phrase(
  canonicalText: string,
  originalText: string = canonicalText,
  sourceDocumentId: string = "doc-1",
  category: string = "reference",
): NormalizedPhrase {
  return { canonicalText, originalText, sourceDocumentId, category };
}

export function makeCluster(options: {
  id: string;
  representative: string;
  documents: number;
  category?: string;
  firstSeenOrder: number;
  overQuota?: boolean;
}): KeyphraseCluster {
  const category = options.category ?? "reference";
  return {
    id: options.id,
    representative: options.representative,
    memberKeys: new Set([options.representative.toLowerCase()]),
    variants: new Set([options.representative]),
    categoryVotes: new Map([[category, options.documents]]),
    sourceDocuments: new Set(Array.from({ length: options.documents }, (_, i) => `${options.id}-doc-${i}`)),
    firstSeenOrder: options.firstSeenOrder,
    quotaCategory: category,
    overQuota: options.overQuota ?? false,
    paired: false,
    pairedWith: [],
  };
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}
