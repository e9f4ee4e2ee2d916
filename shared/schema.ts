import { z } from "zod";

// Run configuration as supplied on disk (snake_case), transformed to the camelCase shape the server uses

const wordCountRangeSchema = z
  .tuple([z.number().int().min(1), z.number().int().min(1)])
  .refine(([min, max]) => min <= max, { message: "word_count_range min must not exceed max" });

export const categoryConfigSchema = z.object({
  name: z.string().trim().min(1, "Category name is required"),
  soft_target: z.number().int().min(0, "soft_target must be non-negative"),
  overflow_margin: z.number().int().min(0, "overflow_margin must be non-negative"),
  priority_weight: z.number().min(0, "priority_weight must be non-negative").default(1),
  word_count_range: wordCountRangeSchema.default([1, 5]),
  folders: z.array(z.string().min(1)).default([]),
  target_per_document: z.number().int().positive().optional(),
  extraction_focus: z.string().optional(),
}).transform((c) => ({
  name: c.name,
  softTarget: c.soft_target,
  overflowMargin: c.overflow_margin,
  priorityWeight: c.priority_weight,
  wordCountRange: { min: c.word_count_range[0], max: c.word_count_range[1] },
  folders: c.folders,
  targetPerDocument: c.target_per_document,
  extractionFocus: c.extraction_focus,
}));

export const acronymPairSchema = z.object({
  acronym: z.string().trim().min(1),
  full_name: z.string().trim().min(1),
}).transform((p) => ({ acronym: p.acronym, fullName: p.full_name }));

export const scoringConfigSchema = z.object({
  breadth_weight: z.number().min(0).default(1),
  over_quota_penalty: z.number().min(0).default(1),
  how_to_bonus: z.number().min(0).default(0.5),
}).transform((s) => ({
  breadthWeight: s.breadth_weight,
  overQuotaPenalty: s.over_quota_penalty,
  howToBonus: s.how_to_bonus,
}));

export const runConfigSchema = z.object({
  categories: z.array(categoryConfigSchema).min(1, "At least one category is required"),
  global_target: z.number().int().positive("global_target must be a positive integer"),
  stoplist: z.array(z.string()).default([]),
  acronym_table: z.array(acronymPairSchema).default([]),
  acronyms: z.array(z.string().trim().min(1)).default([]),
  common_category: z.string().default("common"),
  how_to_prefixes: z.array(z.string().trim().min(1)).default(["how to"]),
  scoring: scoringConfigSchema.default({}),
}).superRefine((cfg, ctx) => {
  const seen = new Set<string>();
  cfg.categories.forEach((category, index) => {
    if (seen.has(category.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["categories", index, "name"],
        message: `Duplicate category "${category.name}"`,
      });
    }
    seen.add(category.name);
  });
}).transform((cfg) => ({
  categories: cfg.categories,
  globalTarget: cfg.global_target,
  stoplist: cfg.stoplist,
  acronymTable: cfg.acronym_table,
  acronyms: cfg.acronyms,
  commonCategory: cfg.common_category,
  howToPrefixes: cfg.how_to_prefixes,
  scoring: cfg.scoring,
}));

export type RunConfigInput = z.input<typeof runConfigSchema>;
export type RunConfig = z.output<typeof runConfigSchema>;
export type CategoryConfig = z.output<typeof categoryConfigSchema>;
export type AcronymPair = z.output<typeof acronymPairSchema>;
export type ScoringConfig = z.output<typeof scoringConfigSchema>;

// Documents and candidates

export const documentSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  rawContent: z.string(),
});

export type Document = Readonly<z.infer<typeof documentSchema>>;

export interface CandidatePhrase {
  text: string;
  sourceDocumentId: string;
  category: string;
}

// Extraction responses arrive in any of the shapes the extraction prompt or a custom extractor produce
const candidateItemSchema = z.union([
  z.string(),
  z.object({ text: z.string() }).transform((item) => item.text),
]);

export const extractionResponseSchema = z.union([
  z.array(candidateItemSchema),
  z.object({ keyphrases: z.array(candidateItemSchema) }).transform((r) => r.keyphrases),
]);

export interface NormalizedPhrase {
  canonicalText: string;
  originalText: string;
  sourceDocumentId: string;
  category: string;
}

export type RejectionReason = "TooShort" | "TooLong" | "Stoplisted";

export type QuotaDecision = "admit" | "admit_over_quota" | "reject";

export interface KeyphraseCluster {
  id: string;
  representative: string;
  // lowercased canonical keys of every phrase folded into the cluster
  memberKeys: Set<string>;
  variants: Set<string>;
  categoryVotes: Map<string, number>;
  sourceDocuments: Set<string>;
  firstSeenOrder: number;
  quotaCategory: string;
  overQuota: boolean;
  paired: boolean;
  pairedWith: string[];
}

export type ClusterSnapshot = ReadonlyArray<Readonly<KeyphraseCluster>>;

export interface RankedKeyphrase {
  readonly text: string;
  readonly category: string;
  readonly score: number;
}

export type AuditReason =
  | RejectionReason
  | "ExcludedCommonTerm"
  | "DuplicateInDocument"
  | "QuotaExhausted"
  | "ExtractionFailure"
  | "MalformedResponse";

export interface AuditEntry {
  reason: AuditReason;
  text: string;
  documentId: string;
  category: string;
  detail?: string;
}

export type ExtractionResult =
  | { status: "success"; phrases: CandidatePhrase[] }
  | { status: "degraded"; reason: string; attempts: number }
  // retries cut short by run cancellation
  | { status: "cancelled"; attempts: number };

export type DocumentStatus = "success" | "degraded" | "skipped";

export interface DocumentReport {
  category: string;
  status: DocumentStatus;
  keyphrases: string[];
  error?: string;
}

export interface RunSummary {
  admittedCount: number;
  globalTarget: number;
  discrepancy: number;
  categories: Record<string, number>;
  clusterCount: number;
  documentsProcessed: number;
  documentsDegraded: number;
  documentsSkipped: number;
  cancelled: boolean;
}

export interface RunResult {
  keyphrases: RankedKeyphrase[];
  auditLog: AuditEntry[];
  summary: RunSummary;
  byDocument: Record<string, DocumentReport>;
}
