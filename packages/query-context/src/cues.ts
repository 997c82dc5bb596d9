import { DEFAULT_CURRENCY_PREFIXES } from "@cellscope/cell-store";
import { z } from "zod";

import rawCues from "../data/intent-cues.json";
import rawStopwords from "../data/stopwords.json";

const TermListSchema = z.array(z.string().min(1));

export const IntentCuesSchema = z.object({
  categories: z.object({
    entity_search: TermListSchema,
    financial_analysis: TermListSchema,
    sheet_listing: TermListSchema,
    structural_query: TermListSchema,
  }),
  /** Financial cue words too generic to look for beside a number. */
  genericFinancialTerms: TermListSchema,
  /** Entity cue words mapped to the organization-shape terms they ask for. */
  entityShapes: z.array(z.object({ cues: TermListSchema, shapes: TermListSchema })),
  comparisonPhrases: z.record(z.enum(["gt", "lt", "ge", "le", "eq"])),
  /** Defaults to the list the cell parser uses, so query amounts and cell amounts agree. */
  currencyPrefixes: TermListSchema.default([...DEFAULT_CURRENCY_PREFIXES]),
  magnitudes: z.record(z.number().positive()),
});

export type IntentCues = z.infer<typeof IntentCuesSchema>;

export const DEFAULT_INTENT_CUES: IntentCues = IntentCuesSchema.parse(rawCues);

export const DEFAULT_STOPWORDS: ReadonlySet<string> = new Set(TermListSchema.parse(rawStopwords));
