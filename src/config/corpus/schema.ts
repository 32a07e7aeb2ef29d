/**
 * Corpus pipeline configuration schema.
 *
 * A pipeline is an ordered list of stages. The first stage reads documents;
 * the remaining stages rewrite or filter their tokens. Stage order matters:
 * a stopword filter placed after `combineWords` never sees the combined
 * words.
 */

import { z } from "zod";
import { TOKENIZER_NAMES } from "../../tokenize/tokenizers.js";

export const TokenizerNameSchema = z.enum(TOKENIZER_NAMES);

/** Outer-to-inner tokenizer chain, e.g. ["html", "news", "simple"] */
export const TokenizerChainSchema = z
  .array(TokenizerNameSchema)
  .min(1)
  .refine((names) => !names.slice(0, -1).includes("split"), {
    message: "split can only be the innermost tokenizer",
  });

const RegexSourceSchema = z.string().refine(
  (source) => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: "must be a valid regular expression" }
);

export const ReadDirectoryStageSchema = z
  .object({
    stage: z.literal("readDirectory"),
    /** Directory holding one document per file */
    directory: z.string().min(1),
    /** Regular expression file names must match */
    pattern: RegexSourceSchema.default(".*"),
    tokenizer: TokenizerChainSchema.default(["simple"]),
  })
  .strict();

export const FilterStopwordsStageSchema = z
  .object({
    stage: z.literal("filterStopwords"),
    /** Word list, one word per line */
    path: z.string().min(1),
  })
  .strict();

export const CombineWordsStageSchema = z
  .object({
    stage: z.literal("combineWords"),
    /** Word list, tokenized with `tokenizer` */
    path: z.string().min(1),
    /** Token that replaces every listed word */
    replacement: z.string().min(1),
    tokenizer: TokenizerChainSchema.default(["simple"]),
  })
  .strict();

export const FilterRarewordsStageSchema = z
  .object({
    stage: z.literal("filterRarewords"),
    /** Terms in fewer documents than this are removed */
    threshold: z.number().int().min(0),
  })
  .strict();

export const FilterCommonwordsStageSchema = z
  .object({
    stage: z.literal("filterCommonwords"),
    /** Terms in more documents than this are removed */
    threshold: z.number().int().min(0),
  })
  .strict();

export const PipelineStageSchema = z.discriminatedUnion("stage", [
  ReadDirectoryStageSchema,
  FilterStopwordsStageSchema,
  CombineWordsStageSchema,
  FilterRarewordsStageSchema,
  FilterCommonwordsStageSchema,
]);

export const CorpusConfigSchema = z
  .object({
    /** Name used for the persistent cache files of this corpus */
    name: z
      .string()
      .regex(/^[a-z0-9][a-z0-9_-]*$/, "lowercase letters, digits, '_' and '-' only"),
    stages: z
      .array(PipelineStageSchema)
      .min(1)
      .refine((stages) => stages[0]?.stage === "readDirectory", {
        message: "the first stage must be readDirectory",
      }),
  })
  .strict();

export type TokenizerChain = z.infer<typeof TokenizerChainSchema>;
export type ReadDirectoryStage = z.infer<typeof ReadDirectoryStageSchema>;
export type FilterStopwordsStage = z.infer<typeof FilterStopwordsStageSchema>;
export type CombineWordsStage = z.infer<typeof CombineWordsStageSchema>;
export type FilterRarewordsStage = z.infer<typeof FilterRarewordsStageSchema>;
export type FilterCommonwordsStage = z.infer<typeof FilterCommonwordsStageSchema>;
export type PipelineStage = z.infer<typeof PipelineStageSchema>;
export type CorpusConfig = z.infer<typeof CorpusConfigSchema>;
