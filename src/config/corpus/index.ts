/**
 * Corpus pipeline configuration module.
 *
 * Usage:
 *   import { loadCorpusConfigFile } from "./config/corpus/index.js";
 *
 *   const corpus = loadCorpusConfigFile("config/corpus.json");
 *   corpus.stages[0].stage; // "readDirectory"
 */

export {
  CorpusConfigSchema,
  PipelineStageSchema,
  TokenizerChainSchema,
  type CorpusConfig,
  type PipelineStage,
  type TokenizerChain,
  type ReadDirectoryStage,
  type FilterStopwordsStage,
  type CombineWordsStage,
  type FilterRarewordsStage,
  type FilterCommonwordsStage,
} from "./schema.js";

export {
  loadCorpusConfig,
  loadCorpusConfigFile,
  corpusFingerprint,
  CorpusConfigError,
  type CorpusConfigIssue,
} from "./loader.js";
