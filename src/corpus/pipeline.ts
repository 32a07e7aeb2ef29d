/**
 * Corpus import pipeline.
 *
 * Runs the stages of a corpus configuration in order and turns the
 * surviving tokens into a Dataset. Each stage maps the document list to a
 * new document list; nothing is mutated in place.
 */

import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type {
  CorpusConfig,
  PipelineStage,
  ReadDirectoryStage,
  FilterStopwordsStage,
  CombineWordsStage,
} from "../config/corpus/index.js";
import type { Logger } from "../logging/index.js";
import {
  composeTokenizers,
  setTokenizerLogger,
  FileSource,
  SourceReadError,
  type Tokenizer,
  type TokenizerName,
} from "../tokenize/index.js";
import { buildDataset, type CorpusDocument, type Dataset } from "./dataset.js";

export interface PipelineOptions {
  logger: Logger;
  /** Builds the tokenizer of a readDirectory stage; defaults to composeTokenizers */
  tokenizerFor?: (names: readonly TokenizerName[]) => Tokenizer;
}

function readWordList(path: string): Set<string> {
  return new Set(
    readFileSync(path, "utf-8")
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
  );
}

function documentFrequencies(documents: readonly CorpusDocument[]): Map<string, number> {
  const frequencies = new Map<string, number>();
  for (const doc of documents) {
    for (const term of new Set(doc.tokens)) {
      frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
    }
  }
  return frequencies;
}

function keepTerms(
  documents: readonly CorpusDocument[],
  keep: (term: string) => boolean
): CorpusDocument[] {
  return documents.map((doc) => ({ name: doc.name, tokens: doc.tokens.filter(keep) }));
}

/**
 * Read every matching file of a directory, in name order.
 * Unreadable documents are logged and left out; any other tokenizer
 * failure stops the build.
 */
export function readDirectory(stage: ReadDirectoryStage, options: PipelineOptions): CorpusDocument[] {
  const pattern = new RegExp(stage.pattern);
  const tokenize = (options.tokenizerFor ?? composeTokenizers)(stage.tokenizer);
  const files = readdirSync(stage.directory, { withFileTypes: true })
    .filter((entry) => entry.isFile() && pattern.test(entry.name))
    .map((entry) => entry.name)
    .sort();

  const documents: CorpusDocument[] = [];
  for (const file of files) {
    const path = join(stage.directory, file);
    try {
      documents.push({ name: path, tokens: tokenize(new FileSource(path)) });
    } catch (err) {
      if (!(err instanceof SourceReadError)) {
        throw err;
      }
      options.logger.warn("Skipping unreadable document", { source: err.source, reason: err.message });
    }
  }

  options.logger.info("Documents read", { directory: stage.directory, documents: documents.length });
  return documents;
}

export function filterStopwords(
  documents: readonly CorpusDocument[],
  stage: FilterStopwordsStage
): CorpusDocument[] {
  const stopwords = readWordList(stage.path);
  return keepTerms(documents, (term) => !stopwords.has(term));
}

/**
 * Replace every listed word with a single placeholder token.
 * The list file is tokenized with the stage's tokenizer, so entries are
 * normalized the same way document tokens were.
 */
export function combineWords(
  documents: readonly CorpusDocument[],
  stage: CombineWordsStage
): CorpusDocument[] {
  const words = new Set(composeTokenizers(stage.tokenizer)(new FileSource(stage.path)));
  return documents.map((doc) => ({
    name: doc.name,
    tokens: doc.tokens.map((token) => (words.has(token) ? stage.replacement : token)),
  }));
}

export function filterRarewords(documents: readonly CorpusDocument[], threshold: number): CorpusDocument[] {
  const frequencies = documentFrequencies(documents);
  return keepTerms(documents, (term) => (frequencies.get(term) ?? 0) >= threshold);
}

export function filterCommonwords(documents: readonly CorpusDocument[], threshold: number): CorpusDocument[] {
  const frequencies = documentFrequencies(documents);
  return keepTerms(documents, (term) => (frequencies.get(term) ?? 0) <= threshold);
}

function applyStage(
  documents: readonly CorpusDocument[],
  stage: PipelineStage,
  options: PipelineOptions
): CorpusDocument[] {
  switch (stage.stage) {
    case "readDirectory":
      return [...documents, ...readDirectory(stage, options)];
    case "filterStopwords":
      return filterStopwords(documents, stage);
    case "combineWords":
      return combineWords(documents, stage);
    case "filterRarewords":
      return filterRarewords(documents, stage.threshold);
    case "filterCommonwords":
      return filterCommonwords(documents, stage.threshold);
  }
}

/**
 * Run a corpus pipeline and build its dataset.
 * Tokenizer failure reports go to the pipeline logger's "tokenize" scope.
 */
export function runPipeline(corpus: CorpusConfig, options: PipelineOptions): Dataset {
  setTokenizerLogger(options.logger.child("tokenize"));
  let documents: CorpusDocument[] = [];
  for (const stage of corpus.stages) {
    documents = applyStage(documents, stage, options);
    options.logger.debug("Stage complete", { corpus: corpus.name, stage: stage.stage });
  }

  const dataset = buildDataset(documents);
  options.logger.info("Corpus built", {
    corpus: corpus.name,
    documents: dataset.documentCount,
    vocabSize: dataset.vocab.length,
  });
  return dataset;
}
