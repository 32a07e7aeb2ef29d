/**
 * Topic request orchestration.
 *
 * Every expensive step is memoized against the injected MemoCache; the
 * corpus and the default anchor set are additionally persisted in the
 * injected PersistentStore:
 *
 *   dataset         memoize ∘ persistentCache("<corpus>")
 *   defaultAnchors  memoize ∘ persistentCache("<corpus>-anchors-<k>-<candidates>")
 *   topics          memoize over (dataset, index anchors)
 *   reindex         memoize over (dataset, client anchors by value)
 *   tokenify        memoize over (dataset, index anchors)
 *
 * Two request paths:
 *   - no anchors: default anchors are used and echoed back as terms
 *   - anchors given: they are parsed and converted; only topics are returned
 */

import {
  memoize,
  persistentCache,
  type MemoCache,
  type PersistentStore,
} from "../cache/index.js";
import { DatasetSchema, freezeDataset, type Dataset } from "../corpus/index.js";
import type { TopicEngine, TopicMatrix } from "../engine/index.js";
import {
  anchorRefKey,
  assertIndicesInVocabulary,
  freezeAnchors,
  mapAnchors,
  parseAnchorSpec,
  reindexAnchors,
  tokenifyAnchors,
  IndexAnchorsSchema,
  type ClientAnchor,
  type IndexAnchor,
  type TermAnchor,
} from "../anchors/index.js";
import type { Logger } from "../logging/index.js";

/** Terms listed per topic summary */
export const SUMMARY_SIZE = 10;

export interface TopicServiceOptions {
  /** Persistent cache name of the corpus; must change when the corpus does */
  corpusName: string;
  /** Builds the corpus; called at most once per store */
  buildDataset: () => Dataset;
  engine: TopicEngine;
  memo: MemoCache;
  store: PersistentStore;
  anchorCount: number;
  candidateCount: number;
  logger: Logger;
}

export interface BaseAnchorsResponse {
  anchors: TermAnchor[];
}

export interface TopicsResponse {
  topics: string[][];
  /** Present only when the default anchors were used */
  anchors?: TermAnchor[];
}

/**
 * Top terms of each topic, heaviest first.
 * Equal weights keep vocabulary order (the sort is stable).
 */
export function summarizeTopics(
  dataset: Dataset,
  topics: TopicMatrix,
  size: number = SUMMARY_SIZE
): string[][] {
  return topics.map((weights) =>
    weights
      .map((_, index) => index)
      .sort((a, b) => (weights[b] ?? 0) - (weights[a] ?? 0))
      .slice(0, size)
      .flatMap((index) => {
        const term = dataset.vocab[index];
        return term === undefined ? [] : [term];
      })
  );
}

export class TopicService {
  /** The shared dataset */
  readonly dataset: () => Dataset;
  /** Default anchors as vocabulary indices */
  readonly defaultAnchors: () => readonly IndexAnchor[];

  private readonly recover: (dataset: Dataset, anchors: readonly IndexAnchor[]) => TopicMatrix;
  private readonly reindex: (dataset: Dataset, anchors: readonly ClientAnchor[]) => IndexAnchor[];
  private readonly tokenify: (dataset: Dataset, anchors: readonly IndexAnchor[]) => TermAnchor[];
  private readonly logger: Logger;

  constructor(options: TopicServiceOptions) {
    const { memo: cache, store, engine, anchorCount, candidateCount } = options;
    this.logger = options.logger;

    this.dataset = memoize(
      persistentCache(options.corpusName, options.buildDataset, {
        store,
        schema: DatasetSchema.transform(freezeDataset),
        logger: this.logger,
      }),
      { cache, name: "dataset" }
    );

    this.defaultAnchors = memoize(
      persistentCache(
        `${options.corpusName}-anchors-${anchorCount}-${candidateCount}`,
        () => freezeAnchors(engine.selectAnchors(this.dataset(), anchorCount, candidateCount)),
        { store, schema: IndexAnchorsSchema, logger: this.logger }
      ),
      { cache, name: "defaultAnchors" }
    );

    this.recover = memoize(
      (dataset: Dataset, anchors: readonly IndexAnchor[]) => engine.recoverTopics(dataset, anchors),
      { cache, name: "topics" }
    );

    this.reindex = memoize(reindexAnchors, {
      cache,
      name: "reindex",
      normalize: (dataset, anchors) => [dataset, mapAnchors(anchors, anchorRefKey)],
    });

    this.tokenify = memoize(tokenifyAnchors, { cache, name: "tokenify" });
  }

  /**
   * Build the corpus and default anchors ahead of the first request.
   * Throws if either cannot be built; the server must not start then.
   */
  warm(): void {
    const dataset = this.dataset();
    const anchors = this.defaultAnchors();
    this.logger.info("Topic service ready", {
      vocabSize: dataset.vocab.length,
      documents: dataset.documentCount,
      defaultAnchors: anchors.length,
    });
  }

  baseAnchors(): BaseAnchorsResponse {
    return { anchors: this.tokenify(this.dataset(), this.defaultAnchors()) };
  }

  /**
   * Topics for the given anchor JSON, or for the default anchors.
   *
   * @throws InvalidAnchorError for malformed anchors or out-of-range indices
   * @throws UnknownTermError for a term outside the vocabulary
   */
  topics(rawAnchors?: string): TopicsResponse {
    const dataset = this.dataset();

    if (rawAnchors === undefined) {
      const anchors = this.defaultAnchors();
      return {
        topics: summarizeTopics(dataset, this.recover(dataset, anchors)),
        anchors: this.tokenify(dataset, anchors),
      };
    }

    const anchors = this.reindex(dataset, parseAnchorSpec(rawAnchors));
    assertIndicesInVocabulary(dataset, anchors);
    this.logger.debug("Topics requested", { anchors: anchors.length });
    return { topics: summarizeTopics(dataset, this.recover(dataset, anchors)) };
  }

  vocab(): { vocab: readonly string[] } {
    return { vocab: this.dataset().vocab };
  }

  vocabSize(): number {
    return this.dataset().vocab.length;
  }

  cooccurrences(): { cooccurrences: readonly (readonly number[])[] } {
    return { cooccurrences: this.dataset().cooccurrences };
  }
}
