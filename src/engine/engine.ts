/**
 * Topic engine contract and the bundled co-occurrence engine.
 *
 * The service only relies on the contract: given a dataset, choose default
 * anchors, and recover one weight vector over the vocabulary per anchor.
 * Both operations must be deterministic, since their results are memoized
 * and persisted.
 */

import type { Dataset } from "../corpus/index.js";
import type { IndexAnchor } from "../anchors/index.js";
import { isGroup } from "../anchors/index.js";

/** K×V matrix: one row of term weights per topic */
export type TopicMatrix = readonly (readonly number[])[];

export interface TopicEngine {
  /** Choose `anchorCount` default anchors among the `candidateCount` most frequent terms. */
  selectAnchors(dataset: Dataset, anchorCount: number, candidateCount: number): IndexAnchor[];
  /** Recover one topic per anchor, in anchor order. */
  recoverTopics(dataset: Dataset, anchors: readonly IndexAnchor[]): TopicMatrix;
}

function rowProfile(dataset: Dataset, index: number): number[] {
  const row = dataset.cooccurrences[index];
  if (row === undefined) {
    throw new RangeError(`Term index ${index} is outside the vocabulary (size ${dataset.vocab.length})`);
  }
  const total = row.reduce((sum, value) => sum + value, 0);
  return total > 0 ? row.map((value) => value / total) : row.map(() => 0);
}

function l1Distance(a: readonly number[], b: readonly number[]): number {
  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    distance += Math.abs((a[i] ?? 0) - (b[i] ?? 0));
  }
  return distance;
}

/**
 * Engine built on row-normalized co-occurrence profiles, p(w | anchor).
 *
 * Anchors: the most frequent candidate first, then repeatedly the candidate
 * whose profile is farthest (minimum L1 distance) from every anchor chosen
 * so far. Topics: the mean profile of each anchor's terms.
 */
export class CooccurrenceEngine implements TopicEngine {
  selectAnchors(dataset: Dataset, anchorCount: number, candidateCount: number): IndexAnchor[] {
    const candidates = dataset.vocab
      .map((_, index) => index)
      .sort((a, b) => (dataset.documentFrequency[b] ?? 0) - (dataset.documentFrequency[a] ?? 0))
      .slice(0, candidateCount);

    const profiles = new Map(candidates.map((index) => [index, rowProfile(dataset, index)]));
    const chosen: number[] = [];
    const closest = new Map<number, number>(candidates.map((index) => [index, Infinity]));

    while (chosen.length < Math.min(anchorCount, candidates.length)) {
      let best = -1;
      let bestDistance = -1;
      for (const index of candidates) {
        const distance = closest.get(index) ?? -1;
        if (!chosen.includes(index) && distance > bestDistance) {
          best = index;
          bestDistance = distance;
        }
      }

      chosen.push(best);
      const anchorProfile = profiles.get(best) ?? [];
      for (const index of candidates) {
        const distance = l1Distance(profiles.get(index) ?? [], anchorProfile);
        closest.set(index, Math.min(closest.get(index) ?? Infinity, distance));
      }
    }

    return chosen.map((index) => [index]);
  }

  recoverTopics(dataset: Dataset, anchors: readonly IndexAnchor[]): TopicMatrix {
    return anchors.map((anchor) => {
      const members = isGroup(anchor) ? anchor : [anchor];
      const topic = new Array<number>(dataset.vocab.length).fill(0);
      for (const index of members) {
        rowProfile(dataset, index).forEach((value, j) => {
          topic[j] = (topic[j] ?? 0) + value / members.length;
        });
      }
      return topic;
    });
  }
}
