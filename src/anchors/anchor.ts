/**
 * Anchor representations.
 *
 * An anchor seeds one topic. It is a single reference or an ordered group
 * of references ("combined" anchor). Clients speak in terms or vocabulary
 * indices; topic recovery only takes indices. Conversion in both
 * directions keeps the nesting: a single stays single, a group stays a
 * group of the same length and order.
 */

import { z } from "zod";
import type { Dataset } from "../corpus/index.js";

/** Tagged anchor reference as received from a client. */
export type AnchorRef =
  | { readonly kind: "term"; readonly term: string }
  | { readonly kind: "index"; readonly index: number };

/** A single reference or an ordered group of them. */
export type Anchor<T> = T | readonly T[];

export type ClientAnchor = Anchor<AnchorRef>;
export type IndexAnchor = Anchor<number>;
export type TermAnchor = Anchor<string>;

/**
 * A term is not in the dataset's vocabulary.
 */
export class UnknownTermError extends Error {
  constructor(public readonly term: string) {
    super(`Unknown term: ${JSON.stringify(term)}`);
    this.name = "UnknownTermError";
  }
}

/**
 * Anchor input that cannot be used: malformed JSON, wrong shape, or an
 * index outside the vocabulary.
 */
export class InvalidAnchorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidAnchorError";
  }
}

export function termRef(term: string): AnchorRef {
  return { kind: "term", term };
}

export function indexRef(index: number): AnchorRef {
  return { kind: "index", index };
}

export function isGroup<T>(anchor: Anchor<T>): anchor is readonly T[] {
  return Array.isArray(anchor);
}

/**
 * Apply `convert` to every reference, keeping the anchor nesting.
 */
export function mapAnchors<T, U>(anchors: readonly Anchor<T>[], convert: (ref: T) => U): Anchor<U>[] {
  return anchors.map((anchor) => (isGroup(anchor) ? Object.freeze(anchor.map(convert)) : convert(anchor)));
}

/**
 * Freeze an anchor set and its groups.
 */
export function freezeAnchors<T>(anchors: readonly Anchor<T>[]): readonly Anchor<T>[] {
  return Object.freeze(anchors.map((anchor) => (isGroup(anchor) ? Object.freeze([...anchor]) : anchor)));
}

/**
 * Primitive form of a reference: the term itself, or the index.
 * Terms and indices stay distinct because one is a string and the other a
 * number.
 */
export function anchorRefKey(ref: AnchorRef): string | number {
  return ref.kind === "term" ? ref.term : ref.index;
}

const RefSchema = z.union([
  z.string().transform(termRef),
  z.number().int().min(0).transform(indexRef),
]);

const AnchorSpecSchema = z.array(z.union([RefSchema, z.array(RefSchema)]));

const VocabIndexSchema = z.number().int().min(0);

/** Index anchor set as persisted. */
export const IndexAnchorsSchema = z
  .array(z.union([VocabIndexSchema, z.array(VocabIndexSchema)]))
  .transform((anchors) => freezeAnchors<number>(anchors));

/**
 * Parse the client's JSON anchor specification.
 *
 *   parseAnchorSpec('[["god", "jesus"], "space", 12]')
 *
 * @throws InvalidAnchorError on malformed JSON or an unexpected shape
 */
export function parseAnchorSpec(raw: string): ClientAnchor[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new InvalidAnchorError(
      `Anchors must be JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = AnchorSpecSchema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidAnchorError(`Invalid anchors: ${detail}`);
  }
  return result.data;
}

const vocabIndexes = new WeakMap<Dataset, Map<string, number>>();

function vocabIndex(dataset: Dataset): Map<string, number> {
  let index = vocabIndexes.get(dataset);
  if (index === undefined) {
    index = new Map(dataset.vocab.map((term, i) => [term, i]));
    vocabIndexes.set(dataset, index);
  }
  return index;
}

/**
 * Resolve one reference to its vocabulary index.
 * Indices pass through unchanged.
 *
 * @throws UnknownTermError if a term is not in the vocabulary
 */
export function toIndex(dataset: Dataset, ref: AnchorRef): number {
  if (ref.kind === "index") {
    return ref.index;
  }
  const index = vocabIndex(dataset).get(ref.term);
  if (index === undefined) {
    throw new UnknownTermError(ref.term);
  }
  return index;
}

/**
 * Convert client anchors to index anchors.
 */
export function reindexAnchors(dataset: Dataset, anchors: readonly ClientAnchor[]): IndexAnchor[] {
  return mapAnchors(anchors, (ref) => toIndex(dataset, ref));
}

/**
 * Convert index anchors back to terms.
 *
 * @throws InvalidAnchorError if an index is outside the vocabulary
 */
export function tokenifyAnchors(dataset: Dataset, anchors: readonly IndexAnchor[]): TermAnchor[] {
  return mapAnchors(anchors, (index) => {
    const term = dataset.vocab[index];
    if (term === undefined) {
      throw new InvalidAnchorError(`Anchor index ${index} is outside the vocabulary`);
    }
    return term;
  });
}

/**
 * Check every index of an anchor set against the vocabulary.
 *
 * @throws InvalidAnchorError naming the first index out of range
 */
export function assertIndicesInVocabulary(dataset: Dataset, anchors: readonly IndexAnchor[]): void {
  for (const anchor of anchors) {
    for (const index of isGroup(anchor) ? anchor : [anchor]) {
      if (!Number.isInteger(index) || index < 0 || index >= dataset.vocab.length) {
        throw new InvalidAnchorError(
          `Anchor index ${index} is outside the vocabulary (size ${dataset.vocab.length})`
        );
      }
    }
  }
}
