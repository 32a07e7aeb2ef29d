/**
 * Dataset: the immutable vocabulary + co-occurrence statistics every
 * request reads.
 */

import { z } from "zod";

export const DatasetSchema = z
  .object({
    /** Ordered unique terms; a term's index is its position */
    vocab: z.array(z.string()),
    /** V×V normalized term co-occurrence, indexed like `vocab` */
    cooccurrences: z.array(z.array(z.number())),
    /** Number of documents each term appears in */
    documentFrequency: z.array(z.number().int().min(0)),
    /** Documents that survived the pipeline */
    documentCount: z.number().int().min(0),
  })
  .strict()
  .superRefine((dataset, ctx) => {
    const size = dataset.vocab.length;
    if (new Set(dataset.vocab).size !== size) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["vocab"], message: "terms must be unique" });
    }
    if (dataset.documentFrequency.length !== size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["documentFrequency"],
        message: `expected ${size} entries`,
      });
    }
    if (dataset.cooccurrences.length !== size || dataset.cooccurrences.some((row) => row.length !== size)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["cooccurrences"],
        message: `expected a ${size}x${size} matrix`,
      });
    }
  });

export type Dataset = z.infer<typeof DatasetSchema>;

/** A tokenized document flowing through the pipeline. */
export interface CorpusDocument {
  readonly name: string;
  readonly tokens: readonly string[];
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Freeze a dataset in place so shared readers cannot mutate it.
 */
export function freezeDataset(dataset: Dataset): Dataset {
  deepFreeze(dataset);
  return dataset;
}

/**
 * Build a dataset from tokenized documents.
 *
 * The vocabulary is every remaining term in sorted order. Each document
 * with n >= 2 tokens and term counts h contributes
 * (h hᵀ − diag(h)) / (n (n − 1)); the summed matrix is scaled to total 1.
 */
export function buildDataset(documents: readonly CorpusDocument[]): Dataset {
  const vocab = [...new Set(documents.flatMap((doc) => doc.tokens))].sort();
  const index = new Map(vocab.map((term, i) => [term, i]));
  const size = vocab.length;

  const cooccurrences = vocab.map(() => new Array<number>(size).fill(0));
  const documentFrequency = new Array<number>(size).fill(0);

  for (const doc of documents) {
    const counts = new Map<number, number>();
    for (const token of doc.tokens) {
      const i = index.get(token);
      if (i !== undefined) {
        counts.set(i, (counts.get(i) ?? 0) + 1);
      }
    }
    for (const i of counts.keys()) {
      documentFrequency[i] = (documentFrequency[i] ?? 0) + 1;
    }

    const n = doc.tokens.length;
    if (n < 2) {
      continue;
    }
    const norm = n * (n - 1);
    for (const [i, hi] of counts) {
      const row = cooccurrences[i];
      if (row === undefined) {
        continue;
      }
      for (const [j, hj] of counts) {
        row[j] = (row[j] ?? 0) + (i === j ? hi * hj - hi : hi * hj) / norm;
      }
    }
  }

  const total = cooccurrences.reduce((sum, row) => sum + row.reduce((a, b) => a + b, 0), 0);
  if (total > 0) {
    for (const row of cooccurrences) {
      for (let j = 0; j < row.length; j++) {
        row[j] = (row[j] ?? 0) / total;
      }
    }
  }

  return freezeDataset({
    vocab,
    cooccurrences,
    documentFrequency,
    documentCount: documents.length,
  });
}
