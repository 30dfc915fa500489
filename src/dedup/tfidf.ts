import fs from 'node:fs';
import path from 'node:path';
import { getPackageRoot } from '../shared/utils.js';

/** Sparse row: term index -> weight. */
export type SparseVector = Map<number, number>;

let stopwords: ReadonlySet<string> | null = null;

export function englishStopwords(): ReadonlySet<string> {
  if (stopwords === null) {
    const file = path.join(getPackageRoot(), 'data', 'stopwords-en.txt');
    const words = fs
      .readFileSync(file, 'utf-8')
      .split('\n')
      .map((w) => w.trim())
      .filter((w) => w.length > 0);
    stopwords = new Set(words);
  }
  return stopwords;
}

// Word characters in any script, so accented and non-Latin words stay whole.
const TOKEN_PATTERN = /[\p{L}\p{M}\p{N}_]{2,}/gu;

/**
 * Lower-cased word tokens of two or more characters, stopwords removed,
 * followed by the bigrams of adjacent surviving tokens.
 */
export function extractTerms(text: string, stop: ReadonlySet<string> = englishStopwords()): string[] {
  const tokens = (text.toLowerCase().match(TOKEN_PATTERN) ?? []).filter((t) => !stop.has(t));
  const terms = [...tokens];
  for (let i = 0; i + 1 < tokens.length; i++) {
    terms.push(`${tokens[i]} ${tokens[i + 1]}`);
  }
  return terms;
}

function countTerms(terms: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of terms) counts.set(term, (counts.get(term) ?? 0) + 1);
  return counts;
}

/**
 * Fit a TF-IDF space over `documents` and return one L2-normalised row per
 * document. The vocabulary keeps the `maxFeatures` most frequent terms
 * across the corpus (ties broken alphabetically); idf is smoothed as
 * ln((1 + n) / (1 + df)) + 1.
 */
export function tfidfMatrix(documents: readonly string[], maxFeatures = 10000): SparseVector[] {
  const perDoc = documents.map((doc) => countTerms(extractTerms(doc)));

  const corpusFreq = new Map<string, number>();
  const docFreq = new Map<string, number>();
  for (const counts of perDoc) {
    for (const [term, n] of counts) {
      corpusFreq.set(term, (corpusFreq.get(term) ?? 0) + n);
      docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
    }
  }

  const kept = [...corpusFreq.entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, maxFeatures)
    .map(([term]) => term)
    .sort();
  const index = new Map(kept.map((term, i) => [term, i]));

  const n = documents.length;
  return perDoc.map((counts) => {
    const row: SparseVector = new Map();
    let norm = 0;
    for (const [term, tf] of counts) {
      const col = index.get(term);
      if (col === undefined) continue;
      const idf = Math.log((1 + n) / (1 + (docFreq.get(term) ?? 0))) + 1;
      const weight = tf * idf;
      row.set(col, weight);
      norm += weight * weight;
    }
    if (norm > 0) {
      const scale = 1 / Math.sqrt(norm);
      for (const [col, weight] of row) row.set(col, weight * scale);
    }
    return row;
  });
}

/** Cosine similarity of two L2-normalised rows. */
export function cosine(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [col, weight] of small) {
    const other = large.get(col);
    if (other !== undefined) dot += weight * other;
  }
  return dot;
}
