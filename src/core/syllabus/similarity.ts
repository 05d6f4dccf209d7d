/**
 * Label Similarity
 *
 * - normalizeLabel: case, punctuation and whitespace folded away
 * - trigramCosine: character trigram cosine similarity in [0, 1]
 */

export function normalizeLabel(label: string): string {
  return label
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function trigrams(text: string): Map<string, number> {
  const padded = `  ${text.toLowerCase()} `;
  const grams = new Map<string, number>();
  for (let i = 0; i < padded.length - 2; i++) {
    const gram = padded.slice(i, i + 3);
    grams.set(gram, (grams.get(gram) ?? 0) + 1);
  }
  return grams;
}

export function trigramCosine(a: string, b: string): number {
  const gramsA = trigrams(a);
  const gramsB = trigrams(b);

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (const [gram, countA] of gramsA) {
    normA += countA * countA;
    const countB = gramsB.get(gram);
    if (countB) dot += countA * countB;
  }
  for (const countB of gramsB.values()) {
    normB += countB * countB;
  }

  if (normA === 0 || normB === 0) {
    return a.trim() === b.trim() ? 1 : 0;
  }
  return dot / Math.sqrt(normA * normB);
}
