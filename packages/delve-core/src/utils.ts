import crypto from "crypto";

/**
 * Essential utilities
 */

/**
 * Generates a new UUID v4 string
 */
export const newId = (): string => {
  return crypto.randomUUID();
};

/**
 * Creates a promise that resolves after the specified number of milliseconds
 */
export const sleep = (ms: number): Promise<void> => {
  return new Promise<void>(resolve => setTimeout(resolve, ms));
};

/**
 * SHA-256 hex digest
 */
export const sha256 = (text: string): string => {
  return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
};

/**
 * Cosine similarity of two equal-length vectors; 0 when either has no magnitude
 */
export const cosineSimilarity = (a: readonly number[], b: readonly number[]): number => {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
};

/**
 * Collapse runs of whitespace and trim
 */
export const collapseWhitespace = (text: string): string => {
  return text.replace(/\s+/g, ' ').trim();
};

export const truncate = (text: string, maxChars: number): string => {
  return text.length <= maxChars ? text : `${text.slice(0, maxChars)}...`;
};
