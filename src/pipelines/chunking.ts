import { collapseWhitespace } from "../utils/text.js";

export const DEFAULT_CHUNK_SIZE = 800;
export const DEFAULT_CHUNK_OVERLAP = 100;

// Split after terminal punctuation when the next word is capitalised, but not
// inside dotted abbreviations ("e.g. Foo") or short titles ("Mr. Smith").
const SENTENCE_BOUNDARY = /(?<!\w\.\w.)(?<![A-Z][a-z]\.)(?<=[.!?])\s+(?=[A-Z])/;

export function splitIntoSentences(text: string): string[] {
  const normalized = collapseWhitespace(text);
  if (!normalized) {
    return [];
  }

  return normalized
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter(Boolean);
}

/**
 * Packs whole sentences into chunks of at most `chunkSize` characters. Each
 * chunk after the first repeats the trailing sentences of its predecessor that
 * fit within `overlap` characters.
 */
export function chunkText(
  text: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP,
): string[] {
  if (chunkSize <= 0) {
    throw new Error(`chunkSize must be positive, got ${chunkSize}.`);
  }
  const safeOverlap = Math.min(Math.max(overlap, 0), chunkSize - 1);

  const sentences = splitIntoSentences(text).flatMap((sentence) =>
    sentence.length > chunkSize
      ? splitLongSentence(sentence, chunkSize, safeOverlap)
      : [sentence],
  );

  const chunks: string[] = [];
  let start = 0;

  while (start < sentences.length) {
    const current: string[] = [];
    let currentSize = 0;

    for (let j = start; j < sentences.length; j += 1) {
      const addition = sentences[j].length + (current.length > 0 ? 1 : 0);
      if (current.length > 0 && currentSize + addition > chunkSize) {
        break;
      }
      current.push(sentences[j]);
      currentSize += addition;
    }

    chunks.push(current.join(" "));

    const end = start + current.length;
    if (end >= sentences.length) {
      break;
    }

    const carried = countOverlapSentences(current, safeOverlap);
    start = Math.max(end - carried, start + 1);
  }

  return chunks;
}

function countOverlapSentences(sentences: string[], overlap: number): number {
  if (overlap <= 0) {
    return 0;
  }

  let size = 0;
  let count = 0;
  for (let k = sentences.length - 1; k >= 0; k -= 1) {
    const length = sentences[k].length + (count > 0 ? 1 : 0);
    if (size + length > overlap) {
      break;
    }
    size += length;
    count += 1;
  }

  // Carrying every sentence forward would repeat the whole chunk.
  return Math.min(count, sentences.length - 1);
}

function splitLongSentence(sentence: string, maxChars: number, overlap: number): string[] {
  const pieces: string[] = [];
  let start = 0;

  while (start < sentence.length) {
    const hardEnd = Math.min(start + maxChars, sentence.length);
    let end = hardEnd;

    if (hardEnd < sentence.length) {
      const boundary = sentence.lastIndexOf(" ", hardEnd);
      if (boundary > start + Math.floor(maxChars * 0.55)) {
        end = boundary;
      }
    }

    const piece = sentence.slice(start, end).trim();
    if (piece) {
      pieces.push(piece);
    }

    if (end >= sentence.length) {
      break;
    }

    const nextStart = Math.max(0, end - overlap);
    start = nextStart > start ? nextStart : end;
  }

  return pieces;
}
