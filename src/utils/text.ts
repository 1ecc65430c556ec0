const WORD_REGEX = /[\p{L}\p{N}]+/gu;

const STOP_WORDS = new Set([
  "a",
  "an",
  "and",
  "are",
  "as",
  "at",
  "be",
  "by",
  "do",
  "does",
  "for",
  "from",
  "how",
  "in",
  "is",
  "it",
  "of",
  "on",
  "or",
  "that",
  "the",
  "this",
  "to",
  "what",
  "when",
  "which",
  "who",
  "why",
  "with",
]);

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function tokenize(text: string): string[] {
  return [...new Set(tokenizeForBm25(text))];
}

export function tokenizeForBm25(text: string): string[] {
  const words = text.toLowerCase().match(WORD_REGEX) ?? [];

  const expanded: string[] = [];
  for (const word of words) {
    if (STOP_WORDS.has(word)) {
      continue;
    }
    expanded.push(...expandTokenVariants(word));
  }

  return expanded;
}

export function scoreByTokenOverlap(query: string, target: string): number {
  const queryTokens = new Set(tokenize(query));
  if (queryTokens.size === 0) {
    return 0;
  }

  const targetTokens = new Set(tokenize(target));
  if (targetTokens.size === 0) {
    return 0;
  }

  let overlap = 0;
  for (const token of queryTokens) {
    if (targetTokens.has(token)) {
      overlap += 1;
    }
  }

  const tokenScore = overlap / Math.sqrt(queryTokens.size * targetTokens.size);
  const ngramScore = scoreByCharNgramJaccard(query, target);

  return Math.max(tokenScore, ngramScore * 0.85);
}

export function truncate(text: string, maxChars: number): string {
  const normalized = collapseWhitespace(text);
  if (normalized.length <= maxChars) {
    return normalized;
  }
  return `${normalized.slice(0, maxChars - 3)}...`;
}

function expandTokenVariants(token: string): string[] {
  const variants = new Set<string>([token]);

  if (token.length >= 4 && token.endsWith("s") && !token.endsWith("ss")) {
    variants.add(token.slice(0, -1));
  }

  return [...variants].filter((word) => word.length >= 2 || /\d/.test(word));
}

function scoreByCharNgramJaccard(query: string, target: string): number {
  const qNgrams = buildCharNgrams(query, 3);
  const tNgrams = buildCharNgrams(target.slice(0, 1200), 3);

  if (qNgrams.size === 0 || tNgrams.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const item of qNgrams) {
    if (tNgrams.has(item)) {
      intersection += 1;
    }
  }

  const union = qNgrams.size + tNgrams.size - intersection;
  if (union <= 0) {
    return 0;
  }
  return intersection / union;
}

function buildCharNgrams(input: string, n: number): Set<string> {
  const normalized = normalizeText(input)
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]/gu, "");

  if (normalized.length < n) {
    return new Set();
  }

  const grams = new Set<string>();
  for (let i = 0; i <= normalized.length - n; i += 1) {
    grams.add(normalized.slice(i, i + n));
  }
  return grams;
}
