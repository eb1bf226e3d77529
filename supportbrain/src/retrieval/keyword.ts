const STOP_WORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "but", "by", "can", "do", "does", "for",
  "from", "get", "has", "have", "how", "i", "in", "is", "it", "its", "me", "my", "of",
  "on", "or", "our", "please", "should", "so", "that", "the", "this", "to", "was",
  "we", "what", "when", "where", "which", "why", "will", "with", "work", "you", "your"
]);

const TITLE_WEIGHT = 1;
const BODY_WEIGHT = 0.8;

function words(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, " ")
    .split(/[\s-]+/)
    .filter(Boolean);
}

/** Lowercases, drops punctuation and folds simple plurals ("printers" -> "printer"). */
export function tokenize(text: string): string[] {
  return words(text).map(foldPlural);
}

function foldPlural(token: string): string {
  if (token.length > 4 && token.endsWith("ies")) return `${token.slice(0, -3)}y`;
  if (token.length > 3 && token.endsWith("s") && !token.endsWith("ss")) return token.slice(0, -1);
  return token;
}

export function extractKeywords(query: string): string[] {
  return [...new Set(words(query).filter((w) => !STOP_WORDS.has(w)).map(foldPlural))];
}

/**
 * Share of the query keywords a record contains, a title match counting
 * fully and a body-only match at 0.8. Adding a matched keyword never lowers
 * the score.
 */
export function keywordRelevance(
  keywords: readonly string[],
  record: { title: string; text: string }
): number {
  if (keywords.length === 0) return 0;
  const title = new Set(tokenize(record.title));
  const body = new Set(tokenize(record.text));

  let total = 0;
  for (const keyword of keywords) {
    if (title.has(keyword)) total += TITLE_WEIGHT;
    else if (body.has(keyword)) total += BODY_WEIGHT;
  }
  return total / keywords.length;
}
