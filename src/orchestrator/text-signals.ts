const AFFIRMATIVE = new Set([
  'yes', 'y', 'yeah', 'yep', 'yup', 'sure', 'ok', 'okay', 'please',
  'yes please', 'of course', 'go ahead', 'si', 'sí',
]);

const NEGATIVE = new Set([
  'no', 'n', 'nope', 'nah', 'no thanks', 'no thank you', 'not now', 'not really',
]);

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/;

/** Lowercase, drop punctuation, collapse whitespace */
export function normalizeReply(text: string): string {
  return text
    .toLowerCase()
    .replace(/[.,!?;:"'()]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Yes/no reading of the answer to the escalation offer */
export function isAffirmative(text: string): boolean {
  return AFFIRMATIVE.has(normalizeReply(text));
}

export function isNegative(text: string): boolean {
  return NEGATIVE.has(normalizeReply(text));
}

export function isEndPhrase(text: string, endPhrases: readonly string[]): boolean {
  const normalized = normalizeReply(text);
  return endPhrases.some((phrase) => normalizeReply(phrase) === normalized);
}

/** local@domain, both parts non-empty, no whitespace */
export function isEmailShaped(text: string): boolean {
  return EMAIL_PATTERN.test(text.trim());
}
