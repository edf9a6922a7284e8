export interface ContentRules {
  /** Capitalized words that are never turned into links. */
  stopWords: ReadonlySet<string>;
  /** Whitespace between a sentence end and the next capitalized word. */
  sentenceBoundary: RegExp;
  /** Two or more blank lines in a row. */
  excessBlankLines: RegExp;
  /** Clean words shorter than this are never linked. */
  minLinkLength: number;
  /**
   * Rejoin tokens line by line so paragraph breaks survive linking.
   * When false the whole document is flattened onto a single line.
   */
  preserveLineBreaks: boolean;
}

export const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set([
  'The',
  'A',
  'An',
  'This',
  'That',
  'These',
  'Those',
  'I',
  'You',
  'He',
  'She',
  'It',
  'We',
  'They',
]);

export const DEFAULT_CONTENT_RULES: ContentRules = {
  stopWords: DEFAULT_STOP_WORDS,
  sentenceBoundary: /(?<=[.!?])\s+(?=[A-Z])/g,
  excessBlankLines: /\n\s*\n\s*\n/g,
  minLinkLength: 2,
  preserveLineBreaks: true,
};

export function resolveContentRules(overrides?: Partial<ContentRules>): ContentRules {
  return { ...DEFAULT_CONTENT_RULES, ...overrides };
}
