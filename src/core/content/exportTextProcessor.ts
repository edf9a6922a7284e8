import { resolveContentRules, type ContentRules } from './contentRules.js';

const LEADING_PUNCTUATION = /^[^\p{L}\p{N}_]+/u;
const TRAILING_PUNCTUATION = /[^\p{L}\p{N}_]+$/u;

export function normalizeText(text: string, overrides?: Partial<ContentRules>): string {
  const rules = resolveContentRules(overrides);
  return text.replace(/\r\n?/g, '\n').replace(rules.excessBlankLines, '\n\n');
}

/**
 * Naive sentence splitter: a paragraph break goes wherever `.`, `!` or `?`
 * is followed by whitespace and a capital letter. Abbreviations such as
 * "Dr. Smith" are split too.
 */
export function resegmentSentences(text: string, overrides?: Partial<ContentRules>): string {
  const rules = resolveContentRules(overrides);
  return text.replace(rules.sentenceBoundary, '\n\n');
}

export function linkProperNouns(text: string, overrides?: Partial<ContentRules>): string {
  const rules = resolveContentRules(overrides);
  const linkLine = (line: string): string =>
    line
      .split(/\s+/)
      .filter(Boolean)
      .map((token) => linkToken(token, rules))
      .join(' ');

  const linked = rules.preserveLineBreaks
    ? text.split('\n').map(linkLine).join('\n')
    : linkLine(text);

  return linked.trim();
}

export function annotateText(text: string, overrides?: Partial<ContentRules>): string {
  return linkProperNouns(resegmentSentences(text, overrides), overrides);
}

/** Normalizes raw export text and annotates it for insertion into a note. */
export function processExportContent(text: string, overrides?: Partial<ContentRules>): string {
  return annotateText(normalizeText(text, overrides), overrides);
}

export function isLinkCandidate(word: string, rules: ContentRules): boolean {
  const chars = [...word];
  const first = chars[0];
  if (first === undefined) {
    return false;
  }
  return (
    isUppercase(first) &&
    !rules.stopWords.has(word) &&
    !isUppercase(word) &&
    chars.length >= rules.minLinkLength
  );
}

function linkToken(token: string, rules: ContentRules): string {
  const leading = token.match(LEADING_PUNCTUATION)?.[0] ?? '';
  const rest = token.slice(leading.length);
  const trailing = rest.match(TRAILING_PUNCTUATION)?.[0] ?? '';
  const cleanWord = rest.slice(0, rest.length - trailing.length);

  if (!isLinkCandidate(cleanWord, rules)) {
    return token;
  }
  return `${leading}[[${cleanWord}]]${trailing}`;
}

// True when every cased character is uppercase and at least one is cased.
function isUppercase(value: string): boolean {
  return value === value.toUpperCase() && value !== value.toLowerCase();
}
