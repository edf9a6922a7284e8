import type { PatchOperation } from '../../ports/NotesPort.js';

const HEADING_REGEX = /^(#{1,6})[ \t]+(.*?)[ \t]*$/;
const FENCE_REGEX = /^ {0,3}(`{3,}|~{3,})/;

export interface MarkdownSection {
  /** Offset right after the heading line (and its line break, when present). */
  bodyStart: number;
  /** Offset of the next heading of the same or a higher level, or the end of the document. */
  end: number;
  /** True when the heading is the last line and has no trailing line break. */
  headingAtEnd: boolean;
}

export function findHeadingSection(markdown: string, heading: string): MarkdownSection | null {
  const target = heading.trim();
  let offset = 0;
  let found: { level: number; bodyStart: number; headingAtEnd: boolean } | null = null;
  // Opening marker of the code fence we are inside, if any
  let fence: string | null = null;

  for (const line of markdown.split('\n')) {
    const lineStart = offset;
    offset += line.length + 1;

    const fenceMarker = line.match(FENCE_REGEX)?.[1];
    if (fenceMarker) {
      if (fence === null) {
        fence = fenceMarker;
      } else if (fenceMarker[0] === fence[0] && fenceMarker.length >= fence.length) {
        fence = null;
      }
      continue;
    }
    if (fence !== null) {
      continue;
    }

    const match = line.replace(/\r$/, '').match(HEADING_REGEX);
    if (!match) {
      continue;
    }
    const level = match[1]?.length ?? 0;
    const text = match[2] ?? '';

    if (found) {
      if (level <= found.level) {
        return { bodyStart: found.bodyStart, end: lineStart, headingAtEnd: false };
      }
      continue;
    }
    if (text === target) {
      const headingAtEnd = offset > markdown.length;
      found = { level, bodyStart: Math.min(offset, markdown.length), headingAtEnd };
    }
  }

  return found ? { bodyStart: found.bodyStart, end: markdown.length, headingAtEnd: found.headingAtEnd } : null;
}

/** Applies a heading-targeted patch; returns null when the heading is missing. */
export function patchMarkdownSection(
  markdown: string,
  heading: string,
  operation: PatchOperation,
  content: string
): string | null {
  const section = findHeadingSection(markdown, heading);
  if (!section) {
    return null;
  }
  const separator = section.headingAtEnd ? '\n' : '';

  switch (operation) {
    case 'append':
      return markdown.slice(0, section.end) + separator + content + markdown.slice(section.end);
    case 'prepend':
      return markdown.slice(0, section.bodyStart) + separator + content + markdown.slice(section.bodyStart);
    case 'replace':
      return markdown.slice(0, section.bodyStart) + separator + content + markdown.slice(section.end);
  }
}
