import type { Block, MatchTier, SectionMatch, SectionQuery } from '../types';
import { normalize } from './textNormalizer';

const HEADING_STYLE = /heading|title/i;

export function looksLikeHeading(text: string, styleName?: string): boolean {
  if (styleName && HEADING_STYLE.test(styleName)) {
    return true;
  }
  const trimmed = text.trim();
  return trimmed.length > 0
    && trimmed.length < 100
    && !trimmed.endsWith('.')
    && !trimmed.endsWith(',');
}

function matchStart(text: string, target: string): MatchTier | null {
  if (text === target) return 'EXACT';

  const normalizedText = normalize(text);
  const normalizedTarget = normalize(target);
  if (normalizedText === normalizedTarget) return 'NORMALIZED_EXACT';
  if (normalizedText.includes(normalizedTarget)) return 'CONTAINS';
  if (normalizedTarget.length > 5 && normalizedTarget.includes(normalizedText)) {
    return 'REVERSE_CONTAINS';
  }
  return null;
}

function matchEnd(text: string, target: string): boolean {
  if (text === target) return true;
  const normalizedText = normalize(text);
  const normalizedTarget = normalize(target);
  return normalizedText === normalizedTarget || normalizedText.includes(normalizedTarget);
}

/**
 * Locate the body of a section between two headings.
 *
 * Start candidates are heading blocks only, tried exact first and then
 * through progressively looser normalized comparisons. Without an explicit
 * end the next heading closes the section. Falls back to a case-insensitive
 * exact scan over every block when the tiered pass misses.
 */
export function findSection(blocks: Block[], query: SectionQuery): SectionMatch | null {
  let startIndex = -1;
  let endIndex = -1;
  let matchedHeading = '';
  let matchTier: MatchTier = 'EXACT';

  for (let i = 0; i < blocks.length; i++) {
    const block = blocks[i];
    if (!block.isHeading) continue;

    if (startIndex === -1) {
      const tier = matchStart(block.text, query.start);
      if (tier) {
        startIndex = i + 1;
        matchedHeading = block.text;
        matchTier = tier;
      }
      continue;
    }

    if (query.end === null || matchEnd(block.text, query.end)) {
      endIndex = i;
      break;
    }
  }

  if (startIndex === -1) {
    const wanted = query.start.toLowerCase();
    const position = blocks.findIndex(block => block.text.toLowerCase() === wanted);
    if (position === -1) {
      return null;
    }
    startIndex = position + 1;
    matchedHeading = blocks[position].text;
    matchTier = 'EXACT_FALLBACK';
  }

  if (endIndex === -1 && query.end !== null) {
    const wanted = query.end.toLowerCase();
    for (let i = startIndex; i < blocks.length; i++) {
      if (blocks[i].text.toLowerCase() === wanted) {
        endIndex = i;
        break;
      }
    }
  }

  if (endIndex === -1) {
    endIndex = blocks.length;
  }

  return { startIndex, endIndex, matchedHeading, matchTier };
}

/**
 * Plain text of a matched section, one line per non-empty block, heading included.
 */
export function sectionText(blocks: Block[], match: SectionMatch): string {
  return blocks
    .slice(match.startIndex - 1, match.endIndex)
    .map(block => block.text.trim())
    .filter(text => text.length > 0)
    .join('\n');
}
