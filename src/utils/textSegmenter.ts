const SENTENCE = /[^.!?]+(?:[.!?]+["')\]]*|$)/g;
const BULLET = /^[•\-*]\s/;
const MAX_SENTENCES_PER_PARAGRAPH = 4;
const TITLE_WORDS = 5;

export function splitSentences(text: string): string[] {
  return (text.match(SENTENCE) ?? [])
    .map(sentence => sentence.trim())
    .filter(sentence => sentence.length > 0);
}

export function truncateWords(text: string, maxWords: number): string {
  const words = text.trim().split(/\s+/).filter(word => word.length > 0);
  if (words.length <= maxWords) {
    return text.trim();
  }
  return `${words.slice(0, maxWords).join(' ')}...`;
}

/**
 * Regroup sentences into paragraphs separated by blank lines. A paragraph
 * closes after four sentences, before a bullet and before a short
 * title-like sentence.
 */
export function segmentParagraphs(text: string): string {
  const paragraphs: string[] = [];
  let current: string[] = [];

  for (const sentence of splitSentences(text)) {
    const startsNew = current.length >= MAX_SENTENCES_PER_PARAGRAPH
      || BULLET.test(sentence)
      || sentence.split(/\s+/).length < TITLE_WORDS;

    if (startsNew && current.length) {
      paragraphs.push(current.join(' '));
      current = [];
    }
    current.push(sentence);
  }

  if (current.length) {
    paragraphs.push(current.join(' '));
  }
  return paragraphs.join('\n\n');
}
