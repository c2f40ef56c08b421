// Apostrophe look-alikes seen in headings typed in Word or pasted from PDFs
const APOSTROPHES = /[’‘′`´‵ʼʻʿʾ̛̓̔̕]/g;
const DOUBLE_QUOTES = /[“”„‟]/g;
const PUNCTUATION = /[,.:;!?\-_()[\]{}/]/g;

/**
 * Canonical form used for heading comparison. Idempotent.
 */
export function normalize(text: string): string {
  if (!text) return '';

  return text
    .toLowerCase()
    .replace(APOSTROPHES, "'")
    .replace(DOUBLE_QUOTES, '"')
    .replace(PUNCTUATION, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}
