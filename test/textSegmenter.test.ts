import { describe, it, expect } from 'vitest';
import { segmentParagraphs, splitSentences, truncateWords } from '../src/utils/textSegmenter';

describe('splitSentences', () => {
  it('splits on terminal punctuation and keeps a trailing fragment', () => {
    expect(splitSentences('One. Two! Three? Four')).toEqual(['One.', 'Two!', 'Three?', 'Four']);
    expect(splitSentences('He said "stop." Then left.')).toEqual(['He said "stop."', 'Then left.']);
  });
});

describe('truncateWords', () => {
  it('keeps short texts and cuts long ones with an ellipsis', () => {
    expect(truncateWords('  a b c ', 3)).toBe('a b c');
    expect(truncateWords('a b c d', 2)).toBe('a b...');
  });
});

describe('segmentParagraphs', () => {
  it('closes a paragraph after four sentences', () => {
    const sentence = 'This sentence has five words.';
    const text = Array.from({ length: 5 }, () => sentence).join(' ');
    expect(segmentParagraphs(text)).toBe(`${Array.from({ length: 4 }, () => sentence).join(' ')}\n\n${sentence}`);
  });

  it('starts a new paragraph before bullets and short sentences', () => {
    expect(segmentParagraphs('Intro sentence has many words here. - bullet point has many words. Another sentence has many words too.'))
      .toBe('Intro sentence has many words here.\n\n- bullet point has many words. Another sentence has many words too.');
    expect(segmentParagraphs('Sales grew a lot this year. Key points. Costs fell sharply in the spring.'))
      .toBe('Sales grew a lot this year.\n\nKey points. Costs fell sharply in the spring.');
  });
});
