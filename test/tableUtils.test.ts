import { describe, it, expect } from 'vitest';
import {
  cellText,
  columnCount,
  formatTableNumber,
  formatTextTable,
  isNumericText,
  parseNumericText
} from '../src/utils/tableUtils';

describe('formatTextTable', () => {
  it('renders a header, a rule and the body rows', () => {
    const text = formatTextTable([
      ['Item', 'Amount'],
      ['Apples', 200],
      ['Pears', 1500.5]
    ]);

    expect(text.split('\n')).toEqual([
      'Item   | Amount',
      '-------+-------',
      'Apples |    200',
      'Pears  | 1500.5'
    ]);
  });

  it('omits the rule for a single row', () => {
    expect(formatTextTable([['Only', 1]])).toBe('Only | 1');
  });

  it('renders empty cells as blanks', () => {
    expect(formatTextTable([['a', null], ['bb', 'c']]).split('\n')).toEqual([
      'a  |  ',
      '---+--',
      'bb | c'
    ]);
  });

  it('returns an empty string for no rows', () => {
    expect(formatTextTable([])).toBe('');
  });
});

describe('numeric helpers', () => {
  it('recognises numbers with separators and currency', () => {
    expect(isNumericText('$1,200')).toBe(true);
    expect(isNumericText('-3.5')).toBe(true);
    expect(isNumericText('')).toBe(false);
    expect(isNumericText('abc')).toBe(false);
    expect(parseNumericText('$1,200.25')).toBe(1200.25);
  });

  it('formats table numbers with two decimals and separators', () => {
    expect(formatTableNumber(1234.5)).toBe('1,234.50');
    expect(formatTableNumber(7)).toBe('7.00');
  });

  it('renders cells and counts columns', () => {
    expect(cellText(null)).toBe('');
    expect(cellText(42)).toBe('42');
    expect(columnCount([['a'], ['b', 'c', 'd'], []])).toBe(3);
  });
});
