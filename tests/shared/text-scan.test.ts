import {
  after,
  afterStrict,
  before,
  beforeStrict,
  between,
  betweenStrict,
  indexBetweenStrict,
  matchesBetween,
  occurrencesAfter,
  runLength,
  scanBetween,
} from '../../src/shared/text-scan.js';

describe('before / after', () => {
  it('splits at the first occurrence of the marker', () => {
    expect(before('a=b=c', '=')).toBe('a');
    expect(after('a=b=c', '=')).toBe('b=c');
  });

  it('falls back to the whole text or to empty text when the marker is absent', () => {
    expect(before('abc', '#')).toBe('abc');
    expect(after('abc', '#')).toBe('');
  });

  it('returns null from the strict forms when the marker is absent', () => {
    expect(beforeStrict('abc', '#')).toBeNull();
    expect(afterStrict('abc', '#')).toBeNull();
  });

  it('tells an empty result apart from a missing marker', () => {
    expect(beforeStrict('#abc', '#')).toBe('');
    expect(afterStrict('abc#', '#')).toBe('');
  });
});

describe('between', () => {
  it('returns the text between the first begin and the next end', () => {
    expect(between('x[one][two]', '[', ']')).toBe('one');
    expect(betweenStrict('x[one][two]', '[', ']')).toBe('one');
  });

  it('returns empty text or null when either marker is missing', () => {
    expect(between('x[one', '[', ']')).toBe('');
    expect(betweenStrict('x[one', '[', ']')).toBeNull();
    expect(betweenStrict('one]', '[', ']')).toBeNull();
  });

  it('reports the half-open range of the strict result', () => {
    const text = 'key=(value)';
    const range = indexBetweenStrict(text, '(', ')');

    expect(range).toEqual({ start: 5, end: 10 });
    expect(text.slice(5, 10)).toBe('value');
  });

  it('only looks for the end marker after the begin marker', () => {
    expect(betweenStrict(')(inside)', '(', ')')).toBe('inside');
  });
});

describe('scanBetween', () => {
  it('starts searching at the given position', () => {
    expect(scanBetween('<a><b>', '<', '>', 1)).toEqual({ start: 4, end: 5, next: 5 });
  });

  it('rejects empty begin markers and out-of-range positions', () => {
    expect(scanBetween('abc', '', 'c')).toBeNull();
    expect(scanBetween('abc', 'a', 'c', -1)).toBeNull();
    expect(scanBetween('abc', 'a', 'c', 4)).toBeNull();
  });
});

describe('matchesBetween', () => {
  it('yields every match left to right', () => {
    const text = '[a][bb][ccc]';
    const found = [...matchesBetween(text, '[', ']')].map((m) => text.slice(m.start, m.end));

    expect(found).toEqual(['a', 'bb', 'ccc']);
  });

  it('terminates on repeated content', () => {
    const text = '"x"'.repeat(50);
    expect([...matchesBetween(text, '"', '"')]).toHaveLength(99);
  });

  it('can be iterated again from the start', () => {
    const text = '(1)(2)';
    const first = [...matchesBetween(text, '(', ')')];
    const second = [...matchesBetween(text, '(', ')')];

    expect(second).toEqual(first);
  });
});

describe('occurrencesAfter', () => {
  it('yields the position right after each marker', () => {
    expect([...occurrencesAfter('ab-ab-ab', 'ab')]).toEqual([2, 5, 8]);
  });

  it('does not overlap occurrences', () => {
    expect([...occurrencesAfter('aaaa', 'aa')]).toEqual([2, 4]);
  });

  it('yields nothing for an empty marker', () => {
    expect([...occurrencesAfter('abc', '')]).toEqual([]);
  });
});

describe('runLength', () => {
  const isDigit = (char: string): boolean => char >= '0' && char <= '9';

  it('counts accepted characters from the start position', () => {
    expect(runLength('ab123cd', 2, isDigit)).toBe(3);
  });

  it('stops at the end of the text', () => {
    expect(runLength('x99', 1, isDigit)).toBe(2);
    expect(runLength('x', 1, isDigit)).toBe(0);
  });
});
