import {
  decodeHtmlText,
  decodeScriptText,
  findDanglingEscape,
  resolveJsonEscapes,
  resolveNumericReferences,
  stripDelimited,
} from '../../src/giveaway/decode.js';

describe('stripDelimited', () => {
  it('removes every span with its delimiters', () => {
    expect(stripDelimited('<p>one</p> <i>two</i>', '<', '>')).toBe('one two');
  });

  it('leaves an unclosed opener in place', () => {
    expect(stripDelimited('1 < 2', '<', '>')).toBe('1 < 2');
  });
});

describe('decodeHtmlText', () => {
  it('strips tags and turns no-break spaces into line breaks', () => {
    expect(decodeHtmlText('<b>Win</b>\u00a0a phone')).toBe('Win\na phone');
  });

  it('resolves the apostrophe entity', () => {
    expect(decodeHtmlText('It&#39;s fun')).toBe("It's fun");
  });

  it('leaves other numeric references alone', () => {
    expect(decodeHtmlText('&#65;')).toBe('&#65;');
  });
});

describe('findDanglingEscape', () => {
  it('finds a unicode escape without four hex digits', () => {
    expect(findDanglingEscape('abc\\u12')).toBe(3);
  });

  it('finds a tag opener left after stripping', () => {
    expect(findDanglingEscape('ok\\u003cbr')).toBe(2);
  });

  it('returns -1 when every escape is complete', () => {
    expect(findDanglingEscape('a\\u0026#39;b')).toBe(-1);
  });
});

describe('resolveNumericReferences', () => {
  it('resolves both reference forms', () => {
    expect(resolveNumericReferences('&#72;i\\u0026#33;')).toBe('Hi!');
  });

  it('stops at the first reference that is not a code point', () => {
    expect(resolveNumericReferences('x&#65;y&#abc;z&#66;')).toBe('xAy&#abc;z&#66;');
    expect(resolveNumericReferences('A&#99999999;B')).toBe('A&#99999999;B');
    expect(resolveNumericReferences('&#55296;')).toBe('&#55296;');
  });
});

describe('resolveJsonEscapes', () => {
  it('resolves simple and unicode escapes', () => {
    expect(resolveJsonEscapes('Line\\nbreak \\"quoted\\" a\\/b')).toBe(
      'Line\nbreak "quoted" a/b',
    );
    expect(resolveJsonEscapes('v\\u00e9lo')).toBe('vélo');
  });

  it('recombines surrogate pairs', () => {
    expect(resolveJsonEscapes('\\ud83c\\udf81')).toBe('\u{1F381}');
  });

  it('keeps an escaped backslash literal', () => {
    expect(resolveJsonEscapes('a\\\\u0041')).toBe('a\\u0041');
  });

  it('leaves unknown escapes alone', () => {
    expect(resolveJsonEscapes('50\\% off')).toBe('50\\% off');
  });
});

describe('decodeScriptText', () => {
  it('strips escaped tags', () => {
    expect(decodeScriptText('\\u003ch2\\u003eWin $1000\\u003c/h2\\u003e')).toBe('Win $1000');
  });

  it('resolves escaped numeric references outside the BMP', () => {
    expect(decodeScriptText('\\u0026#128420;')).toBe('\u{1F5A4}');
  });

  it('resolves both apostrophe forms', () => {
    expect(decodeScriptText('It\\u0026#39;s Bob&#39;s')).toBe("It's Bob's");
  });

  it('cuts the text at a dangling escape', () => {
    expect(decodeScriptText('Great prize\\u003cbr')).toBe('Great prize');
    expect(decodeScriptText('abc\\u12 tail')).toBe('abc');
  });

  it('resolves the JSON escapes of non-ASCII text', () => {
    expect(decodeScriptText('Gagnez un v\\u00e9lo')).toBe('Gagnez un vélo');
    expect(decodeScriptText('Say \\"hi\\"\\nnow')).toBe('Say "hi"\nnow');
  });

  it('leaves an invalid reference and the rest of the text unresolved', () => {
    expect(decodeScriptText('ok &#1114112; &#65;')).toBe('ok &#1114112; &#65;');
  });
});
