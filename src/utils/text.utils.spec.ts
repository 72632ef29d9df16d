import { flattenMessageText, graphemeLength, stripControlMarks, truncatePreview } from './text.utils';

describe('stripControlMarks', () => {
  it('should remove direction marks', () => {
    expect(stripControlMarks('\u200Ehello\u202Bworld\u2069')).toBe('helloworld');
  });
});

describe('flattenMessageText', () => {
  it('should return plain strings unchanged', () => {
    expect(flattenMessageText('plain')).toBe('plain');
  });

  it('should join strings and entity texts', () => {
    expect(flattenMessageText(['a ', { type: 'italic', text: 'b' }, { type: 'mention_name', user_id: 1 }, ' c'])).toBe(
      'a b c',
    );
  });

  it.each([undefined, null, 42, { text: 'object' }])('should return an empty string for %p', (value) => {
    expect(flattenMessageText(value)).toBe('');
  });
});

describe('truncatePreview', () => {
  it('should collapse whitespace and non-breaking spaces onto one line', () => {
    expect(truncatePreview('  line one\n\nline\u00A0two  ', 60)).toBe('line one line two');
  });

  it('should leave short text alone', () => {
    expect(truncatePreview('short', 5)).toBe('short');
  });

  it('should cut with an ellipsis', () => {
    expect(truncatePreview('abcdefgh', 5)).toBe('abcd…');
  });

  it('should not split emoji sequences', () => {
    const family = '\u{1F468}\u200D\u{1F469}\u200D\u{1F467}';
    expect(truncatePreview(`${family}${family}${family}`, 3)).toBe(`${family}${family}${family}`);
    expect(truncatePreview(`${family}${family}${family}`, 2)).toBe(`${family}…`);
  });

  it('should return an empty string for a zero width', () => {
    expect(truncatePreview('abc', 0)).toBe('');
  });
});

describe('graphemeLength', () => {
  it('should count emoji sequences as one character', () => {
    expect(graphemeLength('ab\u{1F468}\u200D\u{1F469}\u200D\u{1F467}')).toBe(3);
  });
});
