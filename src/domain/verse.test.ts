import { describe, expect, it } from 'vitest';
import { formatReference, formatVerseTweet, type VerseRecord } from './verse.js';
import { sliceToWeight, tweetWeight } from '../infra/x/text.js';

// 30 characters
const REFERENCE_30 = 'Surah Test-Chapter-Name (2:10)';

function verse(overrides: Partial<VerseRecord>): VerseRecord {
  return {
    originalText: 'بِسْمِ ٱللَّهِ',
    translatedText: 'In the name of Allah',
    chapterName: 'Al-Faatiha',
    chapterId: 1,
    verseId: 1,
    reference: 'Surah Al-Faatiha (1:1)',
    ...overrides,
  };
}

describe('formatReference', () => {
  it('formats chapter name and chapter:verse', () => {
    expect(formatReference('Al-Baqara', 2, 255)).toBe('Surah Al-Baqara (2:255)');
  });
});

describe('tweetWeight', () => {
  it('counts Latin, Arabic and the em dash as one each', () => {
    expect(tweetWeight('abc')).toBe(3);
    expect(tweetWeight('ا'.repeat(10))).toBe(10);
    expect(tweetWeight('— ')).toBe(2);
  });

  it('counts emoji and CJK code points as two each', () => {
    expect(tweetWeight('😀')).toBe(2);
    expect(tweetWeight('漢字')).toBe(4);
  });

  it('slices to a weight budget without splitting code points', () => {
    expect(sliceToWeight('😀😀😀', 5)).toBe('😀😀');
    expect(sliceToWeight('abcdef', 4)).toBe('abcd');
    expect(sliceToWeight('abc', 0)).toBe('');
  });
});

describe('formatVerseTweet', () => {
  it('returns null without a verse', () => {
    expect(formatVerseTweet(null)).toBeNull();
    expect(formatVerseTweet(undefined)).toBeNull();
  });

  it('composes original, quoted translation and reference when under the cap', () => {
    expect(formatVerseTweet(verse({}))).toBe('بِسْمِ ٱللَّهِ\n\n"In the name of Allah"\n\n— Surah Al-Faatiha (1:1)');
  });

  it('returns a composition of exactly 280 unmodified', () => {
    // 50 + 8 + 30 + 192 = 280
    const v = verse({ originalText: 'ا'.repeat(50), reference: REFERENCE_30, translatedText: 'x'.repeat(192) });
    const out = formatVerseTweet(v);
    expect(out).toBe(`${'ا'.repeat(50)}\n\n"${'x'.repeat(192)}"\n\n— ${REFERENCE_30}`);
    expect(tweetWeight(out ?? '')).toBe(280);
  });

  it('truncates the translation to the remaining budget and marks it with an ellipsis', () => {
    // 50 + 30 + 8 + 312 = 400 before truncation; budget = 280 - 88 - 3 = 189
    const v = verse({ originalText: 'ا'.repeat(50), reference: REFERENCE_30, translatedText: 'x'.repeat(312) });
    const out = formatVerseTweet(v);
    expect(out).toBe(`${'ا'.repeat(50)}\n\n"${'x'.repeat(189)}..."\n\n— ${REFERENCE_30}`);
    expect(tweetWeight(out ?? '')).toBe(280);
  });

  it('budgets heavy code points by weight', () => {
    const v = verse({ originalText: 'ا'.repeat(50), reference: REFERENCE_30, translatedText: '😀'.repeat(200) });
    const out = formatVerseTweet(v);
    expect(out).toBe(`${'ا'.repeat(50)}\n\n"${'😀'.repeat(94)}..."\n\n— ${REFERENCE_30}`);
    expect(tweetWeight(out ?? '')).toBe(279);
  });

  it('drops the translation when there is no useful room for it', () => {
    // budget = 280 - (240 + 30 + 8) - 3 = -1
    const v = verse({ originalText: 'ا'.repeat(240), reference: REFERENCE_30, translatedText: 'x'.repeat(100) });
    expect(formatVerseTweet(v)).toBe(`${'ا'.repeat(240)}\n\n— ${REFERENCE_30}`);
  });

  it('cuts the original when it does not fit even without the translation', () => {
    // budget = 280 - 30 - 4 - 3 = 243
    const v = verse({ originalText: 'ا'.repeat(260), reference: REFERENCE_30, translatedText: 'x'.repeat(100) });
    const out = formatVerseTweet(v);
    expect(out).toBe(`${'ا'.repeat(243)}...\n\n— ${REFERENCE_30}`);
    expect(tweetWeight(out ?? '')).toBe(280);
  });

  it('returns null rather than an oversized post when the reference leaves no room', () => {
    const v = verse({ originalText: 'ا'.repeat(10), reference: 'x'.repeat(276), translatedText: 'x'.repeat(10) });
    expect(formatVerseTweet(v)).toBeNull();
  });
});
