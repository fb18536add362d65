import { X_MAX_TWEET_WEIGHT, dropLastCodePoint, sliceToWeight, tweetWeight } from '../infra/x/text.js';

export type VerseRecord = {
  originalText: string;
  translatedText: string;
  chapterName: string;
  chapterId: number;
  verseId: number;
  reference: string;
};

const ELLIPSIS = '...';
// Below this many units a cut translation says nothing useful.
const MIN_TRANSLATION_BUDGET = 20;

export function formatReference(chapterName: string, chapterId: number, verseId: number): string {
  return `Surah ${chapterName} (${chapterId}:${verseId})`;
}

function compose(original: string, translation: string, reference: string): string {
  return `${original}\n\n"${translation}"\n\n— ${reference}`;
}

function composeWithoutTranslation(original: string, reference: string): string {
  return `${original}\n\n— ${reference}`;
}

/**
 * Original text, quoted translation and reference, kept under X's weighted
 * limit. When the limit is hit the translation is cut and marked with "...";
 * if there is no useful room for it, the translation is left out, and past
 * that the original itself is cut. Returns null only when the reference alone
 * leaves no room, so callers never publish an oversized post.
 */
export function formatVerseTweet(verse: VerseRecord | null | undefined, maxWeight = X_MAX_TWEET_WEIGHT): string | null {
  if (!verse) return null;

  const full = compose(verse.originalText, verse.translatedText, verse.reference);
  if (tweetWeight(full) <= maxWeight) return full;

  const overhead = tweetWeight(verse.originalText) + tweetWeight(verse.reference) + tweetWeight(compose('', '', ''));
  const budget = maxWeight - overhead - ELLIPSIS.length;

  if (budget > MIN_TRANSLATION_BUDGET) {
    let cut = sliceToWeight(verse.translatedText, budget);
    let draft = compose(verse.originalText, `${cut}${ELLIPSIS}`, verse.reference);
    // NFC across part boundaries can shift the weight slightly; shave until it fits.
    while (tweetWeight(draft) > maxWeight && cut.length > 0) {
      cut = dropLastCodePoint(cut);
      draft = compose(verse.originalText, `${cut}${ELLIPSIS}`, verse.reference);
    }
    if (tweetWeight(draft) <= maxWeight) return draft;
  }

  const bare = composeWithoutTranslation(verse.originalText, verse.reference);
  if (tweetWeight(bare) <= maxWeight) return bare;

  return fitOriginal(verse.originalText, verse.reference, maxWeight);
}

function fitOriginal(original: string, reference: string, maxWeight: number): string | null {
  const budget = maxWeight - tweetWeight(reference) - tweetWeight(composeWithoutTranslation('', '')) - ELLIPSIS.length;
  if (budget <= 0) return null;

  let cut = sliceToWeight(original, budget);
  let draft = composeWithoutTranslation(`${cut}${ELLIPSIS}`, reference);
  while (tweetWeight(draft) > maxWeight && cut.length > 0) {
    cut = dropLastCodePoint(cut);
    draft = composeWithoutTranslation(`${cut}${ELLIPSIS}`, reference);
  }
  return cut.length > 0 && tweetWeight(draft) <= maxWeight ? draft : null;
}
