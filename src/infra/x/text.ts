/**
 * X counts characters by weight, not by UTF-16 units: most Latin, Arabic and
 * general punctuation code points weigh 1, everything else (CJK, emoji, ...)
 * weighs 2, all after NFC normalisation. These are the ranges X publishes in
 * its counting config (v3).
 *
 * Emoji sequences are counted per code point here, which can only overcount.
 * Text that fits by this measure always fits on X.
 */
export const X_MAX_TWEET_WEIGHT = 280;

const LIGHT_RANGES: Array<[number, number]> = [
  [0x0000, 0x10ff],
  [0x2000, 0x200d],
  [0x2010, 0x201f],
  [0x2032, 0x2037],
];

function codePointWeight(cp: number): number {
  for (const [start, end] of LIGHT_RANGES) {
    if (cp >= start && cp <= end) return 1;
  }
  return 2;
}

export function tweetWeight(text: string): number {
  let total = 0;
  for (const ch of String(text ?? '').normalize('NFC')) {
    total += codePointWeight(ch.codePointAt(0) ?? 0);
  }
  return total;
}

/** Longest NFC prefix of `text` whose weight does not exceed `maxWeight`. */
export function sliceToWeight(text: string, maxWeight: number): string {
  if (maxWeight <= 0) return '';
  let total = 0;
  let out = '';
  for (const ch of String(text ?? '').normalize('NFC')) {
    const w = codePointWeight(ch.codePointAt(0) ?? 0);
    if (total + w > maxWeight) break;
    total += w;
    out += ch;
  }
  return out;
}

/** Drops the last code point; used to shave a draft until it fits. */
export function dropLastCodePoint(text: string): string {
  const cps = Array.from(text);
  cps.pop();
  return cps.join('');
}
