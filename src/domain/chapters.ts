/**
 * Chapters long enough (or otherwise suited) to carry a whole month of posts.
 * A new monthly cycle always starts from one of these.
 */
export const MONTHLY_CHAPTER_IDS: readonly number[] = [2, 3, 4, 5, 6, 7, 9, 10, 11, 12, 16, 17, 18, 20, 21, 26, 37];

export type RandomSource = () => number;

export function selectMonthlyChapter(random: RandomSource = Math.random): number {
  const r = random();
  // Clamp so a source returning exactly 1 (or garbage) still lands inside the list.
  const idx = Number.isFinite(r) ? Math.min(MONTHLY_CHAPTER_IDS.length - 1, Math.max(0, Math.floor(r * MONTHLY_CHAPTER_IDS.length))) : 0;
  return MONTHLY_CHAPTER_IDS[idx];
}
