import { z } from 'zod';
import { selectMonthlyChapter, type RandomSource } from './chapters.js';

export type ProgressRecord = {
  currentChapter: number;
  /** 1-based index of the next verse to post. */
  currentVerseNumber: number;
  versesPostedThisMonth: number;
  currentMonth: number; // 1..12
  currentYear: number;
  /** ISO-8601 time of the last successful post. */
  lastPostTime?: string;
  /** Cached verse count of currentChapter; cleared whenever the chapter changes. */
  chapterVerseCount?: number;
};

export type CalendarPeriod = { month: number; year: number };

/**
 * On-disk shape. Keys stay snake_case so existing state files keep loading.
 */
export const PersistedProgressSchema = z.object({
  current_chapter: z.number().int().min(1).max(114),
  current_verse_number: z.number().int().min(1),
  verses_posted_this_month: z.number().int().min(0),
  current_month: z.number().int().min(1).max(12),
  current_year: z.number().int(),
  last_post_time: z.string().nullable().optional(),
  chapter_verse_count: z.number().int().positive().nullable().optional(),
});

export type PersistedProgress = z.infer<typeof PersistedProgressSchema>;

export function fromPersisted(p: PersistedProgress): ProgressRecord {
  return {
    currentChapter: p.current_chapter,
    currentVerseNumber: p.current_verse_number,
    versesPostedThisMonth: p.verses_posted_this_month,
    currentMonth: p.current_month,
    currentYear: p.current_year,
    lastPostTime: p.last_post_time ?? undefined,
    chapterVerseCount: p.chapter_verse_count ?? undefined,
  };
}

export function toPersisted(r: ProgressRecord): PersistedProgress {
  return {
    current_chapter: r.currentChapter,
    current_verse_number: r.currentVerseNumber,
    verses_posted_this_month: r.versesPostedThisMonth,
    current_month: r.currentMonth,
    current_year: r.currentYear,
    last_post_time: r.lastPostTime ?? null,
    chapter_verse_count: r.chapterVerseCount ?? null,
  };
}

export function getCalendarPeriod(date: Date, timeZone: string): CalendarPeriod {
  // Intl keeps us free of a timezone library.
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
  }).formatToParts(date);

  const year = Number(parts.find(p => p.type === 'year')?.value ?? NaN);
  const month = Number(parts.find(p => p.type === 'month')?.value ?? NaN);
  if (!Number.isFinite(year) || !Number.isFinite(month)) {
    throw new Error(`Failed to resolve calendar period for tz=${timeZone}`);
  }
  return { month, year };
}

export function createInitialProgress(period: CalendarPeriod, random?: RandomSource): ProgressRecord {
  return {
    currentChapter: selectMonthlyChapter(random),
    currentVerseNumber: 1,
    versesPostedThisMonth: 0,
    currentMonth: period.month,
    currentYear: period.year,
  };
}

/**
 * Starts a new monthly cycle when the record belongs to another period.
 * Mutates the record in place and returns true when it changed; calling it
 * again for the same period is a no-op.
 */
export function applyMonthRollover(record: ProgressRecord, period: CalendarPeriod, random?: RandomSource): boolean {
  if (record.currentMonth === period.month && record.currentYear === period.year) return false;

  record.currentChapter = selectMonthlyChapter(random);
  record.currentVerseNumber = 1;
  record.versesPostedThisMonth = 0;
  record.currentMonth = period.month;
  record.currentYear = period.year;
  record.chapterVerseCount = undefined;
  return true;
}
