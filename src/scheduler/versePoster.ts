import { logger } from '../utils/logger.js';
import type { RandomSource } from '../domain/chapters.js';
import {
  applyMonthRollover,
  createInitialProgress,
  getCalendarPeriod,
  type ProgressRecord,
} from '../domain/progress.js';
import { formatReference, formatVerseTweet, type VerseRecord } from '../domain/verse.js';
import { evaluatePostingGate, type PostingPolicy } from './postingPolicy.js';
import type { ProgressStore, Publisher, VerseSource } from './types.js';

export type SkipReason = 'monthly_limit_reached' | 'too_soon' | 'in_flight';
export type FailReason = 'verse_fetch_failed' | 'format_failed' | 'publish_failed' | 'state_save_failed' | 'unexpected_error';

export type PostOutcome =
  | { ok: true; status: 'posted'; postId: string; url?: string; reference: string; progress: ProgressRecord }
  | { ok: false; status: 'skipped'; reason: SkipReason; minutesRemaining?: number }
  | { ok: false; status: 'failed'; reason: FailReason; error?: string };

// Failures that only cost this cycle; the next trigger retries on its own.
const SOFT_FAIL_REASONS: ReadonlySet<FailReason> = new Set<FailReason>(['verse_fetch_failed', 'format_failed', 'publish_failed']);

/**
 * Process exit status. Posts, skips and soft failures exit 0; a lost state
 * write or an unexpected error exits 1.
 */
export function outcomeExitCode(outcome: PostOutcome): number {
  if (outcome.ok || outcome.status === 'skipped') return 0;
  return SOFT_FAIL_REASONS.has(outcome.reason) ? 0 : 1;
}

export type VersePosterDeps = {
  source: VerseSource;
  publisher: Publisher;
  store: ProgressStore;
  policy: PostingPolicy;
  /** IANA timezone that decides which calendar month "now" is in. */
  timezone: string;
  now?: () => Date;
  random?: RandomSource;
};

/**
 * One posting cycle per call: month rollover, gate, fetch, format, publish,
 * persist. Every failure is turned into a PostOutcome; nothing is thrown.
 */
export class VersePoster {
  private inFlight = false;

  private readonly now: () => Date;

  constructor(private readonly deps: VersePosterDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async runOnce(): Promise<PostOutcome> {
    if (this.inFlight) {
      logger.info('run_skip_in_flight');
      return { ok: false, status: 'skipped', reason: 'in_flight' };
    }

    this.inFlight = true;
    try {
      return await this.cycle();
    } catch (err) {
      logger.error('run_failed_unexpectedly', { err: String(err) });
      return { ok: false, status: 'failed', reason: 'unexpected_error', error: String(err) };
    } finally {
      this.inFlight = false;
    }
  }

  /** Stored record, or a fresh one (random chapter, verse 1) on first run. */
  async loadProgress(now: Date = this.now()): Promise<ProgressRecord> {
    const stored = await this.deps.store.load();
    if (stored) return stored;

    const fresh = createInitialProgress(getCalendarPeriod(now, this.deps.timezone), this.deps.random);
    logger.info('progress_initialized', { chapter: fresh.currentChapter, month: fresh.currentMonth, year: fresh.currentYear });
    return fresh;
  }

  /** Persists immediately when a new month starts. */
  async checkMonthRollover(record: ProgressRecord, now: Date = this.now()): Promise<boolean> {
    const period = getCalendarPeriod(now, this.deps.timezone);
    if (!applyMonthRollover(record, period, this.deps.random)) return false;

    logger.info('month_rollover', { chapter: record.currentChapter, month: period.month, year: period.year });
    await this.deps.store.save(record);
    return true;
  }

  /**
   * Resolves the verse under the cursor, wrapping to verse 1 past the end of
   * the chapter. The chapter's verse count is cached (and saved) on first
   * lookup, even when the rest of the cycle later fails.
   */
  async resolveNextVerse(record: ProgressRecord): Promise<VerseRecord | null> {
    const { source } = this.deps;
    try {
      const verseCount = record.chapterVerseCount ?? (await this.cacheChapterMeta(record));

      if (record.currentVerseNumber > verseCount) {
        logger.info('chapter_end_reached_cycling', { chapter: record.currentChapter, verseCount });
        record.currentVerseNumber = 1;
      }

      const chapterId = record.currentChapter;
      const verseId = record.currentVerseNumber;
      const [original, translation] = await Promise.all([
        source.getVerse(chapterId, verseId, 'original'),
        source.getVerse(chapterId, verseId, 'translation'),
      ]);

      const chapterName = original.chapterName || translation.chapterName;
      return {
        originalText: original.text,
        translatedText: translation.text,
        chapterName,
        chapterId,
        verseId,
        reference: formatReference(chapterName, chapterId, verseId),
      };
    } catch (err) {
      logger.warn('verse_fetch_failed', {
        chapter: record.currentChapter,
        verse: record.currentVerseNumber,
        err: String(err),
      });
      return null;
    }
  }

  private async cacheChapterMeta(record: ProgressRecord): Promise<number> {
    const meta = await this.deps.source.getChapterMeta(record.currentChapter);
    record.chapterVerseCount = meta.verseCount;
    await this.deps.store.save(record);
    logger.info('chapter_meta_cached', {
      chapter: record.currentChapter,
      chapterName: meta.chapterName,
      verseCount: meta.verseCount,
    });
    return meta.verseCount;
  }

  private async cycle(): Promise<PostOutcome> {
    const { policy, publisher, store } = this.deps;
    const now = this.now();
    const record = await this.loadProgress(now);

    logger.info('run_started', {
      chapter: record.currentChapter,
      nextVerse: record.currentVerseNumber,
      postedThisMonth: record.versesPostedThisMonth,
      limit: policy.monthlyLimit,
    });

    await this.checkMonthRollover(record, now);

    const gate = evaluatePostingGate(record, policy, now);
    if (!gate.allowed) {
      if (gate.reason === 'monthly_limit_reached') {
        logger.info('monthly_limit_reached', { posted: gate.postedThisMonth, limit: gate.limit });
        return { ok: false, status: 'skipped', reason: gate.reason };
      }
      logger.info('post_too_soon', { minutesRemaining: gate.minutesRemaining });
      return { ok: false, status: 'skipped', reason: gate.reason, minutesRemaining: gate.minutesRemaining };
    }

    logger.info('verse_fetching', { chapter: record.currentChapter, verse: record.currentVerseNumber });
    const verse = await this.resolveNextVerse(record);
    if (!verse) {
      return { ok: false, status: 'failed', reason: 'verse_fetch_failed' };
    }

    const text = formatVerseTweet(verse);
    if (!text) {
      // Step past the verse so the cycle cannot stall on it; quota and spacing are untouched.
      record.currentVerseNumber += 1;
      await store.save(record);
      logger.error('tweet_format_failed', { reference: verse.reference, nextVerse: record.currentVerseNumber });
      return { ok: false, status: 'failed', reason: 'format_failed' };
    }

    const attempt = await publisher.publish(text).then(
      result => ({ result }),
      (err: unknown) => ({ error: String(err) })
    );
    if ('error' in attempt) {
      logger.warn('publish_failed', { reference: verse.reference, err: attempt.error });
      return { ok: false, status: 'failed', reason: 'publish_failed', error: attempt.error };
    }
    const published = attempt.result;

    record.currentVerseNumber += 1;
    record.versesPostedThisMonth += 1;
    record.lastPostTime = now.toISOString();

    try {
      await store.save(record);
    } catch (err) {
      // The post is live but the cursor did not move; the next run repeats this verse.
      logger.error('state_save_failed_after_publish', { postId: published.postId, err: String(err) });
      return { ok: false, status: 'failed', reason: 'state_save_failed', error: String(err) };
    }

    logger.info('verse_posted', {
      reference: verse.reference,
      postId: published.postId,
      url: published.url,
      progress: `${record.versesPostedThisMonth}/${policy.monthlyLimit}`,
    });
    return {
      ok: true,
      status: 'posted',
      postId: published.postId,
      url: published.url,
      reference: verse.reference,
      progress: { ...record },
    };
  }
}
