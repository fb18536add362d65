import type { ProgressRecord } from '../domain/progress.js';
import type {
  ChapterMeta,
  ProgressStore,
  PublishResult,
  Publisher,
  VerseLanguage,
  VerseSource,
  VerseText,
} from '../scheduler/types.js';

export class MemoryProgressStore implements ProgressStore {
  readonly saved: ProgressRecord[] = [];

  constructor(private record: ProgressRecord | null = null) {}

  get current(): ProgressRecord | null {
    return this.record ? { ...this.record } : null;
  }

  async load(): Promise<ProgressRecord | null> {
    return this.record ? { ...this.record } : null;
  }

  async save(record: ProgressRecord): Promise<void> {
    this.record = { ...record };
    this.saved.push({ ...record });
  }
}

export class FakeVerseSource implements VerseSource {
  metaCalls = 0;
  readonly verseCalls: Array<[number, number, VerseLanguage]> = [];
  failMeta = false;
  failVerse = false;
  originalText?: string;
  chapterName?: string;

  constructor(private readonly verseCounts: Record<number, number> = {}) {}

  async getChapterMeta(chapterId: number): Promise<ChapterMeta> {
    this.metaCalls += 1;
    if (this.failMeta) throw new Error('surah lookup failed (503)');
    return { verseCount: this.verseCounts[chapterId] ?? 286, chapterName: `Chapter-${chapterId}` };
  }

  async getVerse(chapterId: number, verseId: number, language: VerseLanguage): Promise<VerseText> {
    this.verseCalls.push([chapterId, verseId, language]);
    if (this.failVerse) throw new Error('ayah lookup failed (503)');
    const text =
      language === 'original' ? (this.originalText ?? `ayah ${chapterId}:${verseId}`) : `Translation of ${chapterId}:${verseId}`;
    return { text, chapterName: this.chapterName ?? `Chapter-${chapterId}` };
  }
}

export class FakePublisher implements Publisher {
  readonly posts: string[] = [];
  fail = false;

  async publish(text: string): Promise<PublishResult> {
    if (this.fail) throw new Error('X post tweet failed (503): {}');
    this.posts.push(text);
    return { postId: `post-${this.posts.length}`, url: `https://x.com/i/web/status/post-${this.posts.length}` };
  }
}
