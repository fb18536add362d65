import type { ProgressRecord } from '../domain/progress.js';

export type ChapterMeta = {
  verseCount: number;
  chapterName: string;
};

export type VerseLanguage = 'original' | 'translation';

export type VerseText = {
  text: string;
  chapterName: string;
};

/** Read side of the scripture API. Implementations throw on any failure. */
export interface VerseSource {
  getChapterMeta(chapterId: number): Promise<ChapterMeta>;
  getVerse(chapterId: number, verseId: number, language: VerseLanguage): Promise<VerseText>;
}

export type PublishResult = {
  postId: string;
  url?: string;
};

export interface Publisher {
  publish(text: string): Promise<PublishResult>;
}

export interface ProgressStore {
  /** null on first run (nothing stored yet) or when the stored record is unusable. */
  load(): Promise<ProgressRecord | null>;
  save(record: ProgressRecord): Promise<void>;
}
