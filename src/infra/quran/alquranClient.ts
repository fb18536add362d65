import { z } from 'zod';
import type { ChapterMeta, VerseLanguage, VerseSource, VerseText } from '../../scheduler/types.js';

export type AlQuranClientOptions = {
  baseUrl: string;
  /** Edition for the original text, e.g. quran-uthmani. */
  sourceEdition: string;
  /** Edition for the translation, e.g. en.sahih. */
  translationEdition: string;
  timeoutMs: number;
};

// Every alquran.cloud response is wrapped as { code, status, data }.
function envelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({ code: z.number().int(), status: z.string().optional(), data });
}

const SurahSchema = envelope(
  z.object({
    number: z.number().int(),
    englishName: z.string(),
    numberOfAyahs: z.number().int().positive(),
  })
);

const AyahSchema = envelope(
  z.object({
    text: z.string().min(1),
    numberInSurah: z.number().int().optional(),
    surah: z.object({ englishName: z.string() }),
  })
);

/** VerseSource backed by the public alquran.cloud REST API. */
export class AlQuranClient implements VerseSource {
  constructor(private readonly opts: AlQuranClientOptions) {}

  private async getJson(path: string): Promise<unknown> {
    const url = `${this.opts.baseUrl}${path}`;
    const ac = new AbortController();
    const timeout = setTimeout(() => ac.abort(), this.opts.timeoutMs);
    try {
      const res = await fetch(url, { headers: { Accept: 'application/json' }, signal: ac.signal });
      const json: unknown = await res.json().catch(() => ({}));
      if (!res.ok) {
        throw new Error(`alquran ${path} failed (${res.status}): ${JSON.stringify(json).slice(0, 200)}`);
      }
      return json;
    } finally {
      clearTimeout(timeout);
    }
  }

  async getChapterMeta(chapterId: number): Promise<ChapterMeta> {
    const path = `/surah/${chapterId}`;
    const parsed = SurahSchema.safeParse(await this.getJson(path));
    if (!parsed.success) {
      throw new Error(`alquran ${path} invalid response: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    if (parsed.data.code !== 200) {
      throw new Error(`alquran ${path} returned code ${parsed.data.code}`);
    }
    return { verseCount: parsed.data.data.numberOfAyahs, chapterName: parsed.data.data.englishName };
  }

  async getVerse(chapterId: number, verseId: number, language: VerseLanguage): Promise<VerseText> {
    const edition = language === 'original' ? this.opts.sourceEdition : this.opts.translationEdition;
    const path = `/ayah/${chapterId}:${verseId}/${encodeURIComponent(edition)}`;
    const parsed = AyahSchema.safeParse(await this.getJson(path));
    if (!parsed.success) {
      throw new Error(`alquran ${path} invalid response: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    if (parsed.data.code !== 200) {
      throw new Error(`alquran ${path} returned code ${parsed.data.code}`);
    }
    return { text: parsed.data.data.text.trim(), chapterName: parsed.data.data.surah.englishName };
  }
}
