import { requireXCredentials, type AppConfig } from '../config/index.js';
import { AlQuranClient } from '../infra/quran/alquranClient.js';
import { XPublisher } from '../infra/x/postPublisher.js';
import { getPostingPolicy } from '../scheduler/postingPolicy.js';
import { VersePoster } from '../scheduler/versePoster.js';
import { FileProgressStore } from '../store/progressStore.js';

export type PosterBundle = {
  poster: VersePoster;
  publisher: XPublisher;
  store: FileProgressStore;
};

/** Throws ConfigError before anything is read or written when credentials are missing. */
export function createPoster(cfg: AppConfig): PosterBundle {
  const creds = requireXCredentials(cfg);

  const publisher = new XPublisher(creds, { timeoutMs: cfg.httpTimeoutMs });
  const source = new AlQuranClient({
    baseUrl: cfg.quranApiBase,
    sourceEdition: cfg.quranSourceEdition,
    translationEdition: cfg.quranTranslationEdition,
    timeoutMs: cfg.httpTimeoutMs,
  });
  const store = new FileProgressStore(cfg.stateFile);

  const poster = new VersePoster({
    source,
    publisher,
    store,
    policy: getPostingPolicy(cfg),
    timezone: cfg.timezone,
  });

  return { poster, publisher, store };
}
