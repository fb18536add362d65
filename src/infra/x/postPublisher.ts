import { z } from 'zod';
import type { XCredentials } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import type { PublishResult, Publisher } from '../../scheduler/types.js';
import { buildOAuth1aAuthHeader } from './oauth1a.js';

export type XMeResult = {
  userId: string;
  username?: string;
  name?: string;
};

// Use api.twitter.com for OAuth 1.0a signing compatibility.
// OAuth signatures are host-sensitive.
const API_BASE = 'https://api.twitter.com';

export type XPublisherOptions = {
  timeoutMs: number;
  apiBase?: string;
};

function preview(json: unknown): string {
  return JSON.stringify(json).slice(0, 200);
}

const TweetCreatedSchema = z.object({
  data: z.object({ id: z.union([z.string(), z.number()]).transform(String) }),
});

const UsersMeSchema = z.object({
  data: z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    username: z.string().optional(),
    name: z.string().optional(),
  }),
});

/**
 * X API v2 client for the account the access token belongs to.
 * One request per call; a timeout bounds every request.
 */
export class XPublisher implements Publisher {
  private readonly apiBase: string;

  constructor(
    private readonly creds: XCredentials,
    private readonly opts: XPublisherOptions
  ) {
    this.apiBase = opts.apiBase ?? API_BASE;
  }

  private async request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<{ status: number; ok: boolean; json: unknown }> {
    const url = `${this.apiBase}${path}`;
    // OAuth 1.0a needs a fresh nonce/timestamp per request.
    const auth = buildOAuth1aAuthHeader(method, url, this.creds);
    const ac = new AbortController();
    const timeout = setTimeout(() => ac.abort(), this.opts.timeoutMs);
    try {
      const res = await fetch(url, {
        method,
        headers: {
          Authorization: auth,
          Accept: 'application/json',
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: ac.signal,
      });
      const json: unknown = await res.json().catch(() => ({}));
      return { status: res.status, ok: res.ok, json };
    } finally {
      clearTimeout(timeout);
    }
  }

  async publish(text: string): Promise<PublishResult> {
    const start = Date.now();
    const res = await this.request('POST', '/2/tweets', { text });
    if (!res.ok) {
      throw new Error(`X post tweet failed (${res.status}): ${preview(res.json)}`);
    }
    const parsed = TweetCreatedSchema.safeParse(res.json);
    if (!parsed.success) {
      throw new Error(`X post tweet missing id: ${preview(res.json)}`);
    }
    const tweetId = parsed.data.data.id;
    logger.info('x_tweet_created', { tweetId, elapsedMs: Date.now() - start });
    return { postId: tweetId, url: `https://x.com/i/web/status/${tweetId}` };
  }

  async getMe(): Promise<XMeResult> {
    const res = await this.request('GET', '/2/users/me');
    if (!res.ok) {
      throw new Error(`X users/me failed (${res.status}): ${preview(res.json)}`);
    }
    const parsed = UsersMeSchema.safeParse(res.json);
    if (!parsed.success) {
      throw new Error(`X users/me invalid response: ${preview(res.json)}`);
    }
    const { id, username, name } = parsed.data.data;
    return { userId: id, username, name };
  }

  /** Never throws; start-up uses this for a log line only. */
  async checkConnection(): Promise<{ ok: boolean; me?: XMeResult; error?: string }> {
    try {
      const me = await this.getMe();
      return { ok: true, me };
    } catch (err) {
      return { ok: false, error: String(err) };
    }
  }
}
