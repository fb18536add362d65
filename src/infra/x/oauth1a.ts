import crypto from 'crypto';
import type { XCredentials } from '../../config/index.js';

export type HttpMethod = 'GET' | 'POST';

export type OAuth1aSignOptions = {
  /** Form-encoded body params; JSON bodies are not part of the signature. */
  bodyParams?: Record<string, string>;
  // Fixed values make signatures reproducible in tests.
  nonce?: string;
  timestamp?: number;
};

export function rfc3986Encode(v: string): string {
  return encodeURIComponent(v).replace(/[!'()*]/g, c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

function nonce(): string {
  // ASCII-only nonce
  return crypto.randomBytes(16).toString('hex');
}

function baseUrlOf(rawUrl: string): string {
  const u = new URL(rawUrl);
  return `${u.protocol}//${u.host}${u.pathname}`;
}

export function normalizedParamString(params: Array<[string, string]>): string {
  // Percent-encode keys/values first, then sort.
  const enc = params.map(([k, v]): [string, string] => [rfc3986Encode(k), rfc3986Encode(v)]);
  enc.sort((a, b) => (a[0] === b[0] ? compareAscii(a[1], b[1]) : compareAscii(a[0], b[0])));
  return enc.map(([k, v]) => `${k}=${v}`).join('&');
}

// Byte order, not locale order: encoded params are plain ASCII.
function compareAscii(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function signatureBaseString(method: HttpMethod, url: string, params: Array<[string, string]>): string {
  return `${method}&${rfc3986Encode(baseUrlOf(url))}&${rfc3986Encode(normalizedParamString(params))}`;
}

function signHmacSha1(baseString: string, consumerSecret: string, tokenSecret: string): string {
  const key = `${rfc3986Encode(consumerSecret)}&${rfc3986Encode(tokenSecret)}`;
  return crypto.createHmac('sha1', key).update(baseString).digest('base64');
}

function buildHeader(params: Record<string, string>): string {
  const parts = Object.entries(params)
    .filter(([k]) => k.startsWith('oauth_'))
    .sort(([a], [b]) => compareAscii(a, b))
    .map(([k, v]) => `${rfc3986Encode(k)}="${rfc3986Encode(v)}"`);
  return `OAuth ${parts.join(', ')}`;
}

/** Authorization header for a user-context request to the X API. */
export function buildOAuth1aAuthHeader(
  method: HttpMethod,
  url: string,
  creds: XCredentials,
  opts: OAuth1aSignOptions = {}
): string {
  const oauthParams: Record<string, string> = {
    oauth_consumer_key: creds.consumerKey,
    oauth_nonce: opts.nonce ?? nonce(),
    oauth_signature_method: 'HMAC-SHA1',
    oauth_timestamp: String(opts.timestamp ?? Math.floor(Date.now() / 1000)),
    oauth_token: creds.accessToken,
    oauth_version: '1.0',
  };

  const params: Array<[string, string]> = [];
  for (const [k, v] of new URL(url).searchParams.entries()) params.push([k, v]);
  if (opts.bodyParams) for (const [k, v] of Object.entries(opts.bodyParams)) params.push([k, v]);
  for (const [k, v] of Object.entries(oauthParams)) params.push([k, v]);

  const baseString = signatureBaseString(method, url, params);
  oauthParams.oauth_signature = signHmacSha1(baseString, creds.consumerSecret, creds.accessTokenSecret);

  return buildHeader(oauthParams);
}
