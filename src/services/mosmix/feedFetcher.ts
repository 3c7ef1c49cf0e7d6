import AdmZip from 'adm-zip';
import { createHash } from 'node:crypto';
import { FetchError } from '../../errors';

export interface FeedValidators {
  fingerprint?: string;
  etag?: string;
  lastModified?: string;
}

export interface UnchangedFeed {
  kind: 'unchanged';
  checkedAt: Date;
  bundleUrl: string;
  validators: FeedValidators;
}

export interface UpdatedFeed {
  kind: 'updated';
  document: string;
  entryName: string;
  bundleUrl: string;
  fetchedAt: Date;
  validators: FeedValidators & { fingerprint: string };
}

export type FetchOutcome = UnchangedFeed | UpdatedFeed;

export interface FeedFetcher {
  fetch(url: string, previous?: FeedValidators): Promise<FetchOutcome>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface MosmixFeedFetcherOptions {
  fetchImpl?: FetchFn;
  timeoutMs?: number;
  now?: () => Date;
}

const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

export function isBundleUrl(url: string): boolean {
  const { pathname } = new URL(url);
  return /\.km[lz]$/i.test(pathname);
}

/**
 * Picks the bundle to download from an Apache-style directory listing:
 * the `*_LATEST.kmz` entry when present, otherwise the last `.kmz` link.
 */
export function resolveLatestFromListing(listingUrl: string, html: string): string | null {
  const hrefs = [...html.matchAll(/href="([^"]+\.kmz)"/gi)].map((m) => m[1]);
  if (hrefs.length === 0) return null;
  const latest = hrefs.find((href) => /LATEST\.kmz$/i.test(href)) ?? hrefs[hrefs.length - 1];
  const base = listingUrl.endsWith('/') ? listingUrl : `${listingUrl}/`;
  return new URL(latest, base).toString();
}

export function fingerprintOf(payload: Buffer): string {
  return createHash('sha256').update(payload).digest('hex');
}

function decodeText(payload: Buffer): string {
  const head = payload.subarray(0, 200).toString('latin1');
  return /encoding=["']ISO-8859-1["']/i.test(head) ? payload.toString('latin1') : payload.toString('utf8');
}

/**
 * Turns a downloaded payload into the KML document text. KMZ archives are
 * unpacked (first `.kml` entry); bare KML passes through.
 */
export function extractDocument(payload: Buffer, url: string): { document: string; entryName: string } {
  if (payload.subarray(0, ZIP_SIGNATURE.length).equals(ZIP_SIGNATURE)) {
    try {
      const entries = new AdmZip(payload).getEntries().filter((entry) => !entry.isDirectory);
      const entry = entries.find((e) => /\.kml$/i.test(e.entryName)) ?? entries[0];
      if (!entry) {
        throw new Error('archive is empty');
      }
      return { document: decodeText(entry.getData()), entryName: entry.entryName };
    } catch (err) {
      throw new FetchError(
        `Failed to decompress forecast bundle: ${err instanceof Error ? err.message : String(err)}`,
        url,
        undefined,
        { cause: err },
      );
    }
  }

  const text = decodeText(payload);
  if (text.trimStart().startsWith('<')) {
    const name = new URL(url).pathname.split('/').pop() ?? 'document.kml';
    return { document: text, entryName: name };
  }

  throw new FetchError('Forecast bundle is neither a KMZ archive nor a KML document', url);
}

export class MosmixFeedFetcher implements FeedFetcher {
  private readonly fetchImpl: FetchFn;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: MosmixFeedFetcherOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(url: string, previous: FeedValidators = {}): Promise<FetchOutcome> {
    const bundleUrl = isBundleUrl(url) ? url : await this.resolveBundleUrl(url);

    const headers: Record<string, string> = {};
    if (previous.etag) headers['If-None-Match'] = previous.etag;
    if (previous.lastModified) headers['If-Modified-Since'] = previous.lastModified;

    const response = await this.request(bundleUrl, headers);
    const checkedAt = this.now();

    if (response.status === 304) {
      return { kind: 'unchanged', checkedAt, bundleUrl, validators: previous };
    }
    if (!response.ok) {
      throw new FetchError(`Forecast download failed: HTTP ${response.status}`, bundleUrl, response.status);
    }

    let payload: Buffer;
    try {
      payload = Buffer.from(await response.arrayBuffer());
    } catch (err) {
      throw new FetchError('Forecast download was interrupted', bundleUrl, response.status, { cause: err });
    }

    const validators = {
      fingerprint: fingerprintOf(payload),
      etag: response.headers.get('etag') ?? undefined,
      lastModified: response.headers.get('last-modified') ?? undefined,
    };

    if (previous.fingerprint && previous.fingerprint === validators.fingerprint) {
      return { kind: 'unchanged', checkedAt, bundleUrl, validators };
    }

    const { document, entryName } = extractDocument(payload, bundleUrl);
    return { kind: 'updated', document, entryName, bundleUrl, fetchedAt: checkedAt, validators };
  }

  private async resolveBundleUrl(listingUrl: string): Promise<string> {
    const response = await this.request(listingUrl, {});
    if (!response.ok) {
      throw new FetchError(`Directory listing failed: HTTP ${response.status}`, listingUrl, response.status);
    }
    let html: string;
    try {
      html = await response.text();
    } catch (err) {
      throw new FetchError('Directory listing was interrupted', listingUrl, response.status, { cause: err });
    }
    const resolved = resolveLatestFromListing(listingUrl, html);
    if (!resolved) {
      throw new FetchError('Directory listing contains no .kmz bundle', listingUrl, response.status);
    }
    return resolved;
  }

  private async request(url: string, headers: Record<string, string>): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new FetchError(
        `Request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
        url,
        undefined,
        { cause: err },
      );
    }
  }
}
