import type { DocumentStore } from '@hpcpulse/document-store';
import { assertFresh, siteDocumentKey } from '@hpcpulse/pbs-model';
import type { JsonValue } from '@hpcpulse/shared';

import { BackendError, MissingDocumentError, UnknownSiteError } from './errors';

export type SiteDocumentsOptions = {
  store: DocumentStore;
  sites: readonly string[];
  maxAgeSeconds: number;
  now?: () => Date;
};

/**
 * Read access to published documents. Every site query first checks that
 * the site is configured and that its document is fresh.
 */
export class SiteDocuments {
  private readonly store: DocumentStore;
  private readonly sites: ReadonlySet<string>;
  private readonly maxAgeSeconds: number;
  private readonly now: () => Date;

  constructor(options: SiteDocumentsOptions) {
    this.store = options.store;
    this.sites = new Set(options.sites);
    this.maxAgeSeconds = options.maxAgeSeconds;
    this.now = options.now ?? (() => new Date());
  }

  listSites(): string[] {
    return Array.from(this.sites);
  }

  assertSite(site: string): void {
    if (!this.sites.has(site)) {
      throw new UnknownSiteError(site);
    }
  }

  /** Raw store access; store failures surface as {@link BackendError}. */
  async query(key: string, path: string): Promise<JsonValue[] | null> {
    try {
      return await this.store.getPath(key, path);
    } catch (err) {
      throw new BackendError(err);
    }
  }

  async queryFresh(site: string, path: string): Promise<JsonValue[]> {
    this.assertSite(site);
    const key = siteDocumentKey(site);
    const timestamps = await this.query(key, '$.timestamp');
    if (timestamps === null || timestamps.length === 0) {
      throw new MissingDocumentError(site);
    }
    assertFresh(timestamps[0], this.now(), this.maxAgeSeconds);
    return (await this.query(key, path)) ?? [];
  }

  async ping(): Promise<void> {
    const [site] = this.sites;
    if (site !== undefined) {
      await this.query(siteDocumentKey(site), '$.timestamp');
    }
  }
}
