import type { Config } from '../config.js';
import type { SiteId } from '../listings/types.js';
import { ApartmentsComAdapter } from './apartments.js';
import type { AdapterOptions, SiteAdapter } from './base.js';
import { CraigslistAdapter } from './craigslist.js';
import { HotPadsAdapter } from './hotpads.js';
import type { HttpGetter } from './http.js';
import { ZillowAdapter } from './zillow.js';

const ADAPTERS: Record<SiteId, new (options: AdapterOptions) => SiteAdapter> = {
  craigslist: CraigslistAdapter,
  apartments: ApartmentsComAdapter,
  hotpads: HotPadsAdapter,
  zillow: ZillowAdapter,
};

export function createAdapter(site: SiteId, options: AdapterOptions): SiteAdapter {
  return new ADAPTERS[site](options);
}

/**
 * Adapters for the configured sites, in configuration order.
 */
export function createAdapters(config: Config, http?: HttpGetter): SiteAdapter[] {
  return config.sites.map((site) =>
    createAdapter(site, {
      search: config.search,
      http,
      requestTimeoutMs: config.scraper.requestTimeoutMs,
      maxCardsPerPage: config.scraper.maxCardsPerPage,
    })
  );
}
