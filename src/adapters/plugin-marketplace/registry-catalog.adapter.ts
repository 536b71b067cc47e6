// =============================================================================
// Registry Catalog Adapter — Fetches installable plugin listings from a catalog
// =============================================================================

import { z } from "zod";

import { PluginManifestSchema } from "../../domain/manifest.schema.js";
import { describeError, MarketplaceError } from "../../errors.js";
import { log, silentLogger, type Logger } from "../../logging.js";
import {
  CATEGORY_CAPABILITY,
  type MarketplaceListing,
  type MarketplacePort,
  type PluginCategory,
} from "../../ports/marketplace.port.js";

const ListingSchema = z.object({
  manifest: PluginManifestSchema,
  downloadUrl: z.string().url(),
});

export interface RegistryCatalogOptions {
  registryUrl: string;
  /** How long a fetched catalog is reused (default: 60s; 0 disables caching) */
  cacheTtlMs?: number;
  logger?: Logger;
}

export class RegistryCatalogAdapter implements MarketplacePort {
  private readonly registryUrl: string;
  private readonly cacheTtlMs: number;
  private readonly logger: Logger;
  private cache?: { listings: MarketplaceListing[]; fetchedAt: number };

  constructor(options: RegistryCatalogOptions) {
    this.registryUrl = options.registryUrl;
    this.cacheTtlMs = options.cacheTtlMs ?? 60_000;
    this.logger = options.logger ?? silentLogger;
  }

  async search(query: string, category: PluginCategory = "all"): Promise<MarketplaceListing[]> {
    const listings = await this.fetchCatalog();
    const lower = query.trim().toLowerCase();

    return listings.filter(({ manifest }) => {
      if (category !== "all" && !manifest.capabilities.includes(CATEGORY_CAPABILITY[category])) {
        return false;
      }
      if (lower === "") return true;
      return manifest.name.toLowerCase().includes(lower) || manifest.description.toLowerCase().includes(lower);
    });
  }

  async getListing(id: string): Promise<MarketplaceListing | null> {
    const listings = await this.fetchCatalog();
    return listings.find((listing) => listing.manifest.id === id) ?? null;
  }

  async listAll(): Promise<MarketplaceListing[]> {
    return this.fetchCatalog();
  }

  /** Drops the cached catalog so the next call refetches it */
  invalidate(): void {
    this.cache = undefined;
  }

  // ─── Private ────────────────────────────────────────────────────────────

  private async fetchCatalog(): Promise<MarketplaceListing[]> {
    if (this.cache && Date.now() - this.cache.fetchedAt < this.cacheTtlMs) {
      return this.cache.listings;
    }

    let response: Response;
    try {
      response = await fetch(this.registryUrl);
    } catch (err) {
      throw new MarketplaceError(`Failed to fetch plugin catalog: ${describeError(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw new MarketplaceError(`Catalog returned HTTP ${response.status}: ${response.statusText}`);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      throw new MarketplaceError("Catalog returned invalid JSON.", { cause: err });
    }

    if (!Array.isArray(data)) {
      throw new MarketplaceError("Catalog JSON is not an array.");
    }

    const listings: MarketplaceListing[] = [];
    for (const [index, entry] of data.entries()) {
      const parsed = ListingSchema.safeParse(entry);
      if (parsed.success) {
        listings.push(parsed.data);
      } else {
        log(this.logger, "warn", "marketplace:invalid-listing", {
          index,
          issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        });
      }
    }

    this.cache = { listings, fetchedAt: Date.now() };
    return listings;
  }
}
