// =============================================================================
// Marketplace Port — Contract for browsing installable plugins
// =============================================================================

import type { PluginCapability, PluginManifest } from "../domain/manifest.schema.js";

export type PluginCategory = "all" | "languages" | "themes" | "tools" | "ai" | "ui";

/** Capability a category filters on; `all` filters nothing */
export const CATEGORY_CAPABILITY: Record<Exclude<PluginCategory, "all">, PluginCapability> = {
  languages: "languageSupport",
  themes: "theme",
  tools: "commands",
  ai: "ai",
  ui: "ui",
};

export interface MarketplaceListing {
  manifest: PluginManifest;
  /** Archive location handed to the installation manager */
  downloadUrl: string;
}

export interface MarketplacePort {
  search(query: string, category?: PluginCategory): Promise<MarketplaceListing[]>;
  getListing(id: string): Promise<MarketplaceListing | null>;
  listAll(): Promise<MarketplaceListing[]>;
}
