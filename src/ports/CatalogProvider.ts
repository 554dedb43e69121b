import type { CollectionItem, DiscogsRelease } from "../core/catalog/catalog.types";
import type { PageSource } from "./ProviderClient";

export type { CollectionItem, DiscogsRelease };

export interface CatalogProvider extends PageSource<CollectionItem> {
  fetchRelease(releaseId: number, signal?: AbortSignal): Promise<DiscogsRelease>;
}
