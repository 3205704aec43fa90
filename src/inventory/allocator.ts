import type { CatalogRepo, LocationRow, UsedLinksRepo } from "../db/types.js";
import { logger } from "../core/logger.js";

function linksOf(location: LocationRow): string[] {
  return [...new Set(location.content_links.map((l) => l.trim()).filter(Boolean))];
}

export class InventoryAllocator {
  constructor(
    private readonly catalog: CatalogRepo,
    private readonly usedLinks: UsedLinksRepo
  ) {}

  /**
   * Claims the first unused link of an active location.
   * Each claim is a unique insert; losing it to a concurrent caller moves on to the next link.
   */
  async getAvailableLink(locationId: string): Promise<string | null> {
    const location = await this.activeLocation(locationId);
    if (!location) return null;

    const used = new Set(await this.usedLinks.getUsedLinks(locationId));
    for (const link of linksOf(location)) {
      if (used.has(link)) continue;
      if (await this.usedLinks.insertIfAbsent({ locationId, link })) {
        logger.info(`allocator: link handed out for location ${locationId}`);
        return link;
      }
      used.add(link);
      logger.debug(`allocator: link already claimed concurrently at location ${locationId}, trying next`);
    }

    logger.warn(`allocator: no links left for location ${locationId} (${location.name})`);
    return null;
  }

  async countAvailable(locationId: string): Promise<number> {
    const location = await this.activeLocation(locationId);
    if (!location) return 0;
    const used = new Set(await this.usedLinks.getUsedLinks(locationId));
    return linksOf(location).filter((l) => !used.has(l)).length;
  }

  private async activeLocation(locationId: string): Promise<LocationRow | null> {
    const location = await this.catalog.getLocationById(locationId);
    if (!location) {
      logger.warn(`allocator: location ${locationId} not found`);
      return null;
    }
    if (!location.is_active) {
      logger.warn(`allocator: location ${locationId} is inactive`);
      return null;
    }
    return location;
  }
}
