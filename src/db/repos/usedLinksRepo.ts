import type { Queryable, UsedLinksRepo } from "../types.js";

export function createUsedLinksRepo(db: Queryable): UsedLinksRepo {
  return {
    async getUsedLinks(locationId: string): Promise<string[]> {
      const q = await db.query<{ link: string }>("SELECT link FROM used_links WHERE location_id = $1", [locationId]);
      return q.rows.map((r) => r.link);
    },

    async insertIfAbsent(args): Promise<boolean> {
      const q = await db.query<{ link: string }>(
        `
        INSERT INTO used_links (location_id, link)
        VALUES ($1,$2)
        ON CONFLICT (location_id, link) DO NOTHING
        RETURNING link
        `,
        [args.locationId, args.link]
      );
      return q.rows.length === 1;
    }
  };
}
