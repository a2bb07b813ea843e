import { z } from "zod";
import { parseRfc2822 } from "../../utils/time-parser";

/**
 * Items requested per page. Larger counts make the fan collection API
 * fail, so this matches what the Bandcamp website sends.
 */
export const PAGE_SIZE = 20;

export const RESOURCE_KINDS = ["collection", "wishlist"] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

const rfc2822DateSchema = z.string().transform((value, ctx) => {
  const date = parseRfc2822(value);
  if (!date) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid RFC 2822 date: "${value}"`,
    });
    return z.NEVER;
  }
  return date;
});

/**
 * A single release in a collection or wishlist; usually an album,
 * sometimes a track.
 */
export const catalogItemSchema = z
  .object({
    added: rfc2822DateSchema,
    band_name: z.string(),
    album_id: z.number().int().nonnegative(),
    album_title: z.string(),
  })
  .transform((item) => ({
    added: item.added,
    artistName: item.band_name,
    itemId: item.album_id,
    itemTitle: item.album_title,
  }));

export type CatalogItem = z.output<typeof catalogItemSchema>;

/**
 * One page of collection_items / wishlist_items results
 */
export const pageResponseSchema = z
  .object({
    items: z.array(catalogItemSchema),
    last_token: z.string(),
    more_available: z.boolean(),
  })
  .transform((page) => ({
    items: page.items,
    lastToken: page.last_token,
    moreAvailable: page.more_available,
  }));

export type Page = z.output<typeof pageResponseSchema>;

/**
 * Error payload the API answers with instead of a page
 */
export const apiErrorResponseSchema = z.object({
  error: z.literal(true),
  error_message: z.string(),
});

export interface QueryRequestBody {
  fan_id: number;
  older_than_token: string;
  count: number;
}
