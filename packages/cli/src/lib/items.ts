import { z } from 'zod';

/**
 * One list from the external source.
 */
export const listItemSchema = z.object({
  /** Account the list belongs to (e.g. `iCloud`, `On My Mac`). */
  account: z.string(),
  name: z.string(),
  /** Source-specific identifier, passed to the open command. */
  id: z.string(),
});

export type ListItem = z.infer<typeof listItemSchema>;

export const listItemsSchema = z.array(listItemSchema);

/**
 * Apply the account allow-list and the user's query.
 *
 * An empty allow-list keeps every account. Every word of the query must occur
 * in the list name (case-insensitive); an empty query keeps everything.
 */
export function filterItems(items: ListItem[], query: string, accounts: readonly string[] = []): ListItem[] {
  const allowed = accounts.length > 0 ? new Set(accounts) : null;
  const words = query.toLowerCase().split(/\s+/).filter(Boolean);

  return items.filter((item) => {
    if (allowed && !allowed.has(item.account)) return false;
    const name = item.name.toLowerCase();
    return words.every((word) => name.includes(word));
  });
}
