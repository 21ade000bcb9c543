import type { Page } from "./types.js";

/**
 * Follows continuation tokens until a page comes back without one and returns
 * the concatenated items in page order.
 */
export async function collectPages<T>(
  fetchPage: (page?: string) => Promise<Page<T>>,
): Promise<T[]> {
  const items: T[] = [];
  let page: string | undefined;
  do {
    const response = await fetchPage(page);
    items.push(...response.items);
    page = response.nextPage;
  } while (page);
  return items;
}
