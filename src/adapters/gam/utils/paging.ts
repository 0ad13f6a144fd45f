import type { GamPage, PqlQuery } from "../types.js";

/** Page through a statement until GAM returns a short page. */
export async function fetchAllPages<T>(
  fetchPage: (query: PqlQuery) => Promise<GamPage<T>>,
  query: PqlQuery,
  pageSize: number
): Promise<T[]> {
  const all: T[] = [];
  let offset = query.offset ?? 0;

  while (true) {
    const page = await fetchPage({ ...query, limit: pageSize, offset });
    const results = page.results ?? [];
    all.push(...results);

    if (results.length < pageSize) {
      break;
    }
    offset += pageSize;
  }

  return all;
}

/** Honour an explicit limit with a single page, otherwise fetch everything. */
export async function fetchPageOrAll<T>(
  fetchPage: (query: PqlQuery) => Promise<GamPage<T>>,
  query: PqlQuery,
  pageSize: number
): Promise<T[]> {
  if (query.limit !== undefined) {
    const page = await fetchPage(query);
    return page.results ?? [];
  }
  return fetchAllPages(fetchPage, query, pageSize);
}
