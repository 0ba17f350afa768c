/**
 * Paged reads for PostgREST, which cuts every response at its max-rows
 * setting (1000 on Supabase) without reporting that it did.
 */
export const PAGE_SIZE = 1000;

// Ids per `in.(...)` filter; the whole list travels in the request URL
export const IN_FILTER_SIZE = 200;

export interface PageResponse<T> {
  data: T[] | null;
  error: { message: string } | null;
}

export interface AllPages<T> {
  rows: T[];
  error: { message: string } | null;
}

/**
 * Request `[from, to]` ranges until a short page comes back. The query must
 * have a total order (a unique column) for the pages to line up.
 */
export async function fetchAllPages<T>(
  fetchPage: (from: number, to: number) => PromiseLike<PageResponse<T>>,
  pageSize: number = PAGE_SIZE
): Promise<AllPages<T>> {
  const rows: T[] = [];

  for (let from = 0; ; from += pageSize) {
    const { data, error } = await fetchPage(from, from + pageSize - 1);
    if (error) return { rows, error };

    const page = data ?? [];
    rows.push(...page);
    if (page.length < pageSize) return { rows, error: null };
  }
}

export function chunk<T>(items: readonly T[], size: number = IN_FILTER_SIZE): T[][] {
  const chunks: T[][] = [];

  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }

  return chunks;
}
