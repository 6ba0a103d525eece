/**
 * Cursor-based pagination.
 *
 * Cursors are base64url-encoded JSON objects: { f: field, v: value }.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 */

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

interface CursorData {
  readonly f: string;
  readonly v: number;
}

export function encodeCursor(field: string, value: number): string {
  const data: CursorData = { f: field, v: value };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * Decode a cursor for `field`.
 *
 * @returns The last seen value, or undefined if the cursor is invalid or
 *   was issued for another field.
 */
export function decodeCursor(cursor: string, field: string): number | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (
    typeof data === "object" &&
    data !== null &&
    "f" in data &&
    "v" in data &&
    data.f === field &&
    typeof data.v === "number" &&
    Number.isInteger(data.v)
  ) {
    return data.v;
  }
  return undefined;
}

/**
 * Apply cursor-based pagination to items sorted ascending by `getKey`.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getKey: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const after = decodeCursor(query.cursor, fieldName);
    if (after !== undefined) {
      filtered = filtered.filter((item) => getKey(item) > after);
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data[data.length - 1];

  const cursor = hasMore && last !== undefined ? encodeCursor(fieldName, getKey(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
