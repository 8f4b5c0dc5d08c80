/**
 * Keyset pagination for list endpoints.
 *
 * Every list is ordered by an ascending integer key: request id, global
 * position or stream version. A cursor is the base64url form of
 * "<key>:<last value>", so a cursor minted by one list is ignored by
 * another.
 *
 * Responses are { data, pagination: { cursor, hasMore } }.
 */

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
// Page keys
// =============================================================================

export interface PageKey<T> {
  readonly name: string;
  readonly of: (item: T) => number;
}

export const REQUEST_ID_KEY: PageKey<{ readonly id: number }> = {
  name: "id",
  of: (item) => item.id,
};

export const GLOBAL_POSITION_KEY: PageKey<{ readonly globalPosition: number }> = {
  name: "globalPosition",
  of: (item) => item.globalPosition,
};

export const STREAM_VERSION_KEY: PageKey<{ readonly version: number }> = {
  name: "version",
  of: (item) => item.version,
};

// =============================================================================
// Cursors
// =============================================================================

const CURSOR_PATTERN = /^([A-Za-z]+):(\d{1,15})$/;

export function encodeCursor(key: string, value: number): string {
  return Buffer.from(`${key}:${value}`).toString("base64url");
}

/**
 * @returns The key name and last value, or undefined for a malformed cursor.
 */
export function decodeCursor(
  cursor: string,
): { key: string; value: number } | undefined {
  const match = CURSOR_PATTERN.exec(Buffer.from(cursor, "base64url").toString("utf-8"));
  const key = match?.[1];
  const digits = match?.[2];
  if (key === undefined || digits === undefined) return undefined;
  return { key, value: Number(digits) };
}

export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  key: PageKey<T>,
): PaginatedResponse<T> {
  const decoded = query.cursor === undefined ? undefined : decodeCursor(query.cursor);
  const after = decoded?.key === key.name ? decoded.value : undefined;
  const remaining = after === undefined ? items : items.filter((item) => key.of(item) > after);

  const hasMore = remaining.length > query.limit;
  const data = remaining.slice(0, query.limit);
  const last = data.at(-1);

  return {
    data,
    pagination: {
      cursor: hasMore && last !== undefined ? encodeCursor(key.name, key.of(last)) : null,
      hasMore,
    },
  };
}
