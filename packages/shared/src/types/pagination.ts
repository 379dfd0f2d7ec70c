export interface CursorPage<T> {
  items: T[];
  cursor: string | null;
  hasMore: boolean;
}
