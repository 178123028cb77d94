/**
 * Returns the 1-indexed `page` of `items`. Pages past the end, and
 * non-positive page numbers or sizes, come back empty.
 */
export const paginate = <T>(items: readonly T[], page: number, pageSize: number): T[] => {
  if (page < 1 || pageSize < 1) {
    return [];
  }
  const start = (page - 1) * pageSize;
  return items.slice(start, start + pageSize);
};
