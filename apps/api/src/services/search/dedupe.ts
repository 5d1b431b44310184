/**
 * Drop items whose exact title was already seen. The first occurrence wins and
 * the surviving items keep their input order.
 */
export function dedupeByTitle<T extends { title: string }>(items: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const item of items) {
    if (seen.has(item.title)) continue;
    seen.add(item.title);
    unique.push(item);
  }
  return unique;
}
