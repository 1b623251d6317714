/** Split a comma-delimited tag string, dropping blanks and repeats. */
export function parseTags(tags: string): string[] {
  const seen = new Set<string>();
  for (const raw of tags.split(',')) {
    const tag = raw.trim();
    if (tag) seen.add(tag);
  }
  return [...seen];
}
