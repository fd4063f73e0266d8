// Substring filtering for candidate paths

/**
 * Contains match - text must contain pattern as a substring, ignoring case.
 * An empty pattern matches everything.
 */
export function containsMatch(pattern: string, text: string): boolean {
  if (!pattern) {
    return true;
  }
  return text.toLowerCase().includes(pattern.toLowerCase());
}

/**
 * Paths containing `text` (case-insensitive), in their original order.
 * Empty text returns `paths` itself; the filter text is never split into words.
 */
export function filterPaths(paths: readonly string[], text: string): readonly string[] {
  if (!text) {
    return paths;
  }
  return paths.filter(path => containsMatch(text, path));
}
