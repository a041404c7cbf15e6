import ignore from "ignore";

export type SubdirFilter = {
  excludes: (name: string) => boolean;
  patterns: string[];
};

function cleanPattern(pattern: string): string | null {
  const trimmed = pattern.trim();
  if (!trimmed) return null;
  return trimmed.replace(/\\/g, "/");
}

export function normalizeExcludePatterns(patterns: readonly string[]): string[] {
  const out = new Set<string>();
  for (const raw of patterns) {
    const cleaned = cleanPattern(raw);
    if (cleaned) out.add(cleaned);
  }
  return Array.from(out);
}

export function collectExcludeOption(
  value: string,
  previous: string[] = [],
): string[] {
  if (!value) return previous;
  const parts = value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  if (!parts.length) return previous;
  return previous.concat(parts);
}

/**
 * Gitignore-style matching against the base names of the immediate
 * subdirectories of a tree root. Names are tested as directories, so
 * both `build` and `build/` exclude a subdirectory called build.
 */
export function createSubdirFilter(patterns: readonly string[] = []): SubdirFilter {
  const cleaned = normalizeExcludePatterns(patterns);
  if (!cleaned.length) {
    return { excludes: () => false, patterns: [] };
  }
  const ig = ignore().add(cleaned);
  return {
    patterns: cleaned,
    excludes: (name: string) => ig.ignores(`${name}/`),
  };
}
