export function stripQuery(path: string): string {
  const idx = path.search(/[?#]/);
  return idx >= 0 ? path.slice(0, idx) : path;
}

/** Splits a path into its non-empty `/`-separated components. */
export function splitPath(path: string): string[] {
  return stripQuery(path).split('/').filter(Boolean);
}
