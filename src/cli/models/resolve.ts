export type ResolveResult =
  | { kind: "exact" | "substring"; name: string }
  | { kind: "ambiguous"; candidates: string[] }
  | { kind: "none" };

// Case-insensitive exact match first, then a unique substring match.
export function resolveModelName(names: string[], query: string): ResolveResult {
  const needle = query.toLowerCase();

  const exact = names.find((name) => name.toLowerCase() === needle);
  if (exact !== undefined) {
    return { kind: "exact", name: exact };
  }

  const matches = names.filter((name) => name.toLowerCase().includes(needle));
  if (matches.length === 1) {
    return { kind: "substring", name: matches[0] };
  }

  if (matches.length > 1) {
    return { kind: "ambiguous", candidates: matches };
  }

  return { kind: "none" };
}
