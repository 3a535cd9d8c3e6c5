import type { RunEntry } from "../../cli/types.js";

// Match model names by exact, prefix, then contains order.
export function fuzzyMatchServer(entries: RunEntry[], query: string): RunEntry[] {
  const exact = entries.filter((entry) => entry.model === query);
  if (exact.length > 0) {
    return exact;
  }

  const prefix = entries.filter((entry) => entry.model.startsWith(query));
  if (prefix.length > 0) {
    return prefix;
  }

  return entries.filter((entry) => entry.model.includes(query));
}
