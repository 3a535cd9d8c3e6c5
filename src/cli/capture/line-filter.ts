import { MAX_INLINE_ARRAY_ENTRIES } from "../config/capture.js";
import { ARRAY_LINE_PATTERN, CAPTURE_PREFIXES, CAPTURE_SUBSTRINGS } from "../config/patterns.js";

// Whether a server output line is a diagnostic worth keeping.
export function shouldCaptureLine(line: string): boolean {
  if (CAPTURE_PREFIXES.some((prefix) => line.startsWith(prefix))) {
    return true;
  }

  return CAPTURE_SUBSTRINGS.some((needle) => line.includes(needle));
}

// Replace the body of very large array dumps (token lists) with a count.
export function sanitizeLargeArrays(line: string): string {
  const match = line.match(ARRAY_LINE_PATTERN);
  if (!match) {
    return line;
  }

  const [, prefix, key, elementType, count] = match;
  if (parseInt(count, 10) <= MAX_INLINE_ARRAY_ENTRIES) {
    return line;
  }

  return `${prefix}${key} arr[${elementType},${count}] = <omitted, ${count} entries>`;
}
