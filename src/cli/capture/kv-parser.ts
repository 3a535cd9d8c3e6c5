import { MAX_INLINE_ARRAY_ENTRIES } from "../config/capture.js";
import { CONTEXT_LENGTH_KEY_PATTERN, KV_LINE_PATTERNS } from "../config/patterns.js";
import type { KvMap, KvValue } from "../types.js";

export const KV_PARSE_WARNING_KEY = "_kv_parse_warning";

const INTEGER_TYPES = new Set(["u8", "i8", "u16", "i16", "u32", "i32", "u64", "i64"]);
const FLOAT_TYPES = new Set(["f32", "f64"]);
const NUMERIC_ARRAY_TYPES = new Set(["i32", "u32", "f32", "i64", "u64", "f64", "i16", "u16", "i8", "u8"]);

function parseNumber(text: string): number | null {
  if (text === "") return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function parseArray(typeTag: string, valueText: string): KvValue | null {
  const header = typeTag.match(/^arr\[([^,\]]+),(\d+)\]$/);
  if (!header) {
    return null;
  }

  const elementType = header[1];
  const count = parseInt(header[2], 10);

  if (valueText.startsWith("<omitted")) {
    return { kind: "omitted", elementType, count, reason: "omitted" };
  }

  // llama.cpp elides long arrays with "..." in its log output.
  if (valueText.includes("...")) {
    return { kind: "omitted", elementType, count, reason: "truncated" };
  }

  if (count > MAX_INLINE_ARRAY_ENTRIES) {
    return { kind: "omitted", elementType, count, reason: "omitted" };
  }

  if (valueText.startsWith("[")) {
    if (elementType === "str") {
      const items = [...valueText.matchAll(/"([^"]*)"/g)].map((match) => match[1]);
      if (items.length > 0) {
        return { kind: "array", elementType, items };
      }
    } else if (NUMERIC_ARRAY_TYPES.has(elementType)) {
      const items = [...valueText.matchAll(/-?\d+(?:\.\d+)?(?:e[-+]?\d+)?/gi)].map((match) => Number(match[0]));
      if (items.length > 0) {
        return { kind: "array", elementType, items };
      }
    }
  }

  return { kind: "omitted", elementType, count, reason: "unparsed", raw: valueText };
}

/**
 * Parse one `llama_model_loader: - kv N: key type = value` line.
 *
 * Returns null for lines that are not kv lines and for numeric values that
 * do not parse.
 */
export function parseKvLine(line: string): { key: string; value: KvValue } | null {
  let match: RegExpMatchArray | null = null;
  for (const pattern of KV_LINE_PATTERNS) {
    match = line.match(pattern);
    if (match) break;
  }
  if (!match) {
    return null;
  }

  const [, key, typeTag] = match;
  const valueText = match[3].trim();

  if (INTEGER_TYPES.has(typeTag) || FLOAT_TYPES.has(typeTag)) {
    const num = parseNumber(valueText);
    return num === null ? null : { key, value: { kind: "scalar", value: num } };
  }

  if (typeTag === "bool") {
    return { key, value: { kind: "scalar", value: valueText === "true" } };
  }

  if (typeTag === "str") {
    const quoted = valueText.match(/^"(.*)"$/);
    return { key, value: { kind: "scalar", value: quoted ? quoted[1] : valueText } };
  }

  if (typeTag.startsWith("arr[")) {
    const value = parseArray(typeTag, valueText);
    return value ? { key, value } : null;
  }

  return { key, value: { kind: "scalar", value: valueText } };
}

// Build the kv map from captured lines; later lines win on duplicate keys.
export function parseKvLines(lines: string[]): KvMap {
  const kv: KvMap = {};

  for (const line of lines) {
    const parsed = parseKvLine(line);
    if (parsed) {
      kv[parsed.key] = parsed.value;
    }
  }

  // A context-length line that did not make it into kv means the parser missed it.
  for (const line of lines) {
    const match = line.match(CONTEXT_LENGTH_KEY_PATTERN);
    if (match && kv[match[1]] === undefined) {
      kv[KV_PARSE_WARNING_KEY] = {
        kind: "scalar",
        value: `missing ${match[1]} despite being in captured_lines`,
      };
      break;
    }
  }

  return kv;
}

export function scalarNumber(value: KvValue | undefined): number | null {
  return value?.kind === "scalar" && typeof value.value === "number" ? value.value : null;
}

export function scalarString(value: KvValue | undefined): string | null {
  return value?.kind === "scalar" && typeof value.value === "string" ? value.value : null;
}
