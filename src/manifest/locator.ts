import type { ManifestFormat } from "../types/config.js";
import type { FieldSpan, FieldValue } from "../types/manifest.js";

/**
 * Field locators: find the text span of a scalar value by dotted path
 * without building an object graph, so the surrounding bytes stay untouched.
 */

export function splitFieldPath(fieldPath: string): string[] {
  return fieldPath
    .split(".")
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export function locateField(text: string, fieldPath: string, format: ManifestFormat): FieldSpan | null {
  const keys = splitFieldPath(fieldPath);
  if (keys.length === 0) return null;
  return format === "json" ? locateJsonField(text, keys, fieldPath) : locateTomlField(text, keys, fieldPath);
}

// --- JSON (comments tolerated) ---

class JsonScanError extends Error {}

function skipJsonTrivia(text: string, i: number): number {
  while (i < text.length) {
    const ch = text[i];
    if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r" || ch === "\uFEFF") {
      i++;
    } else if (ch === "/" && text[i + 1] === "/") {
      const nl = text.indexOf("\n", i);
      i = nl === -1 ? text.length : nl + 1;
    } else if (ch === "/" && text[i + 1] === "*") {
      const close = text.indexOf("*/", i + 2);
      if (close === -1) throw new JsonScanError("Unterminated block comment");
      i = close + 2;
    } else {
      break;
    }
  }
  return i;
}

/** Returns the index just past the closing quote. */
function skipJsonString(text: string, i: number): number {
  let j = i + 1;
  while (j < text.length) {
    const ch = text[j];
    if (ch === "\\") {
      j += 2;
      continue;
    }
    if (ch === '"') return j + 1;
    j++;
  }
  throw new JsonScanError("Unterminated string");
}

function skipJsonValue(text: string, i: number, onMember?: MemberVisitor, depth = 0): number {
  const ch = text[i];
  if (ch === '"') return skipJsonString(text, i);
  if (ch === "{") return scanJsonObject(text, i, onMember, depth);
  if (ch === "[") {
    let j = skipJsonTrivia(text, i + 1);
    if (text[j] === "]") return j + 1;
    for (;;) {
      j = skipJsonValue(text, j);
      j = skipJsonTrivia(text, j);
      if (text[j] === ",") {
        j = skipJsonTrivia(text, j + 1);
        // trailing comma (JSONC)
        if (text[j] === "]") return j + 1;
        continue;
      }
      if (text[j] === "]") return j + 1;
      throw new JsonScanError(`Unexpected '${text[j] ?? "EOF"}' in array`);
    }
  }
  let j = i;
  while (j < text.length && !/[\s,}\]/]/.test(text[j])) j++;
  if (j === i) throw new JsonScanError(`Unexpected '${ch ?? "EOF"}'`);
  return j;
}

type MemberVisitor = (key: string, depth: number, valueStart: number, valueEnd: number) => boolean;

/**
 * Walk an object's members. The visitor returns true to descend into an
 * object value at the next depth.
 */
function scanJsonObject(text: string, i: number, onMember: MemberVisitor | undefined, depth: number): number {
  let j = skipJsonTrivia(text, i + 1);
  if (text[j] === "}") return j + 1;
  for (;;) {
    if (text[j] !== '"') throw new JsonScanError(`Expected key at offset ${j}`);
    const keyEnd = skipJsonString(text, j);
    const key = String(JSON.parse(text.slice(j, keyEnd)));
    j = skipJsonTrivia(text, keyEnd);
    if (text[j] !== ":") throw new JsonScanError(`Expected ':' at offset ${j}`);
    const valueStart = skipJsonTrivia(text, j + 1);
    const descend = onMember !== undefined && text[valueStart] === "{" && onMember(key, depth, valueStart, -1);
    const valueEnd = descend
      ? skipJsonValue(text, valueStart, onMember, depth + 1)
      : skipJsonValue(text, valueStart);
    if (!descend) onMember?.(key, depth, valueStart, valueEnd);
    j = skipJsonTrivia(text, valueEnd);
    if (text[j] === ",") {
      j = skipJsonTrivia(text, j + 1);
      if (text[j] === "}") return j + 1;
      continue;
    }
    if (text[j] === "}") return j + 1;
    throw new JsonScanError(`Unexpected '${text[j] ?? "EOF"}' in object`);
  }
}

function isJsonScalar(raw: string): boolean {
  return raw.length > 0 && raw[0] !== "{" && raw[0] !== "[";
}

function locateJsonField(text: string, keys: string[], fieldPath: string): FieldSpan | null {
  const start = skipJsonTrivia(text, 0);
  if (text[start] !== "{") return null;

  let found: FieldSpan | null = null;

  // Only objects on the path are descended into, so a key matching at
  // `depth` always has every ancestor on the path as well.
  const visitor: MemberVisitor = (key, depth, valueStart, valueEnd) => {
    const onPath = key === keys[depth];
    if (valueEnd === -1) {
      return onPath && depth < keys.length - 1;
    }
    if (onPath && depth === keys.length - 1) {
      const raw = text.slice(valueStart, valueEnd);
      // duplicate keys: the last one wins, as with JSON.parse
      found = isJsonScalar(raw) ? { path: fieldPath, start: valueStart, end: valueEnd, raw } : null;
    }
    return false;
  };

  try {
    scanJsonObject(text, start, visitor, 0);
  } catch (e) {
    if (e instanceof JsonScanError) return null;
    throw e;
  }
  return found;
}

// --- TOML ---

type TomlLine = { start: number; text: string };

function splitLines(text: string): TomlLine[] {
  const lines: TomlLine[] = [];
  let start = 0;
  while (start <= text.length) {
    const nl = text.indexOf("\n", start);
    const end = nl === -1 ? text.length : nl;
    lines.push({ start, text: text.slice(start, end).replace(/\r$/, "") });
    if (nl === -1) break;
    start = nl + 1;
  }
  return lines;
}

function unquoteTomlKey(part: string): string {
  const p = part.trim();
  if (p.length >= 2 && ((p.startsWith('"') && p.endsWith('"')) || (p.startsWith("'") && p.endsWith("'")))) {
    return p.startsWith('"') ? String(JSON.parse(p)) : p.slice(1, -1);
  }
  return p;
}

/** Split a dotted TOML key, honouring quoted segments. */
function splitTomlKey(key: string): string[] {
  const parts: string[] = [];
  let current = "";
  let quote: string | null = null;
  for (const ch of key) {
    if (quote) {
      current += ch;
      if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === ".") {
      parts.push(unquoteTomlKey(current));
      current = "";
    } else {
      current += ch;
    }
  }
  parts.push(unquoteTomlKey(current));
  return parts;
}

/** Offset of the first '=' outside quotes, or -1. */
function findTomlEquals(line: string): number {
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (ch === "\\" && quote === '"') i++;
      else if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "#") {
      return -1;
    } else if (ch === "=") {
      return i;
    }
  }
  return -1;
}

/** End offset (exclusive) of a scalar TOML value starting at `i`, or null for non-scalars. */
function tomlScalarEnd(text: string, i: number): number | null {
  const ch = text[i];
  if (text.startsWith('"""', i) || text.startsWith("'''", i) || ch === "[" || ch === "{") return null;
  if (ch === '"') {
    let j = i + 1;
    while (j < text.length && text[j] !== "\n") {
      if (text[j] === "\\") {
        j += 2;
        continue;
      }
      if (text[j] === '"') return j + 1;
      j++;
    }
    return null;
  }
  if (ch === "'") {
    const close = text.indexOf("'", i + 1);
    const nl = text.indexOf("\n", i);
    return close === -1 || (nl !== -1 && close > nl) ? null : close + 1;
  }
  let j = i;
  while (j < text.length && !/[\s#]/.test(text[j])) j++;
  return j === i ? null : j;
}

/** End offset of a multi-line value (multi-line string or array) starting at `i`. */
function tomlBlockEnd(text: string, i: number): number {
  for (const delim of ['"""', "'''"]) {
    if (text.startsWith(delim, i)) {
      const close = text.indexOf(delim, i + 3);
      return close === -1 ? text.length : close + 3;
    }
  }
  let depth = 0;
  let j = i;
  while (j < text.length) {
    const ch = text[j];
    if (ch === '"' || ch === "'") {
      const end = tomlScalarEnd(text, j);
      j = end ?? j + 1;
      continue;
    }
    if (ch === "#") {
      const nl = text.indexOf("\n", j);
      j = nl === -1 ? text.length : nl;
      continue;
    }
    if (ch === "[" || ch === "{") depth++;
    if (ch === "]" || ch === "}") {
      depth--;
      if (depth === 0) return j + 1;
    }
    j++;
  }
  return text.length;
}

function samePath(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((k, i) => k === b[i]);
}

function locateTomlField(text: string, keys: string[], fieldPath: string): FieldSpan | null {
  const lines = splitLines(text);
  let table: string[] = [];
  let skipUntil = -1;

  for (const line of lines) {
    if (line.start < skipUntil) continue;
    const trimmed = line.text.replace(/^[\s\uFEFF]+/, "");
    if (trimmed === "" || trimmed.startsWith("#")) continue;

    if (trimmed.startsWith("[[")) {
      // array-of-tables entries are never addressed by a plain path
      table = ["[["];
      continue;
    }
    if (trimmed.startsWith("[")) {
      const close = trimmed.indexOf("]");
      table = close === -1 ? ["["] : splitTomlKey(trimmed.slice(1, close));
      continue;
    }

    const eq = findTomlEquals(line.text);
    if (eq === -1) continue;
    const fullKey = [...table, ...splitTomlKey(line.text.slice(0, eq))];

    let valueStart = line.start + eq + 1;
    while (text[valueStart] === " " || text[valueStart] === "\t") valueStart++;

    const end = tomlScalarEnd(text, valueStart);
    if (end === null) {
      skipUntil = tomlBlockEnd(text, valueStart);
      continue;
    }
    if (samePath(fullKey, keys)) {
      return { path: fieldPath, start: valueStart, end, raw: text.slice(valueStart, end) };
    }
  }
  return null;
}

// --- value codec ---

function isQuoted(raw: string): boolean {
  return raw.startsWith('"') || raw.startsWith("'");
}

/** A number literal both JSON and TOML accept as written. */
function isBareNumber(s: string): boolean {
  return /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/.test(s);
}

/**
 * Encode a value as a literal of the same kind as the one it replaces:
 * a quoted literal stays quoted, a bare number or bool stays bare.
 */
export function encodeFieldValue(value: FieldValue, previousRaw: string, format: ManifestFormat): string {
  if (previousRaw !== "" && !isQuoted(previousRaw) && typeof value === "string" && isBareNumber(value)) {
    return value;
  }
  if (typeof value === "string" || isQuoted(previousRaw)) {
    const s = String(value);
    if (format === "toml" && previousRaw.startsWith("'") && !/['\r\n]/.test(s)) {
      return `'${s}'`;
    }
    return JSON.stringify(s);
  }
  return String(value);
}

export function decodeFieldValue(raw: string, format: ManifestFormat): FieldValue | null {
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (raw === "null" && format === "json") return null;
  if (raw.startsWith('"')) return String(JSON.parse(raw));
  if (raw.startsWith("'")) return raw.slice(1, -1);
  const n = Number(format === "toml" ? raw.replace(/_/g, "") : raw);
  return Number.isFinite(n) ? n : raw;
}

/**
 * The literal's text: the unquoted content of a string, the raw token
 * otherwise. `1.20` reads as "1.20", not as the number 1.2.
 */
export function fieldText(raw: string): string {
  if (raw.startsWith('"')) return String(JSON.parse(raw));
  if (raw.startsWith("'")) return raw.slice(1, -1);
  return raw;
}
