import fs from "node:fs";
import path from "node:path";
import type { ManifestFormat } from "../types/config.js";
import type { FieldValue, ManifestDocument } from "../types/manifest.js";
import { ReleaseError, preconditionFailure } from "../core/errors.js";
import { diag, type Diagnostic } from "../report/diagnostics.js";
import { decodeFieldValue, encodeFieldValue, fieldText, locateField, splitFieldPath } from "./locator.js";

const BOM = "\uFEFF";

export type UpdateOutcome = {
  document: ManifestDocument;
  changed: boolean;
  warning?: Diagnostic;
};

/** Infer the manifest format from its extension (.toml → toml, anything else → json). */
export function inferFormat(filePath: string): ManifestFormat {
  return path.extname(filePath).toLowerCase() === ".toml" ? "toml" : "json";
}

/** Wrap manifest text that is already in memory. */
export function parseManifest(filePath: string, text: string, format?: ManifestFormat): ManifestDocument {
  return {
    filePath,
    format: format ?? inferFormat(filePath),
    text,
    hasBom: text.startsWith(BOM)
  };
}

/** Read a manifest from disk. A missing file is a precondition failure. */
export function loadManifest(filePath: string, format?: ManifestFormat): ManifestDocument {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw preconditionFailure(`Manifest not found: ${filePath}`, { path: filePath });
  }
  return parseManifest(filePath, fs.readFileSync(filePath, "utf8"), format);
}

/** Read a scalar field; null when absent or not a scalar. */
export function readField(doc: ManifestDocument, fieldPath: string): FieldValue | null {
  const span = locateField(doc.text, fieldPath, doc.format);
  return span ? decodeFieldValue(span.raw, doc.format) : null;
}

/** Read a field as written, without numeric conversion. Version fields go through here. */
export function readFieldText(doc: ManifestDocument, fieldPath: string): string | null {
  const span = locateField(doc.text, fieldPath, doc.format);
  return span ? fieldText(span.raw) : null;
}

/**
 * Replace the value of an existing field in place. Nothing outside the
 * value's span changes. A missing field leaves the document as it was and
 * comes back as a FIELD_NOT_FOUND warning.
 */
export function updateField(doc: ManifestDocument, fieldPath: string, value: FieldValue): UpdateOutcome {
  const span = locateField(doc.text, fieldPath, doc.format);
  if (!span) {
    return {
      document: doc,
      changed: false,
      warning: diag("warn", "FIELD_NOT_FOUND", `Field '${fieldPath}' not found in ${doc.filePath}; update skipped`, {
        details: { path: doc.filePath, field: fieldPath }
      })
    };
  }

  const encoded = encodeFieldValue(value, span.raw, doc.format);
  if (encoded === span.raw) {
    return { document: doc, changed: false };
  }

  const text = doc.text.slice(0, span.start) + encoded + doc.text.slice(span.end);
  return { document: { ...doc, text }, changed: true };
}

/** Apply several field updates in order, collecting warnings. */
export function updateFields(
  doc: ManifestDocument,
  updates: Array<[fieldPath: string, value: FieldValue]>
): { document: ManifestDocument; changed: string[]; warnings: Diagnostic[] } {
  let current = doc;
  const changed: string[] = [];
  const warnings: Diagnostic[] = [];
  for (const [fieldPath, value] of updates) {
    const res = updateField(current, fieldPath, value);
    current = res.document;
    if (res.changed) changed.push(fieldPath);
    if (res.warning) warnings.push(res.warning);
  }
  return { document: current, changed, warnings };
}

function detectIndent(text: string): string | number {
  const m = /\n([ \t]+)\S/.exec(text);
  if (!m) return 2;
  return m[1].startsWith("\t") ? "\t" : m[1].length;
}

function detectEol(text: string): string {
  return text.includes("\r\n") ? "\r\n" : "\n";
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function addJsonField(doc: ManifestDocument, keys: string[], value: FieldValue): ManifestDocument {
  const body = doc.hasBom ? doc.text.slice(1) : doc.text;
  let root: unknown;
  try {
    root = JSON.parse(body);
  } catch (e) {
    throw new ReleaseError("PreconditionFailure", `Cannot add a field to ${doc.filePath}: not plain JSON`, {
      cause: e,
      details: { path: doc.filePath }
    });
  }
  if (!isPlainObject(root)) {
    throw preconditionFailure(`Cannot add a field to ${doc.filePath}: top level is not an object`);
  }

  let target = root;
  for (const key of keys.slice(0, -1)) {
    const next = target[key];
    if (next === undefined) {
      const created: Record<string, unknown> = {};
      target[key] = created;
      target = created;
    } else if (isPlainObject(next)) {
      target = next;
    } else {
      throw preconditionFailure(`Cannot add '${keys.join(".")}': '${key}' is not an object`);
    }
  }
  target[keys[keys.length - 1]] = value;

  const eol = detectEol(body);
  let text = JSON.stringify(root, null, detectIndent(body));
  if (eol !== "\n") text = text.replace(/\n/g, eol);
  if (/\r?\n$/.test(body)) text += eol;
  return { ...doc, text: (doc.hasBom ? BOM : "") + text };
}

function tomlKey(key: string): string {
  return /^[A-Za-z0-9_-]+$/.test(key) ? key : JSON.stringify(key);
}

type TomlHeader = { index: number; end: number; name: string; array: boolean };

function tomlHeaders(text: string): TomlHeader[] {
  const headerRe = /^[ \t]*(\[\[?)([^[\]\r\n]+)\]\]?[ \t]*(?:#[^\r\n]*)?$/gm;
  const headers: TomlHeader[] = [];
  for (let m = headerRe.exec(text); m; m = headerRe.exec(text)) {
    headers.push({
      index: m.index,
      end: m.index + m[0].length,
      name: m[2].split(".").map((p) => p.trim()).join("."),
      array: m[1] === "[["
    });
  }
  return headers;
}

/** End offset of the last non-blank line in [from, to), or -1. */
function lastContentEnd(text: string, from: number, to: number): number {
  const contentRe = /\S[^\r\n]*/g;
  const section = text.slice(from, to);
  let end = -1;
  for (let m = contentRe.exec(section); m; m = contentRe.exec(section)) {
    end = from + m.index + m[0].length;
  }
  return end;
}

function addTomlField(doc: ManifestDocument, keys: string[], value: FieldValue): ManifestDocument {
  const text = doc.text;
  const eol = detectEol(text);
  const tableKeys = keys.slice(0, -1);
  const line = `${tomlKey(keys[keys.length - 1])} = ${encodeFieldValue(value, "", "toml")}`;
  const headers = tomlHeaders(text);

  if (tableKeys.length === 0) {
    // root keys must precede the first table header
    const sectionEnd = headers.length > 0 ? headers[0].index : text.length;
    const end = lastContentEnd(text, 0, sectionEnd);
    if (end !== -1) return { ...doc, text: `${text.slice(0, end)}${eol}${line}${text.slice(end)}` };
    const head = text.slice(0, sectionEnd);
    const gap = sectionEnd < text.length ? eol : "";
    return { ...doc, text: `${head}${line}${eol}${gap}${text.slice(sectionEnd)}` };
  }

  const name = tableKeys.join(".");
  const header = headers.find((h) => !h.array && h.name === name);
  if (!header) {
    const sep = text.length === 0 || text.endsWith("\n") ? "" : eol;
    const blank = text.length === 0 ? "" : eol;
    return { ...doc, text: `${text}${sep}${blank}[${tableKeys.map(tomlKey).join(".")}]${eol}${line}${eol}` };
  }

  const next = headers.find((h) => h.index > header.index);
  const sectionEnd = next ? next.index : text.length;
  const end = lastContentEnd(text, header.end, sectionEnd);
  const at = end === -1 ? header.end : end;
  return { ...doc, text: `${text.slice(0, at)}${eol}${line}${text.slice(at)}` };
}

/**
 * Create a field that does not exist yet. This is the one operation allowed
 * to introduce new structure; an existing field is updated in place instead.
 */
export function addField(doc: ManifestDocument, fieldPath: string, value: FieldValue): ManifestDocument {
  const keys = splitFieldPath(fieldPath);
  if (keys.length === 0) throw preconditionFailure(`Invalid field path: '${fieldPath}'`);
  if (locateField(doc.text, fieldPath, doc.format)) {
    return updateField(doc, fieldPath, value).document;
  }
  return doc.format === "json" ? addJsonField(doc, keys, value) : addTomlField(doc, keys, value);
}

/** Persist as UTF-8 without a byte-order mark, replacing the whole file. */
export function saveManifest(doc: ManifestDocument): void {
  const text = doc.text.startsWith(BOM) ? doc.text.slice(1) : doc.text;
  fs.writeFileSync(doc.filePath, text, { encoding: "utf8" });
}
