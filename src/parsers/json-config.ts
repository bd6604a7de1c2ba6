import {
  applyEdits,
  modify,
  parse as parseJsonc,
  printParseErrorCode,
  type FormattingOptions,
  type ParseError,
} from "jsonc-parser";
import type { ConfigChange, ServerEntry, StructuredConfigMethod } from "../core/types.js";
import { ConfigParseError } from "../core/errors.js";
import { readTextIfExists, writeTextAtomic } from "../utils/fs.js";

type JsonObject = Record<string, unknown>;

const FORMATTING: FormattingOptions = {
  tabSize: 2,
  insertSpaces: true,
  eol: "\n",
};

/**
 * Parse a structured config file. Comments are tolerated (several clients
 * write JSONC); anything else the parser flags, or a non-object root, fails.
 */
export function parseStructuredConfig(text: string, path: string): JsonObject {
  if (text.trim().length === 0) return {};

  const errors: ParseError[] = [];
  const parsed: unknown = parseJsonc(text, errors, {
    allowTrailingComma: false,
    disallowComments: false,
  });

  if (errors.length > 0) {
    const first = errors[0];
    throw new ConfigParseError(
      `Failed to parse JSON in ${path}: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
      path
    );
  }
  if (!isJsonObject(parsed)) {
    throw new ConfigParseError(
      `Failed to parse JSON in ${path}: expected an object at the top level`,
      path
    );
  }
  return parsed;
}

/**
 * Insert or replace `key` under the method's servers key. Missing files are
 * created (with their directories); a non-object at the servers key is
 * replaced with an empty object first.
 */
export async function enableInStructured(
  method: StructuredConfigMethod,
  key: string,
  entry: ServerEntry
): Promise<ConfigChange> {
  const existing = await readTextIfExists(method.path);
  const warnings: string[] = [];
  let text = existing ?? "";

  if (existing !== undefined) {
    const doc = parseStructuredConfig(existing, method.path);
    const servers = doc[method.serversKey];
    if (servers !== undefined && !isJsonObject(servers)) {
      warnings.push(
        `"${method.serversKey}" in ${method.path} was not an object and has been replaced`
      );
      text = edit(text, [method.serversKey], {});
    }
  }

  text = edit(text, [method.serversKey, key], entry);
  await writeTextAtomic(method.path, withFinalNewline(text));

  return { path: method.path, changed: true, preservedFormatting: true, warnings };
}

/** Remove `key` from the servers collection. Absent file or key writes nothing. */
export async function disableInStructured(
  method: StructuredConfigMethod,
  key: string
): Promise<ConfigChange> {
  const unchanged: ConfigChange = {
    path: method.path,
    changed: false,
    preservedFormatting: true,
    warnings: [],
  };

  const existing = await readTextIfExists(method.path);
  if (existing === undefined) return unchanged;

  const doc = parseStructuredConfig(existing, method.path);
  if (!hasServerKey(doc, method.serversKey, key)) return unchanged;

  const text = edit(existing, [method.serversKey, key], undefined);
  await writeTextAtomic(method.path, withFinalNewline(text));

  return { ...unchanged, changed: true };
}

export async function isEnabledInStructured(
  method: StructuredConfigMethod,
  key: string
): Promise<boolean> {
  const existing = await readTextIfExists(method.path);
  if (existing === undefined) return false;

  const doc = parseStructuredConfig(existing, method.path);
  return hasServerKey(doc, method.serversKey, key);
}

function hasServerKey(doc: JsonObject, serversKey: string, key: string): boolean {
  const servers = doc[serversKey];
  return isJsonObject(servers) && Object.hasOwn(servers, key);
}

function edit(text: string, path: string[], value: unknown): string {
  const edits = modify(text, path, value, { formattingOptions: FORMATTING });
  return applyEdits(text, edits);
}

function withFinalNewline(text: string): string {
  return text.endsWith("\n") ? text : text + "\n";
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
