import * as TOML from "@iarna/toml";
import type { ConfigChange, TextTableConfigMethod } from "../core/types.js";
import { ConfigConflictError, ConfigParseError, errorMessage } from "../core/errors.js";
import { readTextIfExists, writeTextAtomic } from "../utils/fs.js";
import { canonicalize } from "../utils/canonical.js";

type TomlTable = ReturnType<typeof TOML.parse>;

/** Keys written into a server's table; any others are left as they are */
export interface TableServerEntry {
  command: string;
  args: string[];
}

const SERVERS_TABLE = "mcp_servers";

const HEADER_RE = /^\s*\[(\[?)\s*(.+?)\s*\](\]?)\s*(?:#.*)?$/;
const TRIVIA_RE = /^\s*(?:#.*)?$/;
const BARE_KEY_RE = /^[A-Za-z0-9_-]+/;
const LAUNCH_KEY_RE = /^\s*(?:command|args)\s*=/;

interface TableHeader {
  line: number;
  keys: string[];
}

interface LineRange {
  start: number;
  end: number;
}

export function parseTextTableConfig(text: string, path: string): TomlTable {
  try {
    return TOML.parse(text);
  } catch (err) {
    throw new ConfigParseError(
      `Failed to parse TOML in ${path}: ${errorMessage(err)}`,
      path,
      { cause: err }
    );
  }
}

/**
 * Set `command` and `args` in `[mcp_servers.<id>]`, creating the table when
 * it is missing. Other keys and sub-tables of the server are kept, as is the
 * rest of the file.
 */
export async function enableInTextTable(
  method: TextTableConfigMethod,
  id: string,
  entry: TableServerEntry
): Promise<ConfigChange> {
  const existing = (await readTextIfExists(method.path)) ?? "";
  const doc = parseTextTableConfig(existing, method.path);
  const current = doc[SERVERS_TABLE];
  if (current !== undefined && !isTable(current)) {
    throw new ConfigConflictError(
      `"${SERVERS_TABLE}" in ${method.path} is not a table; refusing to overwrite it`,
      method.path
    );
  }

  const previous = isTable(current) ? current[id] : undefined;
  const expected: TomlTable = {
    ...(isTable(previous) ? previous : {}),
    command: entry.command,
    args: [...entry.args],
  };

  const spliced = upsertServerEntry(existing, id, entry);
  let text = spliced;
  let preservedFormatting = true;
  if (!isExpectedEdit(doc, spliced, id, expected)) {
    ensureServersTable(doc)[id] = expected;
    text = TOML.stringify(doc);
    preservedFormatting = false;
  }

  await writeTextAtomic(method.path, text);
  return {
    path: method.path,
    changed: true,
    preservedFormatting,
    warnings: preservedFormatting
      ? []
      : [`${method.path} was rewritten; comments and layout were not preserved`],
  };
}

/** Delete the server's table(s). Absent file, table or id writes nothing. */
export async function disableInTextTable(
  method: TextTableConfigMethod,
  id: string
): Promise<ConfigChange> {
  const unchanged: ConfigChange = {
    path: method.path,
    changed: false,
    preservedFormatting: true,
    warnings: [],
  };

  const existing = await readTextIfExists(method.path);
  if (existing === undefined) return unchanged;

  const doc = parseTextTableConfig(existing, method.path);
  const servers = doc[SERVERS_TABLE];
  if (!isTable(servers) || !Object.hasOwn(servers, id)) return unchanged;

  const spliced = removeServerBlocks(existing, id);
  if (isExpectedEdit(doc, spliced, id, null)) {
    await writeTextAtomic(method.path, spliced);
    return { ...unchanged, changed: true };
  }

  delete servers[id];
  await writeTextAtomic(method.path, TOML.stringify(doc));
  return {
    ...unchanged,
    changed: true,
    preservedFormatting: false,
    warnings: [`${method.path} was rewritten; comments and layout were not preserved`],
  };
}

export async function isEnabledInTextTable(
  method: TextTableConfigMethod,
  id: string
): Promise<boolean> {
  const existing = await readTextIfExists(method.path);
  if (existing === undefined) return false;

  const servers = parseTextTableConfig(existing, method.path)[SERVERS_TABLE];
  return isTable(servers) && Object.hasOwn(servers, id);
}

export function renderServerBlock(id: string, entry: TableServerEntry): string[] {
  return [
    `[${SERVERS_TABLE}.${tomlKey(id)}]`,
    `command = ${tomlString(entry.command)}`,
    `args = [${entry.args.map(tomlString).join(", ")}]`,
  ];
}

/**
 * Replace the `command` and `args` assignments in the body of
 * `[mcp_servers.<id>]`, in place of the first of them (or right below the
 * header). Without such a header a new table is appended to the document.
 */
export function upsertServerEntry(text: string, id: string, entry: TableServerEntry): string {
  const crlf = text.includes("\r\n");
  const lines = text.split("\n");
  const headers = scanHeaders(lines);
  const n = headers.findIndex(
    (h) => h.keys.length === 2 && h.keys[0] === SERVERS_TABLE && h.keys[1] === id
  );
  if (n === -1) {
    return appendBlock(text, renderServerBlock(id, entry), crlf ? "\r\n" : "\n");
  }

  const header = headers[n];
  const bodyEnd = n + 1 < headers.length ? headers[n + 1].line : lines.length;
  const assignments = launchAssignments(lines, header.line + 1, bodyEnd);
  const at = assignments.length > 0 ? assignments[0].start : header.line + 1;

  for (const range of [...assignments].reverse()) {
    lines.splice(range.start, range.end - range.start);
  }
  const body = renderServerBlock(id, entry).slice(1);
  lines.splice(at, 0, ...body.map((l) => (crlf ? l + "\r" : l)));
  return lines.join("\n");
}

// `command = ...` / `args = ...` lines, multi-line arrays included
function launchAssignments(lines: string[], start: number, end: number): LineRange[] {
  const ranges: LineRange[] = [];
  for (let i = start; i < end; i++) {
    if (!LAUNCH_KEY_RE.test(lines[i])) continue;

    let stop = i + 1;
    let depth = bracketDepth(lines[i]);
    while (depth > 0 && stop < end) {
      depth += bracketDepth(lines[stop]);
      stop++;
    }
    ranges.push({ start: i, end: stop });
    i = stop - 1;
  }
  return ranges;
}

/** Net `[` minus `]` on a line, outside strings and comments. */
function bracketDepth(line: string): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote !== null) {
      if (ch === "\\" && quote === '"') i++;
      else if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "#") {
      break;
    } else if (ch === "[") {
      depth++;
    } else if (ch === "]") {
      depth--;
    }
  }
  return depth;
}

/**
 * Remove every `[mcp_servers.<id>]` / `[mcp_servers.<id>.*]` table from the
 * text. Comment and blank lines directly above the next header stay with
 * that header.
 */
export function removeServerBlocks(text: string, id: string): string {
  const lines = text.split("\n");
  const ranges = serverBlockRanges(lines, scanHeaders(lines), id);
  if (ranges.length === 0) return text;

  for (const range of [...ranges].reverse()) {
    lines.splice(range.start, range.end - range.start);
  }

  const at = ranges[0].start;
  if (at > 0) {
    collapseBlankRun(lines, at - 1);
  } else {
    while (lines.length > 1 && isBlank(lines[0])) lines.shift();
  }
  return lines.join("\n");
}

// Leave at most one blank line where the removal joined two regions
function collapseBlankRun(lines: string[], index: number): void {
  while (index + 1 < lines.length && isBlank(lines[index]) && isBlank(lines[index + 1])) {
    lines.splice(index, 1);
  }
}

function appendBlock(text: string, block: string[], eol: string): string {
  const body = block.join(eol) + eol;
  if (text.trim().length === 0) return body;

  let head = text.endsWith("\n") ? text : text + eol;
  if (!head.endsWith(eol + eol)) head += eol;
  return head + body;
}

function scanHeaders(lines: string[]): TableHeader[] {
  const headers: TableHeader[] = [];
  let openString: string | null = null;

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    if (openString !== null) {
      if (line.includes(openString)) openString = null;
      continue;
    }

    const match = HEADER_RE.exec(line);
    if (match && match[1].length === match[3].length) {
      const keys = splitKeyPath(match[2]);
      if (keys) {
        headers.push({ line: index, keys });
        continue;
      }
    }
    openString = multilineOpener(line);
  }

  return headers;
}

function serverBlockRanges(
  lines: string[],
  headers: TableHeader[],
  id: string
): LineRange[] {
  const ranges: LineRange[] = [];

  headers.forEach((header, n) => {
    if (header.keys.length < 2) return;
    if (header.keys[0] !== SERVERS_TABLE || header.keys[1] !== id) return;

    let end = n + 1 < headers.length ? headers[n + 1].line : lines.length;
    while (end > header.line + 1 && TRIVIA_RE.test(lines[end - 1])) end--;
    ranges.push({ start: header.line, end });
  });

  return ranges;
}

/** Split a dotted table name into keys; null when it isn't a valid key path. */
export function splitKeyPath(raw: string): string[] | null {
  const keys: string[] = [];
  let i = 0;

  for (;;) {
    while (raw[i] === " " || raw[i] === "\t") i++;

    if (raw[i] === '"') {
      let j = i + 1;
      while (j < raw.length && raw[j] !== '"') j += raw[j] === "\\" ? 2 : 1;
      if (j >= raw.length) return null;
      let key: unknown;
      try {
        key = JSON.parse(raw.slice(i, j + 1));
      } catch {
        return null;
      }
      if (typeof key !== "string") return null;
      keys.push(key);
      i = j + 1;
    } else if (raw[i] === "'") {
      const j = raw.indexOf("'", i + 1);
      if (j === -1) return null;
      keys.push(raw.slice(i + 1, j));
      i = j + 1;
    } else {
      const bare = BARE_KEY_RE.exec(raw.slice(i));
      if (!bare) return null;
      keys.push(bare[0]);
      i += bare[0].length;
    }

    while (raw[i] === " " || raw[i] === "\t") i++;
    if (i >= raw.length) return keys;
    if (raw[i] !== ".") return null;
    i++;
  }
}

/**
 * Check that the spliced text parses, holds `expected` (or nothing) for the
 * server and differs from the document read before the edit only there.
 */
function isExpectedEdit(
  before: TomlTable,
  text: string,
  id: string,
  expected: TomlTable | null
): boolean {
  let after: TomlTable;
  try {
    after = TOML.parse(text);
  } catch {
    return false;
  }

  const servers = after[SERVERS_TABLE];
  if (expected === null) {
    if (isTable(servers) && Object.hasOwn(servers, id)) return false;
  } else {
    const written = isTable(servers) ? servers[id] : undefined;
    if (canonicalize(written) !== canonicalize(expected)) return false;
  }

  return canonicalize(withoutServer(before, id)) === canonicalize(withoutServer(after, id));
}

function withoutServer(doc: TomlTable, id: string): TomlTable {
  const servers = doc[SERVERS_TABLE];
  if (!isTable(servers)) return doc;

  const rest: TomlTable = { ...servers };
  delete rest[id];
  const copy: TomlTable = { ...doc };
  if (Object.keys(rest).length === 0) {
    delete copy[SERVERS_TABLE];
  } else {
    copy[SERVERS_TABLE] = rest;
  }
  return copy;
}

function ensureServersTable(doc: TomlTable): TomlTable {
  const current = doc[SERVERS_TABLE];
  if (isTable(current)) return current;
  const created: TomlTable = {};
  doc[SERVERS_TABLE] = created;
  return created;
}

function isTable(value: unknown): value is TomlTable {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function multilineOpener(line: string): string | null {
  for (const delimiter of ['"""', "'''"]) {
    if (line.split(delimiter).length % 2 === 0) return delimiter;
  }
  return null;
}

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

function tomlKey(key: string): string {
  return /^[A-Za-z0-9_-]+$/.test(key) ? key : JSON.stringify(key);
}

function tomlString(value: string): string {
  return JSON.stringify(value);
}
