// =============================================================================
// Text splitting — Size-bounded chunks that prefer natural boundaries
// =============================================================================

import type { ChunkingConfig } from "../config/pipeline-config.js";
import type { Table } from "../domain/page-stream.schema.js";

export interface TextChunk {
  text: string;
  /** Inclusive offset into the source text */
  start: number;
  /** Exclusive offset into the source text */
  end: number;
}

/**
 * Split `text` into chunks of at most `chunkSize` characters. Each cut is
 * placed after the highest-priority separator found in the window, as long
 * as the piece before it is at least `minChunkSize` long; otherwise the
 * window is cut hard. Chunks never overlap, and `text.slice(start, end)`
 * always equals the chunk text (leading/trailing whitespace is excluded
 * from the span, whitespace-only pieces are dropped).
 */
export function splitText(text: string, options: ChunkingConfig): TextChunk[] {
  const chunks: TextChunk[] = [];
  const { chunkSize } = options;
  let pos = 0;

  while (pos < text.length) {
    const end = text.length - pos <= chunkSize ? text.length : findCut(text, pos, options);
    const chunk = trimmedSpan(text, pos, end);
    if (chunk) chunks.push(chunk);
    pos = end;
  }

  return chunks;
}

function findCut(text: string, pos: number, options: ChunkingConfig): number {
  const window = text.slice(pos, pos + options.chunkSize);
  for (const separator of options.separators) {
    const idx = window.lastIndexOf(separator);
    const cut = idx + separator.length;
    if (idx >= 0 && cut >= Math.max(1, options.minChunkSize)) return pos + cut;
  }
  // Never split a surrogate pair
  const hard = pos + options.chunkSize;
  return hard - 1 > pos && isHighSurrogate(text.charCodeAt(hard - 1)) ? hard - 1 : hard;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function trimmedSpan(text: string, start: number, end: number): TextChunk | null {
  let s = start;
  let e = end;
  while (s < e && /\s/.test(text[s])) s++;
  while (e > s && /\s/.test(text[e - 1])) e--;
  if (e <= s) return null;
  return { text: text.slice(s, e), start: s, end: e };
}

// =============================================================================
// Tables
// =============================================================================

function cleanCell(cell: string | null): string {
  if (cell === null) return "";
  return cell
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .join(" ");
}

/**
 * Render a table as a Markdown pipe table. Empty and single-row tables carry
 * no header/body relation and yield `null`.
 */
export function renderTableMarkdown(table: Table): string | null {
  if (table.length < 2) return null;

  const columns = table[0].length;
  if (columns === 0) return null;

  const rows = table.map((row) => {
    const cells = row.slice(0, columns).map(cleanCell);
    while (cells.length < columns) cells.push("");
    return cells;
  });

  const widths = Array.from({ length: columns }, (_, col) =>
    Math.max(3, ...rows.map((row) => row[col].length)),
  );

  const line = (cells: string[]) => "|" + cells.map((c, i) => c.padEnd(widths[i])).join("|") + "|";
  const separator = "|" + widths.map((w) => "-".repeat(w)).join("|") + "|";

  return [line(rows[0]), separator, ...rows.slice(1).map(line)].join("\n");
}
