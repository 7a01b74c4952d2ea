import { stringify } from 'csv-stringify/sync';
import type { ComponentList } from '../manifest/manifest-types.js';
import type { OutputFormat } from '../schemas/view-options.schema.js';
import { splitParent } from './parent-split.js';

export interface RenderOptions {
  /** Render a Parent column for types whose members name their parent component. */
  splitParent?: boolean;
}

type Row = string[];

const LINE_END = '\n';
const CELL_PADDING = 1;

const BOX = {
  horizontal: '─',
  vertical: '│',
  top: { left: '┌', junction: '┬', right: '┐' },
  middle: { left: '├', junction: '┼', right: '┤' },
  bottom: { left: '└', junction: '┴', right: '┘' },
} as const;

function toRows(list: ComponentList, options: RenderOptions): { header: Row; rows: Row[] } {
  if (options.splitParent) {
    return {
      header: ['Type', 'Parent', 'Member'],
      rows: list.map((component) => {
        const { parent, member } = splitParent(component);
        return [component.typeName, parent, member];
      }),
    };
  }
  return {
    header: ['Type', 'Member'],
    rows: list.map((component) => [component.typeName, component.memberName]),
  };
}

// Counts code points. East Asian wide characters and emoji occupy two terminal columns,
// so rows holding them render wider than the border.
function displayWidth(value: string): number {
  return [...value].length;
}

// Keeps multi-line values from breaking the grid.
function escapeCell(value: string): string {
  return value.replace(/\r/g, '\\r').replace(/\n/g, '\\n').replace(/\t/g, '\\t');
}

function border(widths: number[], glyphs: { left: string; junction: string; right: string }): string {
  const segments = widths.map((w) => BOX.horizontal.repeat(w + CELL_PADDING * 2));
  return glyphs.left + segments.join(glyphs.junction) + glyphs.right;
}

function tableLine(cells: Row, widths: number[]): string {
  const pad = ' '.repeat(CELL_PADDING);
  const padded = widths.map((w, i) => {
    const cell = cells[i] ?? '';
    return pad + cell + ' '.repeat(w - displayWidth(cell)) + pad;
  });
  return BOX.vertical + padded.join(BOX.vertical) + BOX.vertical;
}

export function renderTable(header: Row, rows: Row[]): string {
  const cells = rows.map((row) => row.map(escapeCell));
  const widths = header.map((title, i) =>
    Math.max(displayWidth(title), ...cells.map((row) => displayWidth(row[i] ?? '')))
  );
  const lines = [border(widths, BOX.top), tableLine(header, widths)];
  if (cells.length > 0) {
    lines.push(border(widths, BOX.middle));
    lines.push(...cells.map((row) => tableLine(row, widths)));
  }
  lines.push(border(widths, BOX.bottom));
  return lines.join(LINE_END) + LINE_END;
}

export function renderCsv(header: Row, rows: Row[]): string {
  return stringify([header, ...rows], { record_delimiter: 'unix', eof: true });
}

/** Fields are written verbatim: a tab or newline inside a value is not escaped. */
export function renderTsv(header: Row, rows: Row[]): string {
  return [header, ...rows].map((row) => row.join('\t') + LINE_END).join('');
}

/**
 * Render components in the order given. Every format ends each line, including the last,
 * with a single `\n`.
 */
export function renderComponents(
  list: ComponentList,
  format: OutputFormat,
  options: RenderOptions = {}
): string {
  const { header, rows } = toRows(list, options);
  switch (format) {
    case 'table':
      return renderTable(header, rows);
    case 'csv':
      return renderCsv(header, rows);
    case 'tsv':
      return renderTsv(header, rows);
  }
}
