/**
 * Local file source adapter.
 * Every path is one container named after its file. Delimited text and
 * Excel workbooks are read through xlsx (header row plus the first few
 * data rows); JSON documents are flattened like API responses.
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import * as XLSX from 'xlsx';
import type { ExtractOptions, ISourceAdapter } from './ISourceAdapter.js';
import type { FileSourceSpec, SourceSpec } from '../types/api.js';
import type { RawFieldDescriptor } from '../types/models.js';
import { inferJsonFields } from '../schema/infer.js';
import { looksLikePrimaryKey } from '../naming/heuristics.js';
import {
  SourceMalformedError,
  SourceUnreachableError,
  ValidationError,
  errorMessage,
} from '../errors.js';

type FileFormat = 'delimited' | 'excel' | 'json';

const FORMATS: Record<string, FileFormat> = {
  '.csv': 'delimited',
  '.tsv': 'delimited',
  '.txt': 'delimited',
  '.xlsx': 'excel',
  '.xls': 'excel',
  '.json': 'json',
};

const DELIMITER_CANDIDATES = [',', ';', '\t', '|'];

export class FileSourceAdapter implements ISourceAdapter {
  readonly kind = 'file';
  readonly sourceType = 'file';

  constructor(private readonly sampleRows: number = 5) {}

  sourceId(spec: SourceSpec): string {
    const file = this.narrow(spec);
    return file.sourceId?.trim() || file.paths.join(',');
  }

  async listContainers(spec: SourceSpec): Promise<string[]> {
    return Array.from(containerPaths(this.narrow(spec)).keys());
  }

  async extract(
    spec: SourceSpec,
    container: string,
    options: ExtractOptions
  ): Promise<RawFieldDescriptor[]> {
    const path = containerPaths(this.narrow(spec)).get(container);
    if (!path) {
      throw new SourceMalformedError(`No file for container "${container}"`, { container });
    }

    const format = FORMATS[extname(path).toLowerCase()];
    if (!format) {
      throw new SourceMalformedError(`Unsupported file type: ${extname(path) || path}`, { path });
    }

    let content: Buffer;
    try {
      content = await readFile(path, { signal: options.signal });
    } catch (err) {
      throw new SourceUnreachableError(`Cannot read ${path}: ${errorMessage(err)}`, { path });
    }

    const fields = this.parse(format, content, path);
    return fields.map((field) => ({
      ...field,
      isPrimaryKey: looksLikePrimaryKey(field.name, container),
    }));
  }

  // ── Private ──

  private narrow(spec: SourceSpec): FileSourceSpec {
    if (spec.kind !== 'file') {
      throw new ValidationError(`FileSourceAdapter cannot crawl "${spec.kind}" sources`);
    }
    return spec;
  }

  private parse(format: FileFormat, content: Buffer, path: string): RawFieldDescriptor[] {
    if (format === 'json') {
      try {
        return inferJsonFields(JSON.parse(content.toString('utf8')));
      } catch (err) {
        throw new SourceMalformedError(`Invalid JSON in ${path}: ${errorMessage(err)}`, { path });
      }
    }

    if (content.length === 0) return [];

    let rows: unknown[][];
    try {
      rows = format === 'excel' ? this.readExcel(content) : this.readDelimited(content);
    } catch (err) {
      throw new SourceMalformedError(`Cannot parse ${path}: ${errorMessage(err)}`, { path });
    }

    if (rows.length === 0) return [];
    const [header, ...data] = rows;

    return header.map((cell, index) => ({
      name: cell === null || cell === undefined ? '' : String(cell),
      samples: data.map((row) => row[index] ?? null),
    }));
  }

  private readDelimited(content: Buffer): unknown[][] {
    const text = content.toString('utf8');
    if (text.trim().length === 0) return [];

    // raw: keep cell text; xlsx would otherwise turn dates into serial numbers
    const workbook = XLSX.read(text, {
      type: 'string',
      FS: detectDelimiter(text),
      raw: true,
      sheetRows: this.sampleRows + 1,
    });
    return firstSheetRows(workbook).map((row) => row.map(coerceCell));
  }

  private readExcel(content: Buffer): unknown[][] {
    const workbook = XLSX.read(content, {
      type: 'buffer',
      cellDates: true,
      sheetRows: this.sampleRows + 1,
    });
    return firstSheetRows(workbook);
  }
}

/** Container name → path. Basenames, unless two paths share one. */
function containerPaths(spec: FileSourceSpec): Map<string, string> {
  const counts = new Map<string, number>();
  for (const path of spec.paths) {
    const name = basename(path);
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  const containers = new Map<string, string>();
  for (const path of spec.paths) {
    const name = basename(path);
    containers.set(counts.get(name) === 1 ? name : path, path);
  }
  return containers;
}

function firstSheetRows(workbook: XLSX.WorkBook): unknown[][] {
  const sheetName = workbook.SheetNames[0];
  if (sheetName === undefined) return [];
  const sheet = workbook.Sheets[sheetName];
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
  });
}

/**
 * Pick the delimiter giving the most consistent column count over the
 * first lines.
 */
export function detectDelimiter(text: string): string {
  const lines = text
    .split('\n')
    .slice(0, 20)
    .filter((l) => l.trim().length > 0);
  if (lines.length === 0) return ',';

  let best = ',';
  let bestScore = Infinity;

  for (const delimiter of DELIMITER_CANDIDATES) {
    const counts = lines.map((line) => line.split(delimiter).length);
    const mean = counts.reduce((a, b) => a + b, 0) / counts.length;
    const variance = counts.reduce((sum, c) => sum + (c - mean) ** 2, 0) / counts.length;
    const score = variance / Math.max(1, mean);

    if (mean > 1 && score < bestScore) {
      bestScore = score;
      best = delimiter;
    }
  }

  return best;
}

/** Plain numbers and booleans become typed values. `007` stays text. */
export function coerceCell(cell: unknown): unknown {
  if (typeof cell !== 'string') return cell;

  const text = cell.trim();
  if (text === '') return null;
  if (/^-?(0|[1-9]\d*)$/.test(text)) return Number(text);
  if (/^-?\d*\.\d+(e[+-]?\d+)?$/i.test(text)) return Number(text);
  if (/^(true|false)$/i.test(text)) return text.toLowerCase() === 'true';
  return cell;
}
