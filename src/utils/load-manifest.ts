/**
 * Manifest Loader
 * Reads the optional file list (CSV, TSV or XLSX) into normalized columns
 */

import { readFile } from "fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import ExcelJS from "exceljs";
import { ManifestError } from "./errors";
import { fileExists } from "./file-exists";
import type { Manifest, ManifestColumn, ManifestFormat } from "../types";

const FORMATS: Record<string, ManifestFormat> = {
  ".csv": { kind: "delimited", delimiter: "," },
  ".tsv": { kind: "delimited", delimiter: "\t" },
  ".xlsx": { kind: "spreadsheet" },
};

/**
 * Resolve the manifest format from its extension
 * Throws ManifestError for anything other than .csv, .tsv or .xlsx
 */
export function detectManifestFormat(filepath: string): ManifestFormat {
  const extension = path.extname(filepath).toLowerCase();
  const format = FORMATS[extension];

  if (!format) {
    throw new ManifestError(
      `Unsupported manifest format "${extension || path.basename(filepath)}". Please use CSV, TSV or XLSX.`,
      filepath,
    );
  }

  return format;
}

/**
 * Turn header + data rows into columns, dropping blank cells
 * The widest row sets the column count; cells past the header are unnamed columns
 */
function toColumns(rows: string[][]): ManifestColumn[] {
  if (rows.length === 0) return [];

  const [header, ...data] = rows;
  const width = Math.max(...rows.map((row) => row.length));
  const columns: ManifestColumn[] = [];

  for (let index = 0; index < width; index++) {
    const name = (header[index] ?? "").trim();
    const values = data
      .map((row) => (row[index] ?? "").trim())
      .filter((value) => value.length > 0);

    // Unnamed, empty columns are trailing delimiters, not data
    if (name.length === 0 && values.length === 0) continue;

    columns.push({ name, values });
  }

  return columns;
}

async function readDelimited(
  filepath: string,
  delimiter: string,
): Promise<ManifestColumn[]> {
  const content = await readFile(filepath, "utf-8");
  const rows: string[][] = parse(content, {
    delimiter,
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return toColumns(rows);
}

async function readSpreadsheet(filepath: string): Promise<ManifestColumn[]> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filepath);

  const worksheet = workbook.worksheets[0];
  if (!worksheet) return [];

  const rows: string[][] = [];
  worksheet.eachRow((row) => {
    const cells: string[] = [];
    for (let col = 1; col <= worksheet.columnCount; col++) {
      cells.push(row.getCell(col).text.trim());
    }
    rows.push(cells);
  });

  return toColumns(rows);
}

/**
 * Load a manifest file into normalized columns
 */
export async function loadManifest(filepath: string): Promise<Manifest> {
  const format = detectManifestFormat(filepath);

  if (!(await fileExists(filepath))) {
    throw new ManifestError(`Manifest not found: ${filepath}`, filepath);
  }

  let columns: ManifestColumn[];
  try {
    columns =
      format.kind === "delimited"
        ? await readDelimited(filepath, format.delimiter)
        : await readSpreadsheet(filepath);
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new ManifestError(
      `Failed to read manifest ${filepath}: ${details}`,
      filepath,
      { cause: error },
    );
  }

  return { path: filepath, format, columns };
}

/**
 * Return the single column of a manifest
 * Throws ManifestError when the manifest has zero or several columns
 */
export function getManifestColumn(manifest: Manifest): ManifestColumn {
  const [column, ...rest] = manifest.columns;

  if (!column || rest.length > 0) {
    throw new ManifestError(
      `Manifest ${manifest.path} must contain exactly one column of filenames, found ${manifest.columns.length}`,
      manifest.path,
    );
  }

  return column;
}
