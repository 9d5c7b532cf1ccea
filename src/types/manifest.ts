/**
 * Manifest type definitions
 */

/**
 * Manifest format, resolved once from the file extension
 */
export type ManifestFormat =
  | { kind: "delimited"; delimiter: string }
  | { kind: "spreadsheet" };

/**
 * Normalized column produced by every manifest reader
 */
export interface ManifestColumn {
  name: string;
  values: string[];
}

export interface Manifest {
  path: string;
  format: ManifestFormat;
  columns: ManifestColumn[];
}
