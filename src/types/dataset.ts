/**
 * Tabular dataset shapes shared by the data loader and plot modules.
 */

/** A single cell. Missing values (empty or "NA") are null. */
export type CellValue = string | null;

export type DataRow = Readonly<Record<string, CellValue>>;

export interface Dataset {
  /** Column names in file order */
  readonly columns: readonly string[];
  readonly rows: readonly DataRow[];
}
