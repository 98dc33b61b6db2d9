/**
 * One record of the remote dataset. `embedding` is filled in place once the
 * external embedding run has succeeded for every row.
 */
export interface DatasetRow {
  id: string;
  text: string;
  title?: string;
  embedding?: number[];
}
