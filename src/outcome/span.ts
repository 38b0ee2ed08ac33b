/**
 * Source position of a diagnostic. Lines and columns are 1-based; `startCol`
 * is the column the caret points at.
 */
export interface Span {
  file?: string;
  startLine?: number;
  startCol?: number;
  endLine?: number;
  endCol?: number;
}
