/**
 * What the schema tool knows about a view beyond what the rows show.
 */

export interface ColumnNote {
  /** English alias for the column */
  english: string;
  description: string;
}

export interface ViewProfile {
  /** View name, optionally schema-qualified */
  name: string;
  description: string;
  /** Column used to order samples and compute the date range */
  dateColumn: string;
  /** Column counted for the distinct-dimension metadata */
  dimensionIdColumn: string;
  /** Column listed for the distinct-dimension metadata */
  dimensionNameColumn: string;
  columns: Record<string, ColumnNote>;
  usageHints: string[];
}

/** Fallback description for columns the profile does not list */
export const UNKNOWN_COLUMN_DESCRIPTION = '列数据';

export function describeColumn(profile: ViewProfile, column: string): ColumnNote {
  return profile.columns[column] ?? { english: column, description: UNKNOWN_COLUMN_DESCRIPTION };
}
