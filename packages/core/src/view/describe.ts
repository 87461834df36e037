/**
 * Schema and sample retrieval for the single view an agent may query.
 *
 * These are trusted, fixed queries, so they go straight to the executor
 * without the query guard.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import { type QueryExecutor, type Row, quoteIdentifier } from '../db/types.js';
import {
  type TruncationFields,
  fittingRowCount,
  serializedLength,
  truncationMessage,
} from '../response/envelope.js';
import { type ViewProfile, describeColumn } from './profile.js';

export type InferredType = 'boolean' | 'integer' | 'numeric' | 'text' | 'unknown';

export interface ColumnInfo {
  name: string;
  name_english: string;
  data_type: InferredType;
  description: string;
}

export interface ViewMetadata {
  total_rows: number;
  date_range: { earliest: string; latest: string };
  restaurant_count: number;
  restaurants: string[];
}

export interface SchemaEnvelope extends TruncationFields {
  success: true;
  view_name: string;
  description: string;
  columns: ColumnInfo[];
  sample_data: Row[];
  metadata: ViewMetadata;
  usage_hints: string[];
}

export interface DescribeOptions {
  sampleRows?: number;
  characterLimit?: number;
}

export function sampleQuery(profile: ViewProfile, sampleRows: number = SAFE_DEFAULTS.sampleRows): string {
  return (
    `SELECT * FROM ${quoteIdentifier(profile.name)} ` +
    `ORDER BY ${quoteIdentifier(profile.dateColumn)} DESC LIMIT ${sampleRows}`
  );
}

export function metadataQuery(profile: ViewProfile): string {
  const date = quoteIdentifier(profile.dateColumn);
  return (
    'SELECT COUNT(*) AS total_rows, ' +
    `MIN(${date}) AS earliest_date, ` +
    `MAX(${date}) AS latest_date, ` +
    `COUNT(DISTINCT ${quoteIdentifier(profile.dimensionIdColumn)}) AS restaurant_count ` +
    `FROM ${quoteIdentifier(profile.name)}`
  );
}

export function dimensionQuery(profile: ViewProfile): string {
  const name = quoteIdentifier(profile.dimensionNameColumn);
  return `SELECT DISTINCT ${name} FROM ${quoteIdentifier(profile.name)} ORDER BY ${name}`;
}

/**
 * Column list, recent samples, aggregate metadata and usage hints for the
 * view. Rejects with whatever the executor rejects with.
 */
export async function describeView(
  executor: QueryExecutor,
  profile: ViewProfile,
  options: DescribeOptions = {},
): Promise<SchemaEnvelope> {
  const characterLimit = options.characterLimit ?? SAFE_DEFAULTS.characterLimit;

  const samples = await executor.execute(sampleQuery(profile, options.sampleRows));
  const columns = inferColumns(profile, samples);

  const [stats] = await executor.execute(metadataQuery(profile));
  const dimensionRows = await executor.execute(dimensionQuery(profile));
  const restaurants = dimensionRows.map((r) => stringValue(r[profile.dimensionNameColumn]));

  const metadata: ViewMetadata = {
    total_rows: countValue(stats?.total_rows),
    date_range: {
      earliest: stringValue(stats?.earliest_date),
      latest: stringValue(stats?.latest_date),
    },
    restaurant_count: countValue(stats?.restaurant_count),
    restaurants,
  };

  const build = (sampleData: Row[], truncated: boolean): SchemaEnvelope => ({
    success: true,
    view_name: profile.name,
    description: profile.description,
    columns,
    sample_data: sampleData,
    metadata,
    usage_hints: profile.usageHints,
    ...(truncated
      ? {
          _truncated: true as const,
          _message: truncationMessage(characterLimit, sampleData.length, samples.length),
        }
      : {}),
  });

  const full = build(samples, false);
  if (serializedLength(full) <= characterLimit) return full;

  const kept = fittingRowCount(samples, (rows) => build(rows, true), characterLimit);
  return build(samples.slice(0, kept), true);
}

/** Columns come from the first sample row; an empty view has none. */
export function inferColumns(profile: ViewProfile, samples: Row[]): ColumnInfo[] {
  const first = samples[0];
  if (!first) return [];

  return Object.keys(first).map((name) => {
    const note = describeColumn(profile, name);
    return {
      name,
      name_english: note.english,
      data_type: inferType(first[name]),
      description: note.description,
    };
  });
}

export function inferType(value: unknown): InferredType {
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'numeric';
  if (typeof value === 'string') return 'text';
  return 'unknown';
}

// COUNT(*) comes back as a string when the server serializes bigint as text
function countValue(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return 0;
}

function stringValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value);
}
