import { z } from 'zod/v4';
import type { SqlSession } from '../connection/session.js';
import { tableColumnsQuery } from '../catalog/queries.js';
import type { ColumnDescriptor } from '../catalog/types.js';

const columnRowSchema = z.object({
  name: z.string(),
  typeName: z.string(),
  maxLength: z.number().int(),
  precision: z.number().int(),
  scale: z.number().int(),
  isNullable: z.boolean(),
  isIdentity: z.boolean(),
  isComputed: z.boolean(),
});

const SINGLE_BYTE_CHARACTER_TYPES = new Set(['char', 'varchar']);
const DOUBLE_BYTE_CHARACTER_TYPES = new Set(['nchar', 'nvarchar']);
const EXACT_NUMERIC_TYPES = new Set(['decimal', 'numeric']);

/** `max_length` value the catalog reports for `(MAX)` columns. */
export const MAX_LENGTH_SENTINEL = -1;

/** Column metadata for one table, ordered by column_id. */
export async function fetchColumns(
  session: SqlSession,
  database: string,
  schema: string,
  table: string,
): Promise<ColumnDescriptor[]> {
  const rows = await session.query(tableColumnsQuery(database, schema, table));
  return z.array(columnRowSchema).parse(rows);
}

/**
 * Render a column's type.
 * Character lengths come from the catalog in bytes; n-types store two bytes per character.
 */
export function renderColumnType(column: ColumnDescriptor): string {
  const typeName = column.typeName;
  if (SINGLE_BYTE_CHARACTER_TYPES.has(typeName) || DOUBLE_BYTE_CHARACTER_TYPES.has(typeName)) {
    if (column.maxLength === MAX_LENGTH_SENTINEL) {
      return `${typeName}(MAX)`;
    }
    const length = DOUBLE_BYTE_CHARACTER_TYPES.has(typeName)
      ? column.maxLength / 2
      : column.maxLength;
    return `${typeName}(${String(length)})`;
  }
  if (EXACT_NUMERIC_TYPES.has(typeName)) {
    return `${typeName}(${String(column.precision)},${String(column.scale)})`;
  }
  return typeName;
}

/**
 * One column line without its trailing separator.
 *
 * Identity always renders as IDENTITY(1,1): seed and increment are not read
 * from the catalog, so a table created with other values loses them here.
 * Computed columns render as their stored type; the expression is not recovered.
 */
export function renderColumn(column: ColumnDescriptor): string {
  const identity = column.isIdentity ? ' IDENTITY(1,1)' : '';
  const nullability = column.isNullable ? 'NULL' : 'NOT NULL';
  return `    [${column.name}] ${renderColumnType(column)}${identity} ${nullability}`;
}

/** Build a CREATE TABLE statement from column metadata. */
export function renderCreateTable(
  schema: string,
  table: string,
  columns: readonly ColumnDescriptor[],
): string {
  const lines = columns.map(renderColumn);
  const body = lines.length > 0 ? `${lines.join(',\n')}\n` : '';
  return `CREATE TABLE [${schema}].[${table}] (\n${body});`;
}

/**
 * Reconstruct a table's structural DDL from the catalog.
 * Rejects when the column query fails; the caller decides how to degrade.
 */
export async function synthesizeTableDdl(
  session: SqlSession,
  database: string,
  schema: string,
  table: string,
): Promise<string> {
  const columns = await fetchColumns(session, database, schema, table);
  return renderCreateTable(schema, table, columns);
}
