import { quoteIdentifier } from './identifiers.js';
import type { SqlStatement } from '../connection/session.js';

/** Databases that ship with every instance and are never extracted. */
export const SYSTEM_DATABASES: readonly string[] = ['master', 'model', 'msdb', 'tempdb'];

/** `sys.objects.type` codes. */
export const OBJECT_TYPE_CODES = {
  table: 'U',
  view: 'V',
  procedure: 'P',
} as const;

export function listDatabasesQuery(): SqlStatement {
  const exclusions = SYSTEM_DATABASES.map((_, i) => `@system${String(i)}`).join(', ');
  const params: Record<string, string> = {};
  SYSTEM_DATABASES.forEach((name, i) => {
    params[`system${String(i)}`] = name;
  });
  return {
    // state 0 = ONLINE
    text: `SELECT name FROM sys.databases
WHERE name NOT IN (${exclusions})
AND state = 0
ORDER BY name`,
    params,
  };
}

export function listTablesQuery(database: string): SqlStatement {
  return {
    text: `SELECT TABLE_SCHEMA AS [schema], TABLE_NAME AS [name]
FROM ${quoteIdentifier(database)}.INFORMATION_SCHEMA.TABLES
WHERE TABLE_TYPE = 'BASE TABLE'
ORDER BY TABLE_SCHEMA, TABLE_NAME`,
  };
}

export function listViewsQuery(database: string): SqlStatement {
  return {
    text: `SELECT TABLE_SCHEMA AS [schema], TABLE_NAME AS [name]
FROM ${quoteIdentifier(database)}.INFORMATION_SCHEMA.VIEWS
ORDER BY TABLE_SCHEMA, TABLE_NAME`,
  };
}

export function listProceduresQuery(database: string): SqlStatement {
  return {
    text: `SELECT SPECIFIC_SCHEMA AS [schema], SPECIFIC_NAME AS [name]
FROM ${quoteIdentifier(database)}.INFORMATION_SCHEMA.ROUTINES
WHERE ROUTINE_TYPE = 'PROCEDURE'
ORDER BY SPECIFIC_SCHEMA, SPECIFIC_NAME`,
  };
}

/** Stored module text for one object; tables have no row here unless the server keeps one. */
export function moduleDefinitionQuery(
  database: string,
  schema: string,
  name: string,
  typeCode: (typeof OBJECT_TYPE_CODES)[keyof typeof OBJECT_TYPE_CODES],
): SqlStatement {
  const db = quoteIdentifier(database);
  return {
    text: `SELECT m.definition AS [definition]
FROM ${db}.sys.sql_modules m
JOIN ${db}.sys.objects o ON m.object_id = o.object_id
JOIN ${db}.sys.schemas s ON o.schema_id = s.schema_id
WHERE o.type = @type
AND o.name = @name
AND s.name = @schema`,
    params: { type: typeCode, name, schema },
  };
}

export function tableColumnsQuery(database: string, schema: string, table: string): SqlStatement {
  const db = quoteIdentifier(database);
  return {
    text: `SELECT
    c.name AS [name],
    t.name AS [typeName],
    c.max_length AS [maxLength],
    c.precision AS [precision],
    c.scale AS [scale],
    c.is_nullable AS [isNullable],
    c.is_identity AS [isIdentity],
    c.is_computed AS [isComputed]
FROM ${db}.sys.columns c
JOIN ${db}.sys.types t ON c.user_type_id = t.user_type_id
JOIN ${db}.sys.objects o ON c.object_id = o.object_id
JOIN ${db}.sys.schemas s ON o.schema_id = s.schema_id
WHERE o.type = 'U'
AND o.name = @table
AND s.name = @schema
ORDER BY c.column_id`,
    params: { schema, table },
  };
}
