/** Kinds of schema objects the extractor materializes. */
export type ObjectKind = 'table' | 'view' | 'procedure';

/** Processing order within a database. */
export const OBJECT_KINDS: readonly ObjectKind[] = ['table', 'view', 'procedure'];

/** Folder label for each kind in the output tree and the report. */
export const KIND_FOLDERS = {
  table: 'tables',
  view: 'views',
  procedure: 'stored_procedures',
} as const satisfies Record<ObjectKind, string>;

export type KindFolder = (typeof KIND_FOLDERS)[ObjectKind];

/** Singular label for each kind in log lines and placeholders. */
export const KIND_LABELS: Record<ObjectKind, string> = {
  table: 'table',
  view: 'view',
  procedure: 'stored procedure',
};

/** A schema object discovered in the catalog. */
export interface ObjectRef {
  readonly schema: string;
  readonly name: string;
  readonly kind: ObjectKind;
}

/** Schema-qualified name, e.g. `dbo.Orders`. */
export function fullName(ref: Pick<ObjectRef, 'schema' | 'name'>): string {
  return `${ref.schema}.${ref.name}`;
}

/** Column metadata used to rebuild a table definition. */
export interface ColumnDescriptor {
  readonly name: string;
  readonly typeName: string;
  /** Bytes; -1 for MAX. */
  readonly maxLength: number;
  readonly precision: number;
  readonly scale: number;
  readonly isNullable: boolean;
  readonly isIdentity: boolean;
  readonly isComputed: boolean;
}

/** Where a definition came from. */
export type DefinitionSource = 'native' | 'synthesized' | 'unavailable';

/** The textual definition of one object, or a placeholder when none could be obtained. */
export interface DefinitionResult {
  readonly object: ObjectRef;
  readonly text: string;
  readonly source: DefinitionSource;
}
