export type FieldType = 'string' | 'int' | 'long' | 'float' | 'double' | 'boolean' | 'bytes' | 'record' | 'array' | 'map';

export interface SchemaField {
  name: string;
  type?: FieldType;
  nullable?: boolean;
}

export interface RecordSchema {
  name?: string;
  fields: readonly SchemaField[];
}

export type RecordValue =
  | string
  | number
  | boolean
  | null
  | readonly RecordValue[]
  | { readonly [key: string]: RecordValue };

/**
 * A structured record as the host pipeline hands it over. The sink only reads
 * field values; it never interprets them beyond serialization.
 */
export interface StructuredRecord {
  readonly schema: RecordSchema;
  get(fieldName: string): RecordValue;
}

export function fieldNames(schema: RecordSchema): string[] {
  return schema.fields.map((field) => field.name);
}

/**
 * Map-backed record. Values for names outside the schema are dropped; schema
 * fields without a value read as `null`.
 */
export function createRecord(schema: RecordSchema, values: Readonly<Record<string, RecordValue | undefined>>): StructuredRecord {
  const data = new Map<string, RecordValue>();
  for (const field of schema.fields) {
    const value = values[field.name];
    if (value !== undefined) {
      data.set(field.name, value);
    }
  }
  return {
    schema,
    get: (fieldName) => data.get(fieldName) ?? null,
  };
}

/**
 * Textual form of a field value: strings as-is, scalars via `String`,
 * nested values as JSON, `null` as the empty string.
 */
export function valueToString(value: RecordValue): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}
