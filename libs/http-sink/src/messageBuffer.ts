import { ConfigurationError } from '@batchsink/resilient-http-core';
import { urlEncode } from './charset';
import { findPlaceholders } from './placeholders';
import { fieldNames, valueToString, type RecordSchema, type RecordValue, type StructuredRecord } from './record';

export type MessageFormat = 'json' | 'csv' | 'tsv' | 'form' | 'custom';

export const MESSAGE_FORMATS: readonly MessageFormat[] = ['json', 'csv', 'tsv', 'form', 'custom'];

const CONTENT_TYPES: Record<MessageFormat, string> = {
  json: 'application/json',
  csv: 'text/csv',
  tsv: 'text/tab-separated-values',
  form: 'application/x-www-form-urlencoded',
  custom: 'text/plain',
};

export interface MessageBufferOptions {
  format: MessageFormat;
  schema: RecordSchema;
  /** Joins per-record messages. Default `\n`. */
  delimiter?: string;
  /** Default true. */
  writeJsonAsArray?: boolean;
  jsonBatchKey?: string;
  /** Used by the `form` format. Default UTF-8. */
  charset?: string;
  /** Required by the `custom` format. */
  bodyTemplate?: string;
}

/**
 * Pending records of one batch and the request body they render to.
 */
export class MessageBuffer {
  private readonly records: StructuredRecord[] = [];
  private rendered: string | null = null;
  private readonly fields: string[];
  private readonly delimiter: string;
  private readonly charset: string;

  constructor(private readonly options: MessageBufferOptions) {
    this.fields = fieldNames(options.schema);
    this.delimiter = options.delimiter ?? '\n';
    this.charset = options.charset ?? 'UTF-8';

    if (options.format === 'custom') {
      if (options.bodyTemplate === undefined) {
        throw new ConfigurationError('For Custom message format, message cannot be null.', 'messageFormat');
      }
      const unknown = findPlaceholders(options.bodyTemplate)
        .map((binding) => binding.fieldName)
        .filter((name) => !this.fields.includes(name));
      if (unknown.length > 0) {
        throw new ConfigurationError(
          `Message body references fields missing from the schema: ${[...new Set(unknown)].join(', ')}.`,
          'body',
        );
      }
    }
  }

  add(record: StructuredRecord): void {
    this.records.push(record);
    this.rendered = null;
  }

  size(): number {
    return this.records.length;
  }

  isEmpty(): boolean {
    return this.records.length === 0;
  }

  lastRecord(): StructuredRecord | undefined {
    return this.records[this.records.length - 1];
  }

  clear(): void {
    this.records.length = 0;
    this.rendered = null;
  }

  getContentType(): string {
    return CONTENT_TYPES[this.options.format];
  }

  /** The rendered body, or null when the buffer is empty. */
  getMessage(): string | null {
    if (this.isEmpty()) return null;
    if (this.rendered === null) {
      this.rendered = this.render();
    }
    return this.rendered;
  }

  private render(): string {
    switch (this.options.format) {
      case 'json':
        return this.renderJson();
      case 'csv':
        return this.records.map((record) => this.delimitedLine(record, ',')).join(this.delimiter);
      case 'tsv':
        return this.records.map((record) => this.delimitedLine(record, '\t')).join(this.delimiter);
      case 'form':
        return this.records.map((record) => this.formLine(record)).join(this.delimiter);
      case 'custom':
        return this.records.map((record) => this.customMessage(record)).join(this.delimiter);
    }
  }

  private renderJson(): string {
    const documents = this.records.map((record) => this.toJsonObject(record));
    const { jsonBatchKey, writeJsonAsArray = true } = this.options;
    if (jsonBatchKey) {
      return JSON.stringify({ [jsonBatchKey]: documents });
    }
    if (writeJsonAsArray) {
      return JSON.stringify(documents);
    }
    return documents.map((doc) => JSON.stringify(doc)).join(this.delimiter);
  }

  private toJsonObject(record: StructuredRecord): Record<string, RecordValue> {
    const doc: Record<string, RecordValue> = {};
    for (const name of this.fields) {
      doc[name] = record.get(name);
    }
    return doc;
  }

  private delimitedLine(record: StructuredRecord, separator: string): string {
    return this.fields.map((name) => quoteDelimited(valueToString(record.get(name)), separator)).join(separator);
  }

  private formLine(record: StructuredRecord): string {
    return this.fields
      .map((name) => `${urlEncode(name, this.charset)}=${urlEncode(valueToString(record.get(name)), this.charset)}`)
      .join('&');
  }

  private customMessage(record: StructuredRecord): string {
    const template = this.options.bodyTemplate ?? '';
    return template.replace(/#(\w+)/g, (_token, name: string) => valueToString(record.get(name)));
  }
}

function quoteDelimited(value: string, separator: string): string {
  if (value.includes(separator) || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}
