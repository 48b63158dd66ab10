import { EncodingError, type HttpMethod } from '@batchsink/resilient-http-core';
import { urlEncode } from './charset';
import { valueToString, type StructuredRecord } from './record';

export const PLACEHOLDER_PATTERN = /#(\w+)/g;

export type MissingPlaceholderPolicy = 'keep' | 'empty' | 'fail';

export interface PlaceholderBinding {
  fieldName: string;
  /** Offset of the `#` in the template. */
  start: number;
  /** Offset just past the field name. */
  end: number;
}

export function findPlaceholders(template: string): PlaceholderBinding[] {
  return Array.from(template.matchAll(PLACEHOLDER_PATTERN), (match) => ({
    fieldName: match[1],
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));
}

/** URL placeholders only apply to requests that address a single resource. */
export function usesUrlPlaceholders(method: HttpMethod): boolean {
  return method === 'PUT' || method === 'DELETE';
}

export interface PlaceholderResolverOptions {
  method: HttpMethod;
  charset: string;
  missing?: MissingPlaceholderPolicy;
}

/**
 * Substitutes `#field` tokens of a URL template with URL-encoded record values.
 * Bindings are computed once; every call works on a fresh copy of the template.
 */
export class PlaceholderResolver {
  readonly bindings: readonly PlaceholderBinding[];
  private readonly charset: string;
  private readonly missing: MissingPlaceholderPolicy;

  constructor(
    readonly template: string,
    options: PlaceholderResolverOptions,
  ) {
    this.bindings = usesUrlPlaceholders(options.method) ? Object.freeze(findPlaceholders(template)) : [];
    this.charset = options.charset;
    this.missing = options.missing ?? 'keep';
  }

  get hasPlaceholders(): boolean {
    return this.bindings.length > 0;
  }

  resolve(record: StructuredRecord): string {
    let url = this.template;
    // Right to left, so earlier offsets stay valid after each replacement.
    for (let i = this.bindings.length - 1; i >= 0; i -= 1) {
      const binding = this.bindings[i];
      const value = record.get(binding.fieldName);
      let replacement: string;
      if (value === null) {
        if (this.missing === 'keep') continue;
        if (this.missing === 'fail') {
          throw new EncodingError(`No value for URL placeholder '#${binding.fieldName}'.`);
        }
        replacement = '';
      } else {
        replacement = urlEncode(valueToString(value), this.charset);
      }
      url = url.slice(0, binding.start) + replacement + url.slice(binding.end);
    }
    return url;
  }
}
