import { ConfigurationError } from './errors';
import type { ErrorHandlingRule, RetryAction } from './types';

export const ERROR_HANDLING_PROPERTY = 'httpErrorsHandling';

const ACTIONS: Record<string, RetryAction> = {
  success: { kind: 'success' },
  fail: { kind: 'fail' },
  retry: { kind: 'retry', onExhausted: 'fail' },
  retryandfail: { kind: 'retry', onExhausted: 'fail' },
  retryandsuccess: { kind: 'retry', onExhausted: 'success' },
};

export interface ErrorPolicyEntry {
  pattern: string;
  regex: RegExp;
  action: RetryAction;
}

export type UnmatchedStatusPolicy = (statusCode: number) => RetryAction;

/** 2xx succeeds, 5xx is retried, everything else fails. */
export const defaultUnmatchedStatusPolicy: UnmatchedStatusPolicy = (statusCode) => {
  if (statusCode >= 200 && statusCode < 300) return ACTIONS.success;
  if (statusCode >= 500 && statusCode < 600) return ACTIONS.retry;
  return ACTIONS.fail;
};

export function parseRetryAction(value: string, property = ERROR_HANDLING_PROPERTY): RetryAction {
  const action = ACTIONS[value.trim().toLowerCase()];
  if (!action) {
    throw new ConfigurationError(
      `Unsupported action '${value}'. Allowed values are: 'success', 'fail', 'retry', 'retryAndFail', 'retryAndSuccess'.`,
      property,
    );
  }
  return action;
}

/**
 * Parses the compact `regex:action,regex:action` form. Order is preserved.
 */
export function parseErrorHandlingRules(value: string): ErrorHandlingRule[] {
  const rules: ErrorHandlingRule[] = [];
  if (!value.trim()) return rules;

  for (const mapping of value.split(',')) {
    const separator = mapping.lastIndexOf(':');
    const pattern = separator === -1 ? mapping : mapping.slice(0, separator);
    const action = separator === -1 ? '' : mapping.slice(separator + 1);
    if (!pattern.trim() || !action.trim()) {
      throw new ConfigurationError(`Missing value for key '${pattern.trim()}'.`, ERROR_HANDLING_PROPERTY);
    }
    rules.push({ pattern: pattern.trim(), action: action.trim() });
  }
  return rules;
}

/**
 * Ordered (status regex, action) table. The first entry whose pattern matches
 * the whole 3-digit status code decides; when none matches the fallback policy does.
 */
export class ErrorPolicyTable {
  private readonly entries: readonly ErrorPolicyEntry[];

  constructor(
    rules: readonly ErrorHandlingRule[] = [],
    private readonly unmatched: UnmatchedStatusPolicy = defaultUnmatchedStatusPolicy,
  ) {
    this.entries = Object.freeze(rules.map((rule) => compileRule(rule)));
  }

  static fromString(value: string | undefined, unmatched?: UnmatchedStatusPolicy): ErrorPolicyTable {
    return new ErrorPolicyTable(value ? parseErrorHandlingRules(value) : [], unmatched);
  }

  resolve(statusCode: number): RetryAction {
    const code = String(statusCode).padStart(3, '0');
    for (const entry of this.entries) {
      if (entry.regex.test(code)) {
        return entry.action;
      }
    }
    return this.unmatched(statusCode);
  }

  get size(): number {
    return this.entries.length;
  }
}

/**
 * Unmatched non-2xx statuses all resolve to `action`; 2xx still succeeds.
 */
export function unmatchedStatusPolicy(action: RetryAction): UnmatchedStatusPolicy {
  return (statusCode) => (statusCode >= 200 && statusCode < 300 ? ACTIONS.success : action);
}

function compileRule(rule: ErrorHandlingRule): ErrorPolicyEntry {
  let regex: RegExp;
  try {
    regex = new RegExp(`^(?:${rule.pattern})$`);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Error handling regex '${rule.pattern}' is not valid. ${reason}`,
      ERROR_HANDLING_PROPERTY,
    );
  }
  return { pattern: rule.pattern, regex, action: parseRetryAction(rule.action) };
}
