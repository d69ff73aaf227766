/**
 * Error Explainer for sieve and CLI failures
 *
 * Provides human-readable explanations and concrete fixes for the errors
 * the sieve and its command line can raise
 */

/**
 * Error explanation structure
 */
interface ErrorExplanation {
  name: string;
  description: string;
  causes: string[];
  fixes: string[];
  examples?: string[];
}

/**
 * Map of known errors with explanations and fixes
 */
const ERROR_MAP: Record<string, ErrorExplanation> = {
  NotPopulatedError: {
    name: 'NotPopulatedError',
    description: 'A lookup or filter ran against a sieve whose table has not been filled yet',
    causes: [
      'Sieve was built with Sieve.unfilled() and fill() was never called',
      'fill() is called after the first query instead of before it',
    ],
    fixes: [
      'Call sieve.fill() before querying, then retry the lookup',
      'Build the sieve with Sieve.create() to get a populated instance directly',
    ],
    examples: [
      'Bad: Sieve.unfilled(10).lookup(5)',
      'Good: Sieve.create(10).lookup(5)',
    ],
  },

  OutOfBoundsError: {
    name: 'OutOfBoundsError',
    description: 'The queried value is not an index of the sieve table',
    causes: [
      'Value is greater than the limit the sieve was built with',
      'Value is negative',
      'Value is not an integer',
    ],
    fixes: [
      'Build a sieve whose limit is at least the largest value you query',
      'Validate candidates before passing them to lookup() or filter()',
    ],
    examples: [
      'Bad: Sieve.create(10).lookup(100)',
      'Good: Sieve.create(100).lookup(100)',
    ],
  },

  InvalidLimit: {
    name: 'InvalidLimit',
    description: 'The sieve limit is not a non-negative safe integer',
    causes: [
      'Negative or fractional limit passed to Sieve.create() or Sieve.unfilled()',
      'Limit computed from unvalidated input (NaN, Infinity)',
    ],
    fixes: [
      'Pass a whole number between 0 and Number.MAX_SAFE_INTEGER',
    ],
  },

  AllocationFailure: {
    name: 'AllocationFailure',
    description: 'The sieve table could not be allocated for the requested limit',
    causes: [
      'Limit is larger than the biggest typed array the runtime can allocate',
      'Process ran out of memory while allocating the table',
    ],
    fixes: [
      'Use a smaller limit; the table needs limit + 1 bytes',
      'Raise the memory available to the process',
    ],
  },

  UsageError: {
    name: 'UsageError',
    description: 'The command line did not contain exactly one non-negative integer',
    causes: [
      'No argument was given',
      'More than one argument was given',
      'The argument is negative, fractional, or not a number',
    ],
    fixes: [
      'Run the command with a single whole number, e.g. prime-sieve 97',
    ],
  },
};

/**
 * Error explanation result
 */
export interface ExplainedError {
  matched: boolean;
  errorType: string;
  explanation?: ErrorExplanation;
  originalError: string;
  suggestion: string;
}

/**
 * Extract error name from an error object or message
 */
function extractErrorName(error: Error | string): string {
  if (typeof error !== 'string' && error.name in ERROR_MAP) {
    return error.name;
  }

  const errorStr = typeof error === 'string' ? error : error.message;

  for (const errorName of Object.keys(ERROR_MAP)) {
    if (errorStr.includes(errorName)) {
      return errorName;
    }
  }

  if (errorStr.includes('not populated')) {
    return 'NotPopulatedError';
  }

  if (errorStr.includes("out of this sieve's bounds")) {
    return 'OutOfBoundsError';
  }

  // tiny-invariant drops the message under NODE_ENV=production, and the
  // limit check is the only invariant the sieve asserts.
  if (
    errorStr.includes('limit must be a non-negative integer') ||
    errorStr.startsWith('Invariant failed')
  ) {
    return 'InvalidLimit';
  }

  if (
    errorStr.includes('Invalid typed array length') ||
    errorStr.includes('Array buffer allocation failed')
  ) {
    return 'AllocationFailure';
  }

  return 'Unknown';
}

/**
 * Explain an error with actionable suggestions
 *
 * @example
 * ```typescript
 * try {
 *   sieve.lookup(value);
 * } catch (error) {
 *   const explained = explainError(error instanceof Error ? error : String(error));
 *   if (explained.matched) {
 *     logger.info(explained.suggestion);
 *   }
 * }
 * ```
 */
export function explainError(error: Error | string): ExplainedError {
  const errorStr = typeof error === 'string' ? error : error.message;
  const errorName = extractErrorName(error);

  const explanation = ERROR_MAP[errorName];

  if (explanation) {
    return {
      matched: true,
      errorType: errorName,
      explanation,
      originalError: errorStr,
      suggestion: formatSuggestion(explanation),
    };
  }

  return {
    matched: false,
    errorType: 'Unknown',
    originalError: errorStr,
    suggestion: 'Unknown error. Check error message for details.',
  };
}

/**
 * Format explanation into a concise suggestion string
 */
function formatSuggestion(explanation: ErrorExplanation): string {
  const primaryFix = explanation.fixes[0];
  const additionalFixes =
    explanation.fixes.length > 1
      ? ` (${explanation.fixes.length - 1} more solutions available)`
      : '';
  return `${explanation.description}\n\nQuick fix: ${primaryFix}${additionalFixes}`;
}

/**
 * Get a formatted error report
 */
export function getErrorReport(error: Error | string): string {
  const explained = explainError(error);
  const exp = explained.explanation;

  if (!explained.matched || !exp) {
    return `Error: ${explained.originalError}\n\nNo specific explanation available for this error.`;
  }

  let report = `ERROR: ${exp.name}\n\n`;
  report += `${exp.description}\n\n`;

  report += `POSSIBLE CAUSES:\n`;
  exp.causes.forEach((cause, idx) => {
    report += `  ${idx + 1}. ${cause}\n`;
  });

  report += `\nSUGGESTED FIXES:\n`;
  exp.fixes.forEach((fix, idx) => {
    report += `  ${idx + 1}. ${fix}\n`;
  });

  if (exp.examples && exp.examples.length > 0) {
    report += `\nEXAMPLES:\n`;
    exp.examples.forEach((example) => {
      report += `  ${example}\n`;
    });
  }

  report += `\nORIGINAL ERROR:\n${explained.originalError}\n`;

  return report;
}
