/**
 * Log line markers and error categories
 *
 * Categories are tried in order; the first matching pattern wins.
 * Node messages are recognised alongside the ModuleNotFoundError / AttributeError
 * family that other runtimes write.
 */

export const ERROR_CATEGORIES = [
  'import_errors',
  'api_errors',
  'attribute_errors',
  'type_errors',
  'value_errors',
  'key_errors',
  'ssl_errors',
  'database_errors'
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number] | 'unknown';

export const CATEGORY_PATTERNS: ReadonlyArray<{ category: ErrorCategory; patterns: RegExp[] }> = [
  {
    category: 'import_errors',
    patterns: [/ModuleNotFoundError/i, /ImportError/i, /No module named/i, /Cannot find module/i, /ERR_MODULE_NOT_FOUND/i]
  },
  {
    category: 'api_errors',
    patterns: [/API.*error/i, /HTTP.*error/i, /Connection.*error/i, /Timeout/i, /ETIMEDOUT|ECONNREFUSED|ECONNRESET/, /\b(401|403|404|500)\b/]
  },
  {
    category: 'attribute_errors',
    patterns: [/AttributeError/i, /has no attribute/i, /Cannot read propert(y|ies) of (undefined|null)/i]
  },
  {
    category: 'type_errors',
    patterns: [/TypeError/i, /unsupported operand/i, /is not a function/i]
  },
  {
    category: 'value_errors',
    patterns: [/ValueError/i, /RangeError/i, /invalid.*value/i]
  },
  {
    category: 'key_errors',
    patterns: [/KeyError/i, /key.*not found/i]
  },
  {
    category: 'ssl_errors',
    patterns: [/SSL/i, /certificate/i, /CERTIFICATE_VERIFY_FAILED/i, /UNABLE_TO_VERIFY_LEAF_SIGNATURE/i]
  },
  {
    category: 'database_errors',
    patterns: [/Database/i, /SQL/i, /db.*error/i]
  }
];

/** Case-sensitive */
export const ERROR_MARKERS = ['ERROR', 'Exception', 'Traceback', 'Failed', 'Error'];

/** Matched against the upper-cased line */
export const WARNING_MARKERS = ['WARNING', 'WARN'];

export const FALLBACK_RECOMMENDATIONS: ReadonlyArray<[ErrorCategory, string]> = [
  ['import_errors', 'Check the dependency manifest for missing packages'],
  ['api_errors', 'Verify API key validity and network connectivity'],
  ['attribute_errors', 'Review code for missing method/attribute implementations'],
  ['ssl_errors', 'Check SSL certificate configuration and proxy settings']
];

export const NO_ERRORS_RECOMMENDATION = 'No errors found in the analyzed period.';
