/**
 * Pricing Error Taxonomy
 *
 * Structured error classification for product resolution, pricing and the
 * catalog writes behind them. Every failure degrades to a visibly empty or
 * zero line the operator can correct; nothing here is fatal to the process.
 */

export type PricingErrorCategory = 'RESOLUTION' | 'CATALOG' | 'STORE' | 'INPUT' | 'UNKNOWN';

export interface PricingErrorSpec {
  code: string;
  category: PricingErrorCategory;
  userMessage: string;
}

export const PRICING_ERRORS = {
  // Resolution outcomes
  UNRESOLVED_PRODUCT: {
    code: 'UNRESOLVED_PRODUCT',
    category: 'RESOLUTION',
    userMessage: 'No product matches this code or name.',
  },
  AMBIGUOUS_UNIT: {
    code: 'AMBIGUOUS_UNIT',
    category: 'RESOLUTION',
    userMessage: 'This unit is not set up for the product; the last known rate was kept.',
  },
  MULTI_HOP_SCHEME_UOM: {
    code: 'MULTI_HOP_SCHEME_UOM',
    category: 'RESOLUTION',
    userMessage: 'Scheme unit chains beyond one switch are not followed.',
  },

  // Catalog writes
  DUPLICATE_BARCODE: {
    code: 'DUPLICATE_BARCODE',
    category: 'CATALOG',
    userMessage: 'This barcode is already used by another product or alias.',
  },
  PRODUCT_NOT_FOUND: {
    code: 'PRODUCT_NOT_FOUND',
    category: 'CATALOG',
    userMessage: 'The product does not exist or has been deleted.',
  },

  // Store / infrastructure
  STORE_UNAVAILABLE: {
    code: 'STORE_UNAVAILABLE',
    category: 'STORE',
    userMessage: 'The catalog database is unavailable. Check the connection and try again.',
  },

  // Caller input
  INVALID_REQUEST: {
    code: 'INVALID_REQUEST',
    category: 'INPUT',
    userMessage: 'The pricing request is incomplete or malformed.',
  },

  // Unknown/unexpected
  UNKNOWN_ERROR: {
    code: 'PRICING_UNKNOWN_ERROR',
    category: 'UNKNOWN',
    userMessage: 'An unexpected error occurred while pricing. Please check logs for details.',
  },
} as const satisfies Record<string, PricingErrorSpec>;

export type PricingErrorCode = keyof typeof PRICING_ERRORS;

export class PricingError extends Error {
  readonly code: PricingErrorCode;
  readonly spec: PricingErrorSpec;

  constructor(code: PricingErrorCode, message?: string, options?: { cause?: unknown }) {
    const spec = PRICING_ERRORS[code];
    super(message ?? spec.userMessage, options);
    this.name = 'PricingError';
    this.code = code;
    this.spec = spec;
  }
}

function readErrorCode(error: unknown): string {
  if (!error || typeof error !== 'object' || !('code' in error)) return '';
  const code = error.code;
  if (typeof code === 'string') return code.toUpperCase();
  if (typeof code === 'number') return String(code);
  return '';
}

/**
 * Classify an error thrown while talking to the catalog store into our taxonomy
 */
export function classifyPricingError(error: unknown): PricingErrorSpec {
  if (error instanceof PricingError) return error.spec;

  const errorMessage = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  const errorCode = readErrorCode(error);

  // Postgres unique_violation on a barcode column
  if (errorCode === '23505' && errorMessage.includes('barcode')) {
    return PRICING_ERRORS.DUPLICATE_BARCODE;
  }

  // Network / connection errors
  if (
    errorCode === 'ECONNREFUSED' ||
    errorCode === 'ECONNRESET' ||
    errorCode === 'ENOTFOUND' ||
    errorCode === 'ETIMEDOUT' ||
    errorCode === '57P01' || // admin_shutdown
    errorCode === '08006' || // connection_failure
    errorMessage.includes('connection terminated') ||
    errorMessage.includes('websocket')
  ) {
    return PRICING_ERRORS.STORE_UNAVAILABLE;
  }

  // Default to unknown
  return PRICING_ERRORS.UNKNOWN_ERROR;
}

/**
 * Create safe log context from error (no secrets)
 */
export function createSafeErrorContext(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { errorMessage: String(error).substring(0, 200) };
  }
  return {
    errorName: error.name,
    errorCode: readErrorCode(error) || undefined,
    errorMessage: error.message.substring(0, 200), // Truncate long messages
    errorType: error.constructor.name,
  };
}
