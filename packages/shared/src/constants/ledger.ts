/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * LEDGER CONSTANTS
 * Actor tags, payment methods and business rules shared by every ledger flow
 * ═══════════════════════════════════════════════════════════════════════════════
 */

// ═══════════════════════════════════════════════════════════════════════════════
// AUDIT ACTOR TAGS
// ═══════════════════════════════════════════════════════════════════════════════

/** Labels attached to each committed change-set */
export const ACTOR_TAGS = {
  POS_USER: 'POS_USER',
  INVOICE_UPDATE: 'INVOICE_UPDATE',
  PAYMENT_ONLY: 'PAYMENT_ONLY',
  QUICK_PAYMENT: 'QUICK_PAYMENT',
  BULK_DEBT_SETTLEMENT: 'BULK_DEBT_SETTLEMENT',
  BULK_PAYMENTS: 'BULK_PAYMENTS',
  BALANCE_RECALCULATION: 'BALANCE_RECALCULATION',
} as const;

export type ActorTag = (typeof ACTOR_TAGS)[keyof typeof ACTOR_TAGS];

// ═══════════════════════════════════════════════════════════════════════════════
// PAYMENTS
// ═══════════════════════════════════════════════════════════════════════════════

export const PAYMENT_METHODS = ['CASH', 'CHECK', 'TRANSFER'] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const PAYMENT_NOTES = {
  WITH_INVOICE: 'Payment with invoice',
  OVERPAYMENT_SUFFIX: ' (includes overpayment)',
  PARTIAL_SUFFIX: ' (partial payment)',
  QUICK: 'Quick payment',
  FULL_SETTLEMENT: 'Full debt settlement',
  PARTIAL_SETTLEMENT: 'Partial debt payment',
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// BUSINESS RULES
// ═══════════════════════════════════════════════════════════════════════════════

export const LEDGER_RULES = {
  /** Largest drift between two amounts still considered equal */
  BALANCE_TOLERANCE: '0.01',
  /** Decimal places every persisted amount is rounded to */
  AMOUNT_DECIMALS: 2,
  /** Digits of the per-day invoice sequence (yyyyMMdd0001) */
  INVOICE_SEQUENCE_DIGITS: 4,
  /** Prefix of the placeholder number a draft carries until commit */
  DRAFT_NUMBER_PREFIX: 'DRAFT-',
  /** Customers taken by a bulk partial payment, highest debt first */
  BULK_PARTIAL_LIMIT: 10,
  DEFAULT_BULK_FRACTION: 0.25,
  /** Quick payments are clamped to this multiple of the outstanding debt */
  QUICK_PAYMENT_MAX_DEBT_MULTIPLIER: 2,
} as const;

export const CUSTOMER_RULES = {
  NAME_MIN_LENGTH: 2,
  NAME_MAX_LENGTH: 100,
  PHONE_MAX_LENGTH: 20,
  PHONE_MIN_DIGITS: 7,
  PHONE_MAX_DIGITS: 15,
  ADDRESS_MAX_LENGTH: 200,
} as const;

export const VALIDATION_TIMING = {
  DEBOUNCE_MS: 750,
  SETTLE_TIMEOUT_MS: 5000,
  CONNECTIVITY_TIMEOUT_MS: 5000,
} as const;
