/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * LEDGER SCHEMAS
 * Zod schemas for the inputs that enter the core from presentation code
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { z } from 'zod';
import { CUSTOMER_RULES, PAYMENT_METHODS } from '../constants/ledger.js';
import { isValidPhoneFormat } from '../utils/phone.js';

// ═══════════════════════════════════════════════════════════════════════════════
// COMMON SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/** Percentage on a 0-100 scale, not a fraction: 25 means a quarter */
export const percentageSchema = z.number().min(0).max(100);

/** Decimal amount as a number or numeric string */
export const amountSchema = z.union([
  z.number().finite(),
  z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'Invalid amount'),
]);

export const PaymentMethodSchema = z.enum(PAYMENT_METHODS);

/** Empty strings become undefined so optional fields stay optional */
const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .optional()
    .transform((value) => (value ? value : undefined));

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOMERS
// ═══════════════════════════════════════════════════════════════════════════════

export const CustomerInputSchema = z.object({
  name: z
    .string()
    .trim()
    .min(CUSTOMER_RULES.NAME_MIN_LENGTH, 'Customer name must be at least 2 characters')
    .max(CUSTOMER_RULES.NAME_MAX_LENGTH, 'Customer name cannot exceed 100 characters'),
  phone: optionalText(CUSTOMER_RULES.PHONE_MAX_LENGTH).refine(
    (phone) => phone === undefined || isValidPhoneFormat(phone),
    'Invalid phone number format'
  ),
  address: optionalText(CUSTOMER_RULES.ADDRESS_MAX_LENGTH),
});

export type CustomerInput = z.input<typeof CustomerInputSchema>;
export type ParsedCustomerInput = z.output<typeof CustomerInputSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// PAYMENTS
// ═══════════════════════════════════════════════════════════════════════════════

/** How a quick payment's amount is chosen */
export const QuickPaymentRequestSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('full') }),
  z.object({ kind: z.literal('amount'), amount: amountSchema }),
  z.object({ kind: z.literal('percentage'), percentage: percentageSchema }),
]);

export type QuickPaymentRequest = z.infer<typeof QuickPaymentRequestSchema>;

export const PaymentInputSchema = z.object({
  customerId: z.string().min(1),
  amount: amountSchema,
  paymentMethod: PaymentMethodSchema.default('CASH'),
  notes: z.string().trim().max(500).optional(),
  invoiceId: z.string().min(1).optional(),
});

export type PaymentInput = z.input<typeof PaymentInputSchema>;
