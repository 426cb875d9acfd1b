import { CUSTOMER_RULES } from '../constants/ledger.js';

/**
 * Strip the separators people type into phone numbers (spaces, dashes,
 * parentheses) and a single leading "+".
 */
export function normalizePhone(phone: string): string {
  return phone.replace(/[\s\-()]/g, '').replace(/^\+/, '');
}

/**
 * A phone is well-formed when, once normalized, it is only digits and
 * between 7 and 15 of them.
 */
export function isValidPhoneFormat(phone: string): boolean {
  const digits = normalizePhone(phone);
  return (
    /^\d+$/.test(digits) &&
    digits.length >= CUSTOMER_RULES.PHONE_MIN_DIGITS &&
    digits.length <= CUSTOMER_RULES.PHONE_MAX_DIGITS
  );
}
