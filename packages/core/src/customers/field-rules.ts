/**
 * Structural checks for customer form fields; no store access
 */
import { CUSTOMER_RULES, isValidPhoneFormat } from '@weighbill/shared';

export const CUSTOMER_FIELDS = ['name', 'phone', 'address'] as const;
export type CustomerField = (typeof CUSTOMER_FIELDS)[number];

export const FIELD_MESSAGES = {
  NAME_REQUIRED: 'Customer name is required',
  NAME_TOO_SHORT: `Customer name must be at least ${CUSTOMER_RULES.NAME_MIN_LENGTH} characters`,
  NAME_TOO_LONG: `Customer name cannot exceed ${CUSTOMER_RULES.NAME_MAX_LENGTH} characters`,
  NAME_TAKEN: 'A customer with this name already exists',
  PHONE_TOO_LONG: `Phone number cannot exceed ${CUSTOMER_RULES.PHONE_MAX_LENGTH} characters`,
  PHONE_INVALID: 'Invalid phone number format',
  PHONE_TAKEN: 'This phone number is already registered',
  ADDRESS_TOO_LONG: `Address cannot exceed ${CUSTOMER_RULES.ADDRESS_MAX_LENGTH} characters`,
} as const;

export function checkName(value: string): string[] {
  const name = value.trim();
  if (!name) return [FIELD_MESSAGES.NAME_REQUIRED];
  if (name.length < CUSTOMER_RULES.NAME_MIN_LENGTH) return [FIELD_MESSAGES.NAME_TOO_SHORT];
  if (name.length > CUSTOMER_RULES.NAME_MAX_LENGTH) return [FIELD_MESSAGES.NAME_TOO_LONG];
  return [];
}

/** Phone is optional; an empty value passes */
export function checkPhone(value: string): string[] {
  const phone = value.trim();
  if (!phone) return [];
  if (phone.length > CUSTOMER_RULES.PHONE_MAX_LENGTH) return [FIELD_MESSAGES.PHONE_TOO_LONG];
  if (!isValidPhoneFormat(phone)) return [FIELD_MESSAGES.PHONE_INVALID];
  return [];
}

export function checkAddress(value: string): string[] {
  return value.trim().length > CUSTOMER_RULES.ADDRESS_MAX_LENGTH
    ? [FIELD_MESSAGES.ADDRESS_TOO_LONG]
    : [];
}

export function checkField(field: CustomerField, value: string): string[] {
  switch (field) {
    case 'name':
      return checkName(value);
    case 'phone':
      return checkPhone(value);
    case 'address':
      return checkAddress(value);
  }
}
