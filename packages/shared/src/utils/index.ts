export { normalizePhone, isValidPhoneFormat } from './phone.js';
