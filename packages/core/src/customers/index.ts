export {
  CustomerValidationPipeline,
  databaseChecks,
  validationOptionsFromEnv,
  DATABASE_CHECKS_WARNING,
} from './validation-pipeline.js';
export type {
  FieldStatus,
  FieldState,
  CustomerValidationState,
  ValidationEvents,
  ValidationPipelineOptions,
  CustomerLookup,
} from './validation-pipeline.js';
export {
  CUSTOMER_FIELDS,
  FIELD_MESSAGES,
  checkName,
  checkPhone,
  checkAddress,
  checkField,
} from './field-rules.js';
export type { CustomerField } from './field-rules.js';
export { TypedEventEmitter } from './validation-events.js';
export { CustomerService } from './customer.service.js';
export type { CustomerSaveResult, CustomerRemovalResult } from './customer.service.js';
