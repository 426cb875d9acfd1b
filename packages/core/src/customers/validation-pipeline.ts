/**
 * Customer Validation Pipeline
 *
 * Per-field state machine: idle → pending → validating → valid | invalid.
 * Every edit bumps the field's generation and restarts its debounce timer;
 * a result is applied only while its generation is still current, so a
 * slow lookup can never overwrite newer input. The state value has one
 * writer (this class) and is broadcast to listeners after every change.
 */
import type { Customer } from '@weighbill/shared';
import { VALIDATION_TIMING } from '@weighbill/shared';
import { getCoreEnv, type CoreEnv } from '../config/env.js';
import { operationLogger } from '../observability/logger.js';
import type { CustomerStore } from '../stores/types.js';
import { withTimeout } from '../utils/timeout.js';
import {
  CUSTOMER_FIELDS,
  FIELD_MESSAGES,
  checkAddress,
  checkField,
  checkName,
  checkPhone,
  type CustomerField,
} from './field-rules.js';
import { TypedEventEmitter } from './validation-events.js';

export type FieldStatus = 'idle' | 'pending' | 'validating' | 'valid' | 'invalid';

export interface FieldState {
  value: string;
  status: FieldStatus;
  errors: string[];
  generation: number;
}

export interface CustomerValidationState {
  fields: Readonly<Record<CustomerField, FieldState>>;
  editingCustomerId: string | null;
  /** Every field error, duplicates removed */
  errorMessages: string[];
  hasValidationErrors: boolean;
  isValidating: boolean;
  isSaving: boolean;
  isLoading: boolean;
  databaseChecksEnabled: boolean;
  warning: string | null;
  canSave: boolean;
}

export type ValidationEvents = {
  change: CustomerValidationState;
  warning: string;
};

export interface ValidationPipelineOptions {
  debounceMs: number;
  settleTimeoutMs: number;
  lookupTimeoutMs: number;
  /** false starts the pipeline with uniqueness lookups switched off */
  databaseChecks: boolean;
}

export type CustomerLookup = Pick<CustomerStore, 'getByName' | 'getByPhone' | 'countActive'>;

export const DATABASE_CHECKS_WARNING =
  'Database checks are unavailable; duplicate names and phones cannot be detected';

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE CHECK SWITCH
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Once the store has failed, uniqueness lookups stay off for the rest of
 * the process.
 */
class DatabaseCheckSwitch {
  private disabledReason: string | null = null;

  isEnabled(): boolean {
    return this.disabledReason === null;
  }

  disable(reason: string): void {
    this.disabledReason ??= reason;
  }

  /** Tests and explicit reconnects only */
  reset(): void {
    this.disabledReason = null;
  }
}

export const databaseChecks = new DatabaseCheckSwitch();

export function validationOptionsFromEnv(env: CoreEnv = getCoreEnv()): ValidationPipelineOptions {
  return {
    debounceMs: env.CUSTOMER_VALIDATION_DEBOUNCE_MS,
    settleTimeoutMs: env.CUSTOMER_VALIDATION_SETTLE_TIMEOUT_MS,
    lookupTimeoutMs: VALIDATION_TIMING.CONNECTIVITY_TIMEOUT_MS,
    databaseChecks: env.CUSTOMER_DATABASE_CHECKS,
  };
}

const DEBOUNCED_FIELDS: ReadonlySet<CustomerField> = new Set<CustomerField>(['name', 'phone']);

function initialField(value = ''): FieldState {
  return { value, status: 'idle', errors: [], generation: 0 };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE
// ═══════════════════════════════════════════════════════════════════════════════

export class CustomerValidationPipeline {
  readonly events = new TypedEventEmitter<ValidationEvents>();

  private options: ValidationPipelineOptions;
  private timers = new Map<CustomerField, ReturnType<typeof setTimeout>>();
  private state: CustomerValidationState;

  constructor(
    private customers: CustomerLookup,
    options: Partial<ValidationPipelineOptions> = {}
  ) {
    this.options = { ...validationOptionsFromEnv(), ...options };
    if (!this.options.databaseChecks) {
      databaseChecks.disable('disabled by configuration');
    }
    this.state = this.derive({
      fields: { name: initialField(), phone: initialField(), address: initialField() },
      editingCustomerId: null,
      isSaving: false,
      isLoading: false,
      warning: null,
    });
  }

  getState(): CustomerValidationState {
    return this.state;
  }

  onChange(listener: (state: CustomerValidationState) => void): () => void {
    return this.events.on('change', listener);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // INPUT
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Record an edit. Name and phone validate after the debounce interval;
   * address is checked on the spot.
   */
  setField(field: CustomerField, value: string): void {
    this.clearTimer(field);
    const generation = this.nextGeneration(field);

    if (!DEBOUNCED_FIELDS.has(field)) {
      this.writeField(field, this.settled(value, generation, checkField(field, value)));
      return;
    }

    this.writeField(field, { value, status: 'pending', errors: [], generation });
    this.timers.set(
      field,
      setTimeout(() => {
        this.timers.delete(field);
        void this.validate(field, generation);
      }, this.options.debounceMs)
    );
  }

  setSaving(isSaving: boolean): void {
    this.write({ isSaving });
  }

  setLoading(isLoading: boolean): void {
    this.write({ isLoading });
  }

  /** Populate the form from an existing customer; it is excluded from uniqueness */
  loadForEdit(customer: Customer): void {
    this.cancelAll();
    const phone = customer.phone ?? '';
    const address = customer.address ?? '';
    this.write({
      fields: {
        name: this.settled(customer.name, this.nextGeneration('name'), checkName(customer.name)),
        phone: this.settled(phone, this.nextGeneration('phone'), checkPhone(phone)),
        address: this.settled(address, this.nextGeneration('address'), checkAddress(address)),
      },
      editingCustomerId: customer.id,
    });
  }

  reset(): void {
    this.cancelAll();
    this.write({
      fields: {
        name: { ...initialField(), generation: this.nextGeneration('name') },
        phone: { ...initialField(), generation: this.nextGeneration('phone') },
        address: { ...initialField(), generation: this.nextGeneration('address') },
      },
      editingCustomerId: null,
      isSaving: false,
      warning: null,
    });
  }

  dispose(): void {
    this.cancelAll();
  }

  /** Trimmed form values ready for the customer service */
  values(): { name: string; phone: string; address: string } {
    const { fields } = this.state;
    return {
      name: fields.name.value.trim(),
      phone: fields.phone.value.trim(),
      address: fields.address.value.trim(),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // SUBMIT & CONNECTIVITY
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Wait (bounded) for debounced work to settle, then re-run every field
   * check in sequence and return the save gate.
   */
  async validateForSubmit(): Promise<boolean> {
    const settled = await this.waitForSettle();
    if (!settled) {
      operationLogger().warn(
        { timeoutMs: this.options.settleTimeoutMs },
        'Customer validation did not settle before submit; re-validating'
      );
    }

    for (const field of CUSTOMER_FIELDS) {
      this.clearTimer(field);
      const generation = this.nextGeneration(field);
      this.writeField(field, {
        ...this.state.fields[field],
        status: 'validating',
        errors: [],
        generation,
      });
      await this.validate(field, generation);
    }

    return this.state.canSave;
  }

  /**
   * Startup probe. A store that cannot answer in time switches database
   * checks off for the session.
   */
  async probeConnectivity(): Promise<boolean> {
    if (!databaseChecks.isEnabled()) {
      this.write({ warning: DATABASE_CHECKS_WARNING });
      return false;
    }

    this.setLoading(true);
    try {
      await withTimeout(
        this.customers.countActive(),
        this.options.lookupTimeoutMs,
        'Customer store connectivity probe'
      );
      return true;
    } catch (error) {
      this.degrade(error);
      return false;
    } finally {
      this.setLoading(false);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // VALIDATION
  // ═══════════════════════════════════════════════════════════════════════════════

  private async validate(field: CustomerField, generation: number): Promise<void> {
    if (!this.isCurrent(field, generation)) return;

    const { value } = this.state.fields[field];
    const structural = checkField(field, value);
    if (structural.length > 0 || !DEBOUNCED_FIELDS.has(field) || !value.trim()) {
      this.finish(field, generation, structural);
      return;
    }
    if (!databaseChecks.isEnabled()) {
      this.finish(field, generation, []);
      return;
    }

    this.writeField(field, { ...this.state.fields[field], status: 'validating' });

    try {
      const taken = await withTimeout(
        this.lookupDuplicate(field, value.trim()),
        this.options.lookupTimeoutMs,
        `Customer ${field} uniqueness lookup`
      );
      this.finish(field, generation, taken ? [this.duplicateMessage(field)] : []);
    } catch (error) {
      // A superseded lookup's failure is dropped like its result
      if (!this.isCurrent(field, generation)) return;
      this.degrade(error);
      this.finish(field, generation, []);
    }
  }

  private async lookupDuplicate(field: CustomerField, value: string): Promise<boolean> {
    const excludeId = this.state.editingCustomerId ?? undefined;
    const match =
      field === 'name'
        ? await this.customers.getByName(value, excludeId)
        : await this.customers.getByPhone(value, excludeId);
    return match !== null;
  }

  private duplicateMessage(field: CustomerField): string {
    return field === 'name' ? FIELD_MESSAGES.NAME_TAKEN : FIELD_MESSAGES.PHONE_TAKEN;
  }

  /** Superseded results are dropped without a trace */
  private finish(field: CustomerField, generation: number, errors: string[]): void {
    if (!this.isCurrent(field, generation)) return;
    this.writeField(field, this.settled(this.state.fields[field].value, generation, errors));
  }

  private degrade(error: unknown): void {
    const wasEnabled = databaseChecks.isEnabled();
    databaseChecks.disable(error instanceof Error ? error.message : String(error));
    if (wasEnabled) {
      operationLogger().warn({ err: error }, 'Customer store unreachable; database checks disabled');
    }
    this.write({ warning: DATABASE_CHECKS_WARNING });
    this.events.emit('warning', DATABASE_CHECKS_WARNING);
  }

  private nextGeneration(field: CustomerField): number {
    return this.state.fields[field].generation + 1;
  }

  private isCurrent(field: CustomerField, generation: number): boolean {
    return this.state.fields[field].generation === generation;
  }

  private settled(value: string, generation: number, errors: string[]): FieldState {
    const unique = [...new Set(errors)];
    return {
      value,
      status: unique.length > 0 ? 'invalid' : 'valid',
      errors: unique,
      generation,
    };
  }

  private waitForSettle(): Promise<boolean> {
    if (!this.state.isValidating) return Promise.resolve(true);

    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        unsubscribe();
        resolve(false);
      }, this.options.settleTimeoutMs);
      const unsubscribe = this.onChange((state) => {
        if (!state.isValidating) {
          clearTimeout(timer);
          unsubscribe();
          resolve(true);
        }
      });
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // STATE
  // ═══════════════════════════════════════════════════════════════════════════════

  private clearTimer(field: CustomerField): void {
    const timer = this.timers.get(field);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.timers.delete(field);
    }
  }

  private cancelAll(): void {
    for (const field of CUSTOMER_FIELDS) {
      this.clearTimer(field);
    }
  }

  private writeField(field: CustomerField, next: FieldState): void {
    this.write({ fields: { ...this.state.fields, [field]: next } });
  }

  private write(
    patch: Partial<
      Pick<
        CustomerValidationState,
        'fields' | 'editingCustomerId' | 'isSaving' | 'isLoading' | 'warning'
      >
    >
  ): void {
    this.state = this.derive({ ...this.state, ...patch });
    this.events.emit('change', this.state);
  }

  /** Recomputes every derived flag; the only place the save gate is decided */
  private derive(
    base: Pick<
      CustomerValidationState,
      'fields' | 'editingCustomerId' | 'isSaving' | 'isLoading' | 'warning'
    >
  ): CustomerValidationState {
    const fields = CUSTOMER_FIELDS.map((field) => base.fields[field]);
    const errorMessages = [...new Set(fields.flatMap((field) => field.errors))];
    const hasValidationErrors = errorMessages.length > 0;
    const isValidating = fields.some(
      (field) => field.status === 'pending' || field.status === 'validating'
    );

    const { name, phone, address } = base.fields;
    const complete =
      checkName(name.value).length === 0 &&
      checkPhone(phone.value).length === 0 &&
      checkAddress(address.value).length === 0;

    return {
      fields: base.fields,
      editingCustomerId: base.editingCustomerId,
      isSaving: base.isSaving,
      isLoading: base.isLoading,
      warning: base.warning,
      errorMessages,
      hasValidationErrors,
      isValidating,
      databaseChecksEnabled: databaseChecks.isEnabled(),
      canSave:
        complete && !hasValidationErrors && !base.isSaving && !isValidating && !base.isLoading,
    };
  }
}
