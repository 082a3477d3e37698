// Import class-validator's email syntax check
import { isEmail } from 'class-validator';
// Import violation shape
import type { FieldViolation } from '../../common/errors/catalog-errors';
// Import validator settings
import type { ValidationSettings } from '../../config/security-config.service';
// Import field class definitions
import type { FieldClass, FormSchema } from './field-classes';
// Import markup stripping
import { stripMarkup } from './html-stripper';

/** Raw input as it arrives from a form or JSON body */
export type RawFieldValue = string | number | null | undefined;

export type RawFields = Readonly<Record<string, RawFieldValue>>;

/**
 * ValidatedField - Outcome for one field; the raw input is not retained
 */
export interface ValidatedField {
  readonly field: string;
  /** Trimmed, markup-free value */
  readonly cleaned: string;
  readonly violations: readonly FieldViolation[];
}

/**
 * FormResult - Outcome for a whole form
 */
export interface FormResult<K extends string> {
  /** Cleaned value of every schema field */
  readonly values: Readonly<Partial<Record<K, string>>>;
  /** Every violation of every field, in schema order */
  readonly violations: readonly FieldViolation[];
}

const UNSAFE_PATTERNS: readonly RegExp[] = [/<script/i, /javascript:/i, /data:/i];
const EVENT_HANDLER_PATTERN = /on\w+\s*=/i;
const WHOLE_NUMBER = /^-?\d+$/;

function lowerFirst(label: string): string {
  return label.charAt(0).toLowerCase() + label.slice(1);
}

function containsUnsafePattern(value: string, fieldClass: FieldClass): boolean {
  if (UNSAFE_PATTERNS.some((pattern) => pattern.test(value))) return true;
  return fieldClass.kind === 'freeText' && EVENT_HANDLER_PATTERN.test(value);
}

function kindViolation(cleaned: string, fieldClass: FieldClass, settings: ValidationSettings): string | null {
  switch (fieldClass.kind) {
    case 'year': {
      if (!WHOLE_NUMBER.test(cleaned)) return `${fieldClass.label} must be a whole number.`;
      const year = Number(cleaned);
      if (year < settings.publicationYearMin || year > settings.publicationYearMax) {
        return `${fieldClass.label} must be between ${settings.publicationYearMin} and ${settings.publicationYearMax}.`;
      }
      return null;
    }
    case 'email':
      return isEmail(cleaned) ? null : 'Enter a valid email address.';
    case 'text':
    case 'freeText':
      return null;
  }
}

/**
 * Clean and check one field value.
 *
 * Pipeline: trim, strip markup, trim again, reject dangerous patterns (checked on
 * the input and on the cleaned value), then length and field-class checks.
 * A pure function of its arguments; running it on its own cleaned output
 * returns that output unchanged.
 *
 * @param field - Field name reported on violations
 * @param raw - Raw input; null and undefined count as empty
 */
export function validateField(
  field: string,
  raw: RawFieldValue,
  fieldClass: FieldClass,
  settings: ValidationSettings
): ValidatedField {
  const trimmed = raw === null || raw === undefined ? '' : String(raw).trim();
  const cleaned = trimmed.length > 0 ? stripMarkup(trimmed).trim() : '';
  const messages: string[] = [];

  if (containsUnsafePattern(trimmed, fieldClass) || containsUnsafePattern(cleaned, fieldClass)) {
    messages.push(`Invalid characters in ${lowerFirst(fieldClass.label)}.`);
  }

  if (cleaned.length === 0) {
    if (!fieldClass.optional) messages.push(`${fieldClass.label} cannot be empty.`);
  } else if (fieldClass.kind !== 'year' && cleaned.length > fieldClass.maxLength) {
    // Years are bounded by the range check, which names the bounds.
    messages.push(`${fieldClass.label} cannot exceed ${fieldClass.maxLength} characters.`);
  } else {
    const violation = kindViolation(cleaned, fieldClass, settings);
    if (violation) messages.push(violation);
  }

  return {
    field,
    cleaned,
    violations: messages.map((message) => ({ field, message }))
  };
}

/**
 * Run every field of `schema` and collect all violations
 * Input keys not named by the schema are ignored
 */
export function validateFields<K extends string>(
  schema: FormSchema<K>,
  rawFields: RawFields,
  settings: ValidationSettings
): FormResult<K> {
  const values: Partial<Record<K, string>> = {};
  const violations: FieldViolation[] = [];

  for (const { name, fieldClass } of schema) {
    const result = validateField(name, rawFields[name], fieldClass, settings);
    values[name] = result.cleaned;
    violations.push(...result.violations);
  }

  return { values, violations };
}
