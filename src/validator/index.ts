import type {
  Bar,
  BarGroup,
  FieldChange,
  HeaderField,
  Metre,
  Rational,
  Tune,
} from '../types';

// ============================================================
// Validation Error Types
// ============================================================

export type ValidationErrorCode =
  // Header
  | 'MISSING_REFERENCE_NUMBER'
  | 'INVALID_METRE'
  // Elements
  | 'INVALID_DURATION'
  | 'EMPTY_UNMODELED'
  // Groups
  | 'GROUP_OUT_OF_BAR'
  | 'GROUP_RANGE_INVALID'
  // Field changes
  | 'FIELD_CHANGE_OUT_OF_BODY';

export type ValidationLevel = 'error' | 'warning' | 'info';

export interface ValidationLocation {
  headerIndex?: number;
  changeIndex?: number;
  barIndex?: number;
  elementIndex?: number;
  groupIndex?: number;
}

export interface ValidationError {
  code: ValidationErrorCode;
  level: ValidationLevel;
  message: string;
  location: ValidationLocation;
  details?: Record<string, unknown>;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationError[];
  infos: ValidationError[];
}

export interface ValidateOptions {
  /** Require an X: reference number (default: true) */
  checkReference?: boolean;
  /** Check metres in headers and field changes (default: true) */
  checkMetres?: boolean;
  /** Check element durations and unit lengths (default: true) */
  checkDurations?: boolean;
  /** Check beam, slur and tuplet indices (default: true) */
  checkGroups?: boolean;
  /** Check field change positions (default: true) */
  checkFieldChanges?: boolean;
  /** Warn about unmodeled elements without text (default: true) */
  checkUnmodeled?: boolean;
}

const DEFAULT_OPTIONS: Required<ValidateOptions> = {
  checkReference: true,
  checkMetres: true,
  checkDurations: true,
  checkGroups: true,
  checkFieldChanges: true,
  checkUnmodeled: true,
};

// ============================================================
// Main Validate Function
// ============================================================

/**
 * Validate a Tune for internal consistency. Parsed tunes pass by
 * construction; hand-built or edited tunes may not.
 */
export function validate(tune: Tune, options: ValidateOptions = {}): ValidationResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const allErrors: ValidationError[] = [];

  if (opts.checkReference) {
    allErrors.push(...validateReference(tune));
  }

  if (opts.checkMetres || opts.checkDurations) {
    tune.headers.forEach((field, headerIndex) => {
      allErrors.push(...validateField(field, { headerIndex }, opts));
    });
    tune.fieldChanges.forEach((change, changeIndex) => {
      allErrors.push(...validateField(change.field, { changeIndex }, opts));
    });
  }

  if (opts.checkFieldChanges) {
    allErrors.push(...validateFieldChanges(tune.fieldChanges, tune.body.bars));
  }

  tune.body.bars.forEach((bar, barIndex) => {
    if (opts.checkDurations || opts.checkUnmodeled) {
      allErrors.push(...validateElements(bar, barIndex, opts));
    }
    if (opts.checkGroups) {
      allErrors.push(...validateGroups(bar, barIndex));
    }
  });

  const errors = allErrors.filter(e => e.level === 'error');
  const warnings = allErrors.filter(e => e.level === 'warning');
  const infos = allErrors.filter(e => e.level === 'info');

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    infos,
  };
}

// ============================================================
// Individual Validators
// ============================================================

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function isValidRational(value: Rational): boolean {
  return isPositiveInteger(value.numerator) && isPositiveInteger(value.denominator);
}

function isValidMetre(metre: Metre): boolean {
  return isPositiveInteger(metre.numerator) && isPositiveInteger(metre.denominator);
}

/**
 * A tune needs an X: field to be written back and read again
 */
export function validateReference(tune: Tune): ValidationError[] {
  if (tune.referenceNumber !== undefined) return [];
  return [{
    code: 'MISSING_REFERENCE_NUMBER',
    level: 'error',
    message: 'Tune has no X: reference number',
    location: {},
  }];
}

function validateField(
  field: HeaderField,
  location: ValidationLocation,
  opts: Required<ValidateOptions>
): ValidationError[] {
  const errors: ValidationError[] = [];
  const value = field.value;

  if (opts.checkMetres && value.kind === 'metre' && !isValidMetre(value.metre)) {
    errors.push({
      code: 'INVALID_METRE',
      level: 'error',
      message: `Invalid metre ${value.metre.numerator}/${value.metre.denominator}. Both parts must be positive integers.`,
      location,
      details: { numerator: value.metre.numerator, denominator: value.metre.denominator },
    });
  }

  if (opts.checkDurations && value.kind === 'length' && !isValidRational(value.length)) {
    errors.push({
      code: 'INVALID_DURATION',
      level: 'error',
      message: `Invalid unit note length ${value.length.numerator}/${value.length.denominator}`,
      location,
      details: { numerator: value.length.numerator, denominator: value.length.denominator },
    });
  }

  return errors;
}

/**
 * Validate element durations and unmodeled text within one bar
 */
export function validateElements(
  bar: Bar,
  barIndex: number,
  options: ValidateOptions = {}
): ValidationError[] {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const errors: ValidationError[] = [];

  bar.elements.forEach((element, elementIndex) => {
    const location = { barIndex, elementIndex };
    if (element.kind === 'unmodeled') {
      if (opts.checkUnmodeled && element.text.trim() === '') {
        errors.push({
          code: 'EMPTY_UNMODELED',
          level: 'warning',
          message: 'Unmodeled element has no source text',
          location,
        });
      }
      return;
    }
    if (opts.checkDurations && !isValidRational(element.duration)) {
      errors.push({
        code: 'INVALID_DURATION',
        level: 'error',
        message: `Invalid duration ${element.duration.numerator}/${element.duration.denominator}`,
        location,
        details: { kind: element.kind },
      });
    }
  });

  return errors;
}

/**
 * Groups must reference a non-empty range of elements inside their own bar
 */
export function validateGroups(bar: Bar, barIndex: number): ValidationError[] {
  const errors: ValidationError[] = [];
  const size = bar.elements.length;

  bar.groups.forEach((group: BarGroup, groupIndex) => {
    const location = { barIndex, groupIndex };
    const integral = Number.isInteger(group.start) && Number.isInteger(group.end);

    if (!integral || group.start > group.end) {
      errors.push({
        code: 'GROUP_RANGE_INVALID',
        level: 'error',
        message: `${group.kind} group has an invalid range ${group.start}..${group.end}`,
        location,
        details: { kind: group.kind },
      });
      return;
    }

    if (group.start < 0 || group.end >= size) {
      errors.push({
        code: 'GROUP_OUT_OF_BAR',
        level: 'error',
        message: `${group.kind} group ${group.start}..${group.end} reaches outside a bar of ${size} elements`,
        location,
        details: { kind: group.kind, size },
      });
      return;
    }

    if (group.kind === 'tuplet' && !(isPositiveInteger(group.p) && isPositiveInteger(group.q) && isPositiveInteger(group.r))) {
      errors.push({
        code: 'GROUP_RANGE_INVALID',
        level: 'error',
        message: `Tuplet ratio (${group.p}:${group.q}:${group.r}) must be positive integers`,
        location,
        details: { p: group.p, q: group.q, r: group.r },
      });
    }
  });

  return errors;
}

/**
 * Field changes must sit at an element boundary of an existing bar, or at
 * the very end of the body
 */
export function validateFieldChanges(changes: FieldChange[], bars: Bar[]): ValidationError[] {
  const errors: ValidationError[] = [];

  changes.forEach((change, changeIndex) => {
    const bar = bars[change.bar];
    const limit = bar ? bar.elements.length : 0;
    const inside = Number.isInteger(change.bar) && Number.isInteger(change.element)
      && change.bar >= 0 && change.bar <= bars.length
      && change.element >= 0 && change.element <= limit;

    if (!inside) {
      errors.push({
        code: 'FIELD_CHANGE_OUT_OF_BODY',
        level: 'error',
        message: `${change.field.letter}: change at bar ${change.bar}, element ${change.element} is outside the body`,
        location: { changeIndex, barIndex: change.bar, elementIndex: change.element },
      });
    }
  });

  return errors;
}

// ============================================================
// Convenience Functions
// ============================================================

/**
 * Check if a tune is valid (no errors)
 */
export function isValid(tune: Tune, options?: ValidateOptions): boolean {
  return validate(tune, options).valid;
}

/**
 * Validate and throw if invalid
 */
export function assertValid(tune: Tune, options?: ValidateOptions): void {
  const result = validate(tune, options);
  if (!result.valid) {
    const errorMessages = result.errors.map(e =>
      `[${e.code}] ${e.message} at ${formatLocation(e.location)}`
    ).join('\n');
    throw new ValidationException(result.errors, errorMessages);
  }
}

/**
 * Format a validation location for display
 */
export function formatLocation(location: ValidationLocation): string {
  const parts: string[] = [];

  if (location.headerIndex !== undefined) {
    parts.push(`header[${location.headerIndex}]`);
  }

  if (location.changeIndex !== undefined) {
    parts.push(`change[${location.changeIndex}]`);
  }

  if (location.barIndex !== undefined) {
    parts.push(`bar[${location.barIndex}]`);
  }

  if (location.elementIndex !== undefined) {
    parts.push(`element[${location.elementIndex}]`);
  }

  if (location.groupIndex !== undefined) {
    parts.push(`group[${location.groupIndex}]`);
  }

  return parts.length > 0 ? parts.join(', ') : 'tune';
}

/**
 * Validation exception with structured error information
 */
export class ValidationException extends Error {
  constructor(
    public readonly errors: ValidationError[],
    message: string
  ) {
    super(message);
    this.name = 'ValidationException';
  }
}
