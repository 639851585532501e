/**
 * Validation result types
 * @module @loadramp/shared/validation/types
 */

/**
 * Single failed check
 */
export interface FieldIssue {
  field: string;
  message: string;
  code: string;
}

export interface ValidationReport {
  valid: boolean;
  errors: FieldIssue[];
}

export function reportOf(errors: (FieldIssue | null)[]): ValidationReport {
  const present = errors.filter((issue): issue is FieldIssue => issue !== null);
  return { valid: present.length === 0, errors: present };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
