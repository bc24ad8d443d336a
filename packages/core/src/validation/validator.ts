import { FIELD_RULES, REQUIRED_MESSAGE, isCredentialField, type CredentialField } from './rules.js';

export type FieldErrors = Partial<Record<CredentialField, string>>;

export interface ValidationOutcome {
  ok: boolean;
  errors: FieldErrors;
}

/**
 * Validate submitted credential fields.
 *
 * Every known field present in `fields` is checked; unknown keys are
 * ignored. Each invalid field gets exactly one message. Never throws.
 */
export function validate(fields: Readonly<Record<string, string | undefined>>): ValidationOutcome {
  const errors: FieldErrors = {};

  for (const [name, value] of Object.entries(fields)) {
    if (!isCredentialField(name)) {
      continue;
    }

    const message = firstError(name, value);
    if (message !== null) {
      errors[name] = message;
    }
  }

  return { ok: Object.keys(errors).length === 0, errors };
}

function firstError(field: CredentialField, value: string | undefined): string | null {
  if (value === undefined) {
    return REQUIRED_MESSAGE;
  }

  const result = FIELD_RULES[field].safeParse(value);
  if (result.success) {
    return null;
  }

  return result.error.issues[0]?.message ?? 'is invalid';
}
