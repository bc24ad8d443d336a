import { z } from 'zod';

export const REQUIRED_MESSAGE = 'is required';
const REQUIRED = REQUIRED_MESSAGE;

/**
 * Per-field rules. Checks run in declaration order and the first failing
 * check is the one reported, so `is required` always wins for empty input.
 */
export const FIELD_RULES = {
  name: z
    .string()
    .min(1, REQUIRED)
    .max(100, 'must be at most 100 characters')
    .regex(/\S/, 'must not be blank'),
  email: z
    .string()
    .min(1, REQUIRED)
    .max(254, 'must be at most 254 characters')
    .email('must be a valid email address'),
  phone: z
    .string()
    .min(1, REQUIRED)
    .regex(/^\+?[0-9\s()-]+$/, 'may only contain digits, spaces, dashes, parentheses and a leading +')
    .refine((value) => {
      const digits = value.replace(/[^0-9]/g, '').length;
      return digits >= 7 && digits <= 15;
    }, 'must contain between 7 and 15 digits'),
  username: z
    .string()
    .min(1, REQUIRED)
    .min(3, 'must be at least 3 characters')
    .max(32, 'must be at most 32 characters')
    .regex(/^[A-Za-z0-9._-]+$/, 'may only contain letters, numbers, dots, underscores and dashes'),
  password: z
    .string()
    .min(1, REQUIRED)
    .min(8, 'must be at least 8 characters')
    .max(128, 'must be at most 128 characters')
    .regex(/[A-Za-z]/, 'must contain at least one letter')
    .regex(/[0-9]/, 'must contain at least one number'),
} satisfies Record<string, z.ZodType<string>>;

export type CredentialField = keyof typeof FIELD_RULES;

export const SIGNUP_FIELDS = ['name', 'email', 'phone', 'username', 'password'] as const satisfies readonly CredentialField[];
export const LOGIN_FIELDS = ['username', 'password'] as const satisfies readonly CredentialField[];

export type SignupField = (typeof SIGNUP_FIELDS)[number];
export type LoginField = (typeof LOGIN_FIELDS)[number];

export function isCredentialField(name: string): name is CredentialField {
  return Object.prototype.hasOwnProperty.call(FIELD_RULES, name);
}
