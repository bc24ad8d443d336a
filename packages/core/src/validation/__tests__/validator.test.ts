import { describe, expect, it } from 'vitest';
import { validate } from '../validator.js';

const validSignup = {
  name: 'Alice Example',
  email: 'alice@example.com',
  phone: '+1 (555) 010-0199',
  username: 'alice',
  password: 'correct-horse-1',
};

describe('validate', () => {
  it('accepts a complete, valid signup submission', () => {
    expect(validate(validSignup)).toEqual({ ok: true, errors: {} });
  });

  it('accepts a valid login submission', () => {
    expect(validate({ username: 'alice', password: 'correct-horse-1' })).toEqual({
      ok: true,
      errors: {},
    });
  });

  it('reports a short login password on the password field only', () => {
    expect(validate({ username: 'alice', password: 'short' })).toEqual({
      ok: false,
      errors: { password: 'must be at least 8 characters' },
    });
  });

  it('reports every invalid field in one pass with one message each', () => {
    const outcome = validate({
      name: '',
      email: 'not-an-email',
      phone: '12',
      username: 'a',
      password: 'lettersonly',
    });

    expect(outcome).toEqual({
      ok: false,
      errors: {
        name: 'is required',
        email: 'must be a valid email address',
        phone: 'must contain between 7 and 15 digits',
        username: 'must be at least 3 characters',
        password: 'must contain at least one number',
      },
    });
  });

  it('reports "is required" for empty and missing values', () => {
    expect(validate({ username: '', password: undefined }).errors).toEqual({
      username: 'is required',
      password: 'is required',
    });
  });

  it('ignores unknown keys', () => {
    expect(validate({ username: 'alice', password: 'correct-horse-1', csrf: 'x' })).toEqual({
      ok: true,
      errors: {},
    });
  });

  it('does not throw for hostile input', () => {
    const outcome = validate({
      username: 'alice<script>',
      phone: 'call me maybe',
      name: '   ',
      password: 'x'.repeat(500),
    });

    expect(outcome.errors).toEqual({
      username: 'may only contain letters, numbers, dots, underscores and dashes',
      phone: 'may only contain digits, spaces, dashes, parentheses and a leading +',
      name: 'must not be blank',
      password: 'must be at most 128 characters',
    });
  });

  it('rejects passwords without letters', () => {
    expect(validate({ password: '1234567890' }).errors).toEqual({
      password: 'must contain at least one letter',
    });
  });

  it('is deterministic', () => {
    const submission = { username: 'x', password: 'short', email: '@' };

    expect(validate(submission)).toEqual(validate(submission));
  });
});
