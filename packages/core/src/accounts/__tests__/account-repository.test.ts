/**
 * Account Repository Tests
 *
 * Exercises the SQL adapter against an in-process query double
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createLogger } from '@gatehouse/observability';
import { PgAccountRepository } from '../account-repository.js';
import type { NewAccount } from '../account-types.js';

const row = {
  id: '7b0c6a8e-5c3f-4d0e-9a4f-2f1b8c9d0e11',
  name: 'Alice Example',
  email: 'alice@example.com',
  phone: '+15550100199',
  username: 'alice',
  password_hash: 'scrypt$1024$8$1$c2FsdA==$a2V5',
  title: 'Software Engineer',
  status: 0,
  role: 0,
};

const newAccount: NewAccount = {
  name: 'Alice Example',
  email: 'alice@example.com',
  phone: '+15550100199',
  username: 'alice',
  passwordHash: 'scrypt$1024$8$1$c2FsdA==$a2V5',
  title: 'Software Engineer',
  status: 0,
  role: 0,
};

const silentLogger = createLogger({ level: 'silent' });

describe('PgAccountRepository', () => {
  let query: ReturnType<typeof vi.fn>;
  let repository: PgAccountRepository;

  beforeEach(() => {
    query = vi.fn();
    repository = new PgAccountRepository({ query }, silentLogger);
  });

  describe('findByUsername', () => {
    it('should return null if no account matches', async () => {
      query.mockResolvedValue({ rows: [], rowCount: 0 });

      await expect(repository.findByUsername('nobody')).resolves.toBeNull();
      expect(query).toHaveBeenCalledWith(expect.stringContaining('WHERE username = $1'), ['nobody']);
    });

    it('should map the row to an account', async () => {
      query.mockResolvedValue({ rows: [row], rowCount: 1 });

      const account = await repository.findByUsername('alice');

      expect(account).toEqual({
        id: row.id,
        name: 'Alice Example',
        email: 'alice@example.com',
        phone: '+15550100199',
        username: 'alice',
        passwordHash: row.password_hash,
        title: 'Software Engineer',
        status: 0,
        role: 0,
      });
    });

    it('should propagate store errors', async () => {
      query.mockRejectedValue(new Error('connection refused'));

      await expect(repository.findByUsername('alice')).rejects.toThrow('connection refused');
    });

    it('should reject rows that do not match the account shape', async () => {
      query.mockResolvedValue({ rows: [{ ...row, status: 'active' }], rowCount: 1 });

      await expect(repository.findByUsername('alice')).rejects.toThrow();
    });
  });

  describe('create', () => {
    it('should insert with parameters in column order and return the account', async () => {
      query.mockResolvedValue({ rows: [row], rowCount: 1 });

      const result = await repository.create(newAccount);

      expect(result).toEqual({ ok: true, value: expect.objectContaining({ id: row.id, username: 'alice' }) });
      expect(query).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO accounts'), [
        'Alice Example',
        'alice@example.com',
        '+15550100199',
        'alice',
        'scrypt$1024$8$1$c2FsdA==$a2V5',
        'Software Engineer',
        0,
        0,
      ]);
    });

    it('should report duplicate when the unique constraint fires', async () => {
      query.mockRejectedValue(Object.assign(new Error('duplicate key value'), { code: '23505' }));

      await expect(repository.create(newAccount)).resolves.toEqual({
        ok: false,
        error: { kind: 'duplicate', username: 'alice' },
      });
    });

    it('should report unavailable instead of throwing on other errors', async () => {
      const failure = new Error('connection terminated');
      query.mockRejectedValue(failure);

      await expect(repository.create(newAccount)).resolves.toEqual({
        ok: false,
        error: { kind: 'unavailable', cause: failure },
      });
    });
  });
});
