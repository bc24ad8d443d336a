import { beforeEach, describe, expect, it } from 'vitest';
import { authEvents, type AuthEvent } from './events.js';

describe('authEvents emitter', () => {
  beforeEach(() => {
    authEvents.clearHandlers();
  });

  it('attaches a timestamp to emitted events', () => {
    const received: AuthEvent[] = [];
    authEvents.on((event) => {
      received.push(event);
    });

    authEvents.emit({
      type: 'user.login.success',
      userId: 'user_1',
      username: 'alice',
      ip: '203.0.113.2',
    });

    expect(received).toHaveLength(1);
    expect(received[0]?.timestamp).toBeInstanceOf(Date);
    expect(received[0]?.username).toBe('alice');
  });

  it('keeps firing handlers when one throws', async () => {
    const calls: string[] = [];

    authEvents.on(() => {
      calls.push('first');
      throw new Error('boom');
    });

    authEvents.on(() => {
      calls.push('second');
    });

    authEvents.emit({
      type: 'user.login.failed',
      username: 'mallory',
      metadata: { reason: 'invalid_password' },
    });

    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(calls).toEqual(['first', 'second']);
  });

  it('drops handlers after clearHandlers', () => {
    const calls: string[] = [];
    authEvents.on(() => {
      calls.push('called');
    });

    authEvents.clearHandlers();
    authEvents.emit({ type: 'user.logout' });

    expect(calls).toEqual([]);
  });
});
