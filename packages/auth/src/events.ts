/**
 * Authentication event emitter for audit logging and monitoring
 * Events are fire-and-forget to avoid blocking the authentication flow
 */
import { logger } from '@gatehouse/observability';

export type AuthEventType =
  | 'user.registered'
  | 'user.register.failed'
  | 'user.login.success'
  | 'user.login.failed'
  | 'user.logout';

/**
 * Base authentication event structure
 */
export interface AuthEvent {
  type: AuthEventType;
  userId?: string;
  username?: string;
  ip?: string;
  requestId?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export type AuthEventInput = Omit<AuthEvent, 'timestamp'>;

export type AuthEventHandler = (event: AuthEvent) => void | Promise<void>;

export interface AuthEventSink {
  emit(event: AuthEventInput): void;
}

export class AuthEventEmitter implements AuthEventSink {
  private handlers: AuthEventHandler[] = [];

  on(handler: AuthEventHandler) {
    this.handlers.push(handler);
  }

  emit(event: AuthEventInput): void {
    const fullEvent: AuthEvent = {
      ...event,
      timestamp: new Date(),
    };

    // Fire and forget - don't block auth flow
    Promise.all(this.handlers.map(async (h) => h(fullEvent))).catch((err: unknown) => {
      logger.error({ err, eventType: fullEvent.type }, 'Auth event handler error');
    });
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers() {
    this.handlers = [];
  }
}

export const authEvents = new AuthEventEmitter();
