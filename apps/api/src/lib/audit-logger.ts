import { authEvents, type AuthEvent, type AuthEventEmitter } from '@gatehouse/auth';
import { logger as defaultLogger, type Logger } from '@gatehouse/observability';

/**
 * Initialize audit logging for authentication events
 * Every event becomes one structured log line; sensitive fields are
 * redacted by the logger itself.
 */
export function initializeAuditLogging(
  emitter: AuthEventEmitter = authEvents,
  logger: Logger = defaultLogger
) {
  emitter.on((event) => handleAuthEvent(event, logger));
  logger.info('Audit logging initialized for authentication events');
}

export function handleAuthEvent(event: AuthEvent, logger: Logger) {
  const { type, userId, username, ip, requestId, timestamp, metadata } = event;

  const logEntry = {
    event: type,
    userId: userId || 'unknown',
    username: username || 'unknown',
    ip: ip || 'unknown',
    timestamp: timestamp.toISOString(),
    success: type === 'user.login.success' || type === 'user.registered',
    ...(requestId ? { requestId } : {}),
    ...(metadata ? { metadata } : {}),
  };

  switch (type) {
    case 'user.registered':
      logger.info(logEntry, 'User registered successfully');
      break;

    case 'user.register.failed':
      logger.warn(logEntry, 'User registration failed');
      break;

    case 'user.login.success':
      logger.info(logEntry, 'User login successful');
      break;

    case 'user.login.failed':
      logger.warn(logEntry, 'User login failed');
      break;

    case 'user.logout':
      logger.info(logEntry, 'User logged out');
      break;

    default:
      logger.info(logEntry, 'Authentication event');
  }
}
