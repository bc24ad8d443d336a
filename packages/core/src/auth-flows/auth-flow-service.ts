/**
 * Auth Flow Service
 *
 * Orchestrates the signup, login and logout flows. Each flow is a short
 * linear pipeline: expected failures (validation, duplicate username, bad
 * credentials) travel as Result values and become notifications; anything
 * thrown is caught once at the flow boundary, logged, and reported as an
 * opaque internal error.
 */

import { randomUUID } from 'node:crypto';
import {
  clearSessionCookie,
  issueSessionToken,
  renderSessionCookie,
  type AuthEventSink,
  type PasswordHasher,
  type SessionIdentity,
} from '@gatehouse/auth';
import { logger as defaultLogger, type Logger } from '@gatehouse/observability';
import {
  ACCOUNT_ROLE_BASE,
  ACCOUNT_STATUS_NEW,
  DEFAULT_ACCOUNT_TITLE,
  type Account,
  type AccountStore,
  type NewAccount,
} from '../accounts/account-types.js';
import {
  AccountCreationError,
  DuplicateUsernameError,
  InvalidCredentialsError,
  ValidationFailedError,
  type AccountError,
} from '../accounts/account-errors.js';
import { err, ok, type Result } from '../result.js';
import { validate, SIGNUP_FIELDS, LOGIN_FIELDS } from '../validation/index.js';
import { DASHBOARD_PATH, FLOW_MESSAGES, LOGIN_PATH, loginTitle, signupTitle } from './messages.js';
import type {
  AuthFlowSettings,
  AuthView,
  FlowContext,
  FlowResult,
  LoginSubmission,
  Notification,
  RedirectResult,
  RenderResult,
  SignupSubmission,
} from './flow-types.js';

export interface AuthFlowDependencies {
  accounts: AccountStore;
  hasher: PasswordHasher;
  events: AuthEventSink;
  settings: AuthFlowSettings;
  logger?: Logger;
}

export class AuthFlowService {
  private accounts: AccountStore;
  private hasher: PasswordHasher;
  private events: AuthEventSink;
  private settings: AuthFlowSettings;
  private logger: Logger;
  private decoyDigest: Promise<string> | null = null;

  constructor(deps: AuthFlowDependencies) {
    this.accounts = deps.accounts;
    this.hasher = deps.hasher;
    this.events = deps.events;
    this.settings = deps.settings;
    this.logger = deps.logger ?? defaultLogger;
  }

  signupPage(): RenderResult {
    return this.render('signup', []);
  }

  loginPage(): RenderResult {
    return this.render('login', []);
  }

  /**
   * Create an account from a signup submission
   *
   * Business rules:
   * - Every field passes the validator (all field errors reported together)
   * - Username must not already exist
   * - Password is stored only as a scrypt digest
   * - New accounts get the default title, status and role
   */
  async signup(submission: SignupSubmission, ctx: FlowContext = {}): Promise<RenderResult> {
    try {
      const outcome = await this.registerAccount(submission, ctx);
      if (!outcome.ok) {
        return this.render('signup', notificationsFor(outcome.error));
      }

      return this.render('signup', [{ status: 'Success', message: FLOW_MESSAGES.accountCreated }]);
    } catch (error) {
      return this.internalError('signup', error, ctx);
    }
  }

  /**
   * Verify credentials and start a session
   *
   * Unknown usernames and wrong passwords produce the same notification;
   * the distinction only reaches the audit event.
   */
  async login(submission: LoginSubmission, ctx: FlowContext = {}): Promise<FlowResult> {
    try {
      const outcome = await this.authenticate(submission, ctx);
      if (!outcome.ok) {
        return this.render('login', notificationsFor(outcome.error));
      }

      const account = outcome.value;
      const { token } = await issueSessionToken(
        toSessionIdentity(account),
        this.settings.appSecret,
        this.settings.sessionTtlSeconds
      );
      const cookie = renderSessionCookie(
        this.settings.cookieName,
        token,
        this.settings.secureCookies,
        this.settings.cookieDomain,
        this.settings.sessionTtlSeconds
      );

      this.events.emit({
        type: 'user.login.success',
        userId: account.id,
        username: account.username,
        ...eventContext(ctx),
      });

      return this.redirect(`${trimTrailingSlash(this.settings.accountServiceUrl)}${DASHBOARD_PATH}`, [cookie]);
    } catch (error) {
      return this.internalError('login', error, ctx);
    }
  }

  /**
   * End the session. Works whether or not a session cookie was sent.
   */
  logout(ctx: FlowContext = {}): RedirectResult {
    const cookie = clearSessionCookie(
      this.settings.cookieName,
      this.settings.secureCookies,
      this.settings.cookieDomain
    );

    this.events.emit({ type: 'user.logout', ...eventContext(ctx) });

    return this.redirect(LOGIN_PATH, [cookie]);
  }

  private async registerAccount(
    submission: SignupSubmission,
    ctx: FlowContext
  ): Promise<Result<Account, AccountError>> {
    const validation = validate(pick(submission, SIGNUP_FIELDS));
    if (!validation.ok) {
      return err(new ValidationFailedError(validation.errors));
    }

    // Friendly duplicate message; the store's unique constraint is the real guard
    const existing = await this.accounts.findByUsername(submission.username);
    if (existing) {
      this.emitRegisterFailed(submission.username, 'duplicate_username', ctx);
      return err(new DuplicateUsernameError(submission.username));
    }

    const passwordHash = await this.hasher.hash(submission.password);

    const data: NewAccount = {
      name: submission.name,
      email: submission.email,
      phone: submission.phone,
      username: submission.username,
      passwordHash,
      title: DEFAULT_ACCOUNT_TITLE,
      status: ACCOUNT_STATUS_NEW,
      role: ACCOUNT_ROLE_BASE,
    };

    const created = await this.accounts.create(data);
    if (!created.ok) {
      this.logger.warn(
        { username: submission.username, failure: created.error.kind, requestId: ctx.requestId },
        'Account store rejected create'
      );
      this.emitRegisterFailed(submission.username, created.error.kind, ctx);
      return err(new AccountCreationError(created.error.kind));
    }

    this.events.emit({
      type: 'user.registered',
      userId: created.value.id,
      username: created.value.username,
      ...eventContext(ctx),
    });

    return ok(created.value);
  }

  private async authenticate(
    submission: LoginSubmission,
    ctx: FlowContext
  ): Promise<Result<Account, AccountError>> {
    const validation = validate(pick(submission, LOGIN_FIELDS));
    if (!validation.ok) {
      return err(new ValidationFailedError(validation.errors));
    }

    const account = await this.accounts.findByUsername(submission.username);
    if (!account) {
      // Pay the same scrypt cost as a wrong password so timing does not reveal the username
      await this.hasher.verify(submission.password, await this.getDecoyDigest());
      this.emitLoginFailed(submission.username, 'user_not_found', ctx);
      return err(new InvalidCredentialsError('user_not_found'));
    }

    // TODO: gate on account.status once the meaning of non-zero states is defined
    const valid = await this.hasher.verify(submission.password, account.passwordHash);
    if (!valid) {
      this.emitLoginFailed(submission.username, 'invalid_password', ctx, account.id);
      return err(new InvalidCredentialsError('invalid_password'));
    }

    return ok(account);
  }

  /**
   * Digest of a random secret under the deployment's parameters, built on
   * first use. A failed build is not cached.
   */
  private getDecoyDigest(): Promise<string> {
    this.decoyDigest ??= this.hasher.hash(randomUUID()).catch((error: unknown) => {
      this.decoyDigest = null;
      throw error;
    });
    return this.decoyDigest;
  }

  private emitLoginFailed(
    username: string,
    reason: InvalidCredentialsError['reason'],
    ctx: FlowContext,
    userId?: string
  ) {
    this.events.emit({
      type: 'user.login.failed',
      username,
      ...(userId ? { userId } : {}),
      ...eventContext(ctx),
      metadata: { reason },
    });
  }

  private emitRegisterFailed(username: string, reason: string, ctx: FlowContext) {
    this.events.emit({
      type: 'user.register.failed',
      username,
      ...eventContext(ctx),
      metadata: { reason },
    });
  }

  private internalError(view: AuthView, error: unknown, ctx: FlowContext): RenderResult {
    this.logger.error({ err: error, flow: view, requestId: ctx.requestId }, 'Auth flow failed');
    return this.render(view, [{ status: 'Error', message: FLOW_MESSAGES.internalError }]);
  }

  private render(view: AuthView, notify: Notification[]): RenderResult {
    const title = view === 'signup' ? signupTitle(this.settings.appName) : loginTitle(this.settings.appName);
    return { kind: 'render', view, title, notify };
  }

  private redirect(location: string, cookies: RedirectResult['cookies']): RedirectResult {
    return { kind: 'redirect', location, cookies };
  }
}

/**
 * Field errors become one `FIELD: message` notification each; business rule
 * violations become their single generic message.
 */
export function notificationsFor(error: AccountError): Notification[] {
  if (error instanceof ValidationFailedError) {
    return Object.entries(error.fieldErrors).map(([field, message]): Notification => ({
      status: 'Error',
      message: `${field.toUpperCase()}: ${message}`,
    }));
  }
  return [{ status: 'Error', message: error.message }];
}

function toSessionIdentity(account: Account): SessionIdentity {
  const { passwordHash: _passwordHash, ...identity } = account;
  return identity;
}

function pick<K extends string>(
  source: Readonly<Record<K, string>>,
  keys: readonly K[]
): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of keys) {
    picked[key] = source[key];
  }
  return picked;
}

function eventContext(ctx: FlowContext): { requestId?: string; ip?: string } {
  return {
    ...(ctx.requestId ? { requestId: ctx.requestId } : {}),
    ...(ctx.ip ? { ip: ctx.ip } : {}),
  };
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
