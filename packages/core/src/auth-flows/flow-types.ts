/**
 * Auth Flow Types
 *
 * Request-scoped inputs and outputs of the signup, login and logout flows.
 */

import type { CookieDescriptor } from '@gatehouse/auth';
import type { LoginField, SignupField } from '../validation/index.js';

export type NotificationStatus = 'Success' | 'Error';

export interface Notification {
  status: NotificationStatus;
  message: string;
}

export type AuthView = 'signup' | 'login';

export interface RenderResult {
  kind: 'render';
  view: AuthView;
  title: string;
  notify: Notification[];
}

export interface RedirectResult {
  kind: 'redirect';
  location: string;
  cookies: CookieDescriptor[];
}

export type FlowResult = RenderResult | RedirectResult;

export type SignupSubmission = Record<SignupField, string>;
export type LoginSubmission = Record<LoginField, string>;

/**
 * Per-request metadata used for logging and audit events
 */
export interface FlowContext {
  requestId?: string;
  ip?: string;
}

export interface AuthFlowSettings {
  appName: string;
  /** HMAC secret for session tokens; shared with downstream verifiers */
  appSecret: string;
  /** true when the public scheme is https */
  secureCookies: boolean;
  /** Bare domain; the cookie is scoped to `.${cookieDomain}` */
  cookieDomain: string;
  accountServiceUrl: string;
  cookieName: string;
  sessionTtlSeconds: number;
}
