/**
 * Auth Flows
 *
 * Signup, login and logout orchestration
 */

export { AuthFlowService, notificationsFor } from './auth-flow-service.js';
export type { AuthFlowDependencies } from './auth-flow-service.js';
export { FLOW_MESSAGES, LOGIN_PATH, DASHBOARD_PATH, signupTitle, loginTitle } from './messages.js';
export type {
  AuthFlowSettings,
  AuthView,
  FlowContext,
  FlowResult,
  LoginSubmission,
  Notification,
  NotificationStatus,
  RedirectResult,
  RenderResult,
  SignupSubmission,
} from './flow-types.js';
