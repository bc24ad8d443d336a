export const FLOW_MESSAGES = {
  accountCreated: 'Account created successfully.',
  internalError: 'Internal server error.',
} as const;

export const LOGIN_PATH = '/login';
export const DASHBOARD_PATH = '/dashboard';

export function signupTitle(appName: string): string {
  return `Create your account - ${appName}`;
}

export function loginTitle(appName: string): string {
  return `Login your account - ${appName}`;
}
