import { Hono, type Context } from 'hono';
import {
  LOGIN_PATH,
  type AuthFlowService,
  type FlowContext,
  type LoginSubmission,
  type SignupSubmission,
} from '@gatehouse/core';
import { renderView, respond, type ResponderOptions } from '../lib/responder.js';
import type { AppBindings } from '../types/context.js';

// Missing or file-valued entries read as empty strings
function field(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  return typeof value === 'string' ? value : '';
}

async function readSignupForm(c: Context): Promise<SignupSubmission> {
  const body = await c.req.parseBody();
  return {
    name: field(body, 'name'),
    email: field(body, 'email'),
    phone: field(body, 'phone'),
    username: field(body, 'username'),
    password: field(body, 'password'),
  };
}

async function readLoginForm(c: Context): Promise<LoginSubmission> {
  const body = await c.req.parseBody();
  return {
    username: field(body, 'username'),
    password: field(body, 'password'),
  };
}

function flowContext(c: Context<AppBindings>): FlowContext {
  const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
  return {
    requestId: c.get('requestId'),
    ...(forwarded ? { ip: forwarded } : {}),
  };
}

export function createAuthRoutes(flows: AuthFlowService, options: ResponderOptions) {
  const authRoutes = new Hono<AppBindings>();

  authRoutes.get('/', (c) => c.redirect(LOGIN_PATH, 302));

  authRoutes.get('/signup', (c) => renderView(c, flows.signupPage(), options.urls));

  authRoutes.post('/signup', async (c) => {
    const submission = await readSignupForm(c);
    const result = await flows.signup(submission, flowContext(c));
    return respond(c, result, options);
  });

  authRoutes.get('/login', (c) => renderView(c, flows.loginPage(), options.urls));

  authRoutes.post('/login', async (c) => {
    const submission = await readLoginForm(c);
    const result = await flows.login(submission, flowContext(c));
    return respond(c, result, options);
  });

  authRoutes.get('/logout', async (c) => {
    const result = flows.logout(flowContext(c));
    return respond(c, result, options);
  });

  return authRoutes;
}
