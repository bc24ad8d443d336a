export { layout } from './layout.js';
export type { PageProps, ServiceUrls } from './layout.js';
export { signupPage } from './signup.js';
export { loginPage } from './login.js';
