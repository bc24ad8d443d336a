import { html } from 'hono/html';
import { layout, type PageProps } from './layout.js';

export function signupPage(props: PageProps) {
  return layout(
    props,
    html`
      <form method="post" action="${props.urls.authServiceUrl}/signup">
        <label>Name <input type="text" name="name" maxlength="100" required /></label>
        <label>Email <input type="email" name="email" maxlength="254" required /></label>
        <label>Phone <input type="tel" name="phone" required /></label>
        <label>Username <input type="text" name="username" maxlength="32" required /></label>
        <label>Password <input type="password" name="password" maxlength="128" required /></label>
        <button type="submit">Create account</button>
      </form>
      <p>Already registered? <a href="${props.urls.authServiceUrl}/login">Log in</a></p>
    `
  );
}
