import { html } from 'hono/html';
import { layout, type PageProps } from './layout.js';

export function loginPage(props: PageProps) {
  return layout(
    props,
    html`
      <form method="post" action="${props.urls.authServiceUrl}/login">
        <label>Username <input type="text" name="username" maxlength="32" required /></label>
        <label>Password <input type="password" name="password" maxlength="128" required /></label>
        <button type="submit">Log in</button>
      </form>
      <p>New here? <a href="${props.urls.authServiceUrl}/signup">Create an account</a></p>
    `
  );
}
