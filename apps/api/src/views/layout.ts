import { html } from 'hono/html';
import type { HtmlEscapedString } from 'hono/utils/html';
import type { Notification } from '@gatehouse/core';

export interface ServiceUrls {
  authServiceUrl: string;
  accountServiceUrl: string;
  chatServiceUrl: string;
  cdnUrl: string;
}

export interface PageProps {
  title: string;
  notify: Notification[];
  urls: ServiceUrls;
}

type Markup = HtmlEscapedString | Promise<HtmlEscapedString>;

function notifications(notify: Notification[]): Markup | string {
  if (notify.length === 0) {
    return '';
  }

  return html`
    <ul class="notify">
      ${notify.map(
        (item) => html`<li class="notify-${item.status.toLowerCase()}" role="alert">${item.message}</li>`
      )}
    </ul>
  `;
}

export function layout(props: PageProps, body: Markup): Markup {
  return html`<!DOCTYPE html>
    <html lang="en">
      <head>
        <meta charset="UTF-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1.0" />
        <title>${props.title}</title>
        <link rel="stylesheet" href="${props.urls.cdnUrl}/css/auth.css" />
      </head>
      <body>
        <main class="container">
          <h1>${props.title}</h1>
          ${notifications(props.notify)}
          ${body}
        </main>
        <footer>
          <a href="${props.urls.accountServiceUrl}">Account</a>
          <a href="${props.urls.chatServiceUrl}">Chat</a>
        </footer>
      </body>
    </html>`;
}
