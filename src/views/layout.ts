import escapeHtml from 'escape-html';
import { PageEvent } from '../catalog/types';
import { SessionUser } from '../session/types';

export interface LayoutContext {
  title: string;
  cartCount: number;
  currencyCode: string;
  user?: SessionUser;
  query?: string;
  error?: string;
  event?: PageEvent;
}

export function esc(value: string | number | undefined | null): string {
  return value === undefined || value === null ? '' : escapeHtml(String(value));
}

/** JSON safe to inline inside a <script> element */
export function scriptJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/&/g, '\\u0026')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

export function formatMoney(amount: number, currencyCode: string): string {
  try {
    return new Intl.NumberFormat('en-US', { style: 'currency', currency: currencyCode }).format(amount);
  } catch {
    return `${amount.toFixed(2)} ${currencyCode}`;
  }
}

export function productHref(productId: string, attributionToken?: string): string {
  const base = `/product/${encodeURIComponent(productId)}`;
  return attributionToken ? `${base}?attribution_token=${encodeURIComponent(attributionToken)}` : base;
}

function accountLinks(user?: SessionUser): string {
  if (!user) return `<a href="/login">Sign in</a>`;
  return `<span class="user">${esc(user.name ?? user.email ?? 'Account')}</span> <a href="/logout">Sign out</a>`;
}

export function layout(ctx: LayoutContext, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>${esc(ctx.title)} · Storefront</title>
  <link rel="stylesheet" href="/static/css/storefront.css" />
</head>
<body>
  <header class="site-header">
    <a class="brand" href="/">Storefront</a>
    <form class="search" action="/search" method="get" role="search">
      <input type="search" name="query" value="${esc(ctx.query)}" placeholder="Search products" list="autocomplete" autocomplete="off" data-autocomplete />
      <datalist id="autocomplete"></datalist>
      <button type="submit">Search</button>
    </form>
    <nav>
      <a href="/chat">Ask a shopping assistant</a>
      <a href="/cart">Cart (${ctx.cartCount})</a>
      ${accountLinks(ctx.user)}
    </nav>
  </header>
  ${ctx.error ? `<div class="error" role="alert">${esc(ctx.error)}</div>` : ''}
  <main>
${body}
  </main>
  ${ctx.event ? `<script type="application/json" id="page-event">${scriptJson(ctx.event)}</script>` : ''}
  <script src="/static/js/event_tracker.js" defer></script>
</body>
</html>`;
}
