/**
 * Server-rendered pages. Every dynamic value passes through esc() or
 * scriptJson() before it reaches the markup.
 */

import { ProductCard } from '../catalog/types';
import { ProductPageView } from '../catalog/catalog-service';
import { CartView, Order } from '../cart/types';
import { ChatTurn, ConversationState, MAX_CHAT_MESSAGE_LENGTH } from '../chat/types';
import { HomePageView } from '../recommendations/types';
import { FacetView, SearchPageView } from '../search/types';
import { esc, formatMoney, layout, LayoutContext, productHref } from './layout';

export type PageContext = Omit<LayoutContext, 'title' | 'error' | 'event' | 'query'>;

function productTile(product: ProductCard, ctx: PageContext, attributionToken?: string): string {
  const href = productHref(product.id, attributionToken);
  const price = product.price !== undefined
    ? `<span class="price">${esc(formatMoney(product.price, product.currencyCode ?? ctx.currencyCode))}</span>`
    : '';
  const image = product.imageUrl
    ? `<img src="${esc(product.imageUrl)}" alt="${esc(product.title)}" loading="lazy" />`
    : '<div class="no-image"></div>';
  return `<li class="product" data-product-id="${esc(product.id)}">
      <a href="${esc(href)}">${image}<span class="title">${esc(product.title)}</span></a>
      ${price}
      ${addToCartForm(product, attributionToken)}
    </li>`;
}

function addToCartForm(product: ProductCard, attributionToken?: string, withQuantity = false): string {
  return `<form class="add-to-cart" action="/cart/add" method="post">
        <input type="hidden" name="product_id" value="${esc(product.id)}" />
        <input type="hidden" name="product_price" value="${esc(product.price ?? 0)}" />
        ${attributionToken ? `<input type="hidden" name="attribution_token" value="${esc(attributionToken)}" />` : ''}
        ${withQuantity ? '<label>Qty <input type="number" name="quantity" value="1" min="1" /></label>' : ''}
        <button type="submit">Add to cart</button>
      </form>`;
}

function productGrid(products: ProductCard[], ctx: PageContext, attributionToken?: string): string {
  if (products.length === 0) return '<p class="empty">No products to show.</p>';
  return `<ul class="product-grid">
    ${products.map((p) => productTile(p, ctx, attributionToken)).join('\n    ')}
  </ul>`;
}

export function renderHome(view: HomePageView, ctx: PageContext): string {
  const body = `<section class="recommendations">
  <h1>Recommended for you</h1>
  ${productGrid(view.recommendations, ctx, view.attributionToken)}
</section>`;
  return layout({ ...ctx, title: 'Home', error: view.error, event: view.event }, body);
}

function facetPanel(facets: FacetView[]): string {
  if (facets.length === 0) return '';
  const groups = facets.map((facet) => `<fieldset class="facet" data-facet="${esc(facet.key)}">
      <legend>${esc(facet.label)}</legend>
      <ul>
        ${facet.values
          .map((v) => `<li><a href="${esc(v.href)}" class="${v.selected ? 'selected' : ''}" aria-pressed="${v.selected}">${esc(v.label)} <span class="count">(${v.count})</span></a></li>`)
          .join('\n        ')}
      </ul>
    </fieldset>`);
  return `<aside class="facets">
    ${groups.join('\n    ')}
  </aside>`;
}

function pager(view: SearchPageView): string {
  if (view.totalPages <= 1) return '';
  const prev = view.prevHref ? `<a rel="prev" href="${esc(view.prevHref)}">Previous</a>` : '';
  const next = view.nextHref ? `<a rel="next" href="${esc(view.nextHref)}">Next</a>` : '';
  return `<nav class="pager">${prev} <span>Page ${view.page} of ${view.totalPages}</span> ${next}</nav>`;
}

export function renderSearch(view: SearchPageView, ctx: PageContext): string {
  const heading = view.mode === 'browse'
    ? `<h1>${esc(view.category)}</h1>`
    : `<h1>Results for “${esc(view.query)}”</h1>`;
  const corrected = view.correctedQuery
    ? `<p class="corrected">Showing results for <strong>${esc(view.correctedQuery)}</strong></p>`
    : '';
  const expansion = view.mode === 'search'
    ? `<form class="expand" action="/search" method="get">
    <input type="hidden" name="query" value="${esc(view.query)}" />
    <label><input type="checkbox" name="expand" value="true" ${view.expand ? 'checked' : ''} onchange="this.form.submit()" /> Include related results</label>
  </form>`
    : '';
  const body = `<section class="search-results">
  ${heading}
  ${corrected}
  ${expansion}
  <p class="summary">${view.totalSize} result${view.totalSize === 1 ? '' : 's'}${view.expandedQuery ? ' (expanded)' : ''}</p>
  <div class="results-layout">
    ${facetPanel(view.facets)}
    ${productGrid(view.products, ctx, view.attributionToken)}
  </div>
  ${pager(view)}
</section>`;
  return layout(
    { ...ctx, title: view.mode === 'browse' ? view.category ?? 'Browse' : `Search: ${view.query}`, query: view.query, error: view.error, event: view.event },
    body,
  );
}

export function renderProduct(view: ProductPageView, ctx: PageContext): string {
  const product = view.product;
  if (!product) {
    return layout(
      { ...ctx, title: 'Product unavailable', error: view.error, event: view.event },
      `<section class="product-detail"><h1>Product unavailable</h1><p>${esc(view.productId)}</p></section>`,
    );
  }

  const image = product.imageUrl ? `<img src="${esc(product.imageUrl)}" alt="${esc(product.title)}" />` : '';
  const price = product.price !== undefined
    ? `<p class="price">${esc(formatMoney(product.price, product.currencyCode ?? ctx.currencyCode))}</p>`
    : '';
  const categories = product.categories
    .map((c) => `<a href="/browse/${esc(encodeURIComponent(c))}">${esc(c)}</a>`)
    .join(' · ');
  const body = `<section class="product-detail" data-product-id="${esc(product.id)}">
  ${image}
  <div class="info">
    <h1>${esc(product.title)}</h1>
    ${product.brands.length ? `<p class="brands">${esc(product.brands.join(', '))}</p>` : ''}
    ${price}
    ${product.averageRating !== undefined ? `<p class="rating">${esc(product.averageRating)} / 5 (${esc(product.ratingCount ?? 0)})</p>` : ''}
    ${product.description ? `<p class="description">${esc(product.description)}</p>` : ''}
    ${categories ? `<p class="categories">${categories}</p>` : ''}
    ${addToCartForm(product, view.attributionToken, true)}
  </div>
</section>`;
  return layout({ ...ctx, title: product.title, error: view.error, event: view.event }, body);
}

export function renderCart(view: CartView, ctx: PageContext): string {
  const rows = view.lines.map((line) => `<tr data-product-id="${esc(line.productId)}"${line.placeholder ? ' class="placeholder"' : ''}>
      <td>${line.imageUrl ? `<img src="${esc(line.imageUrl)}" alt="" width="64" />` : ''}</td>
      <td><a href="${esc(productHref(line.productId))}">${esc(line.title)}</a></td>
      <td>${esc(formatMoney(line.unitPrice, ctx.currencyCode))}</td>
      <td>${line.quantity}</td>
      <td>${esc(formatMoney(line.lineTotal, ctx.currencyCode))}</td>
      <td>
        <form action="/cart/remove" method="post">
          <input type="hidden" name="product_id" value="${esc(line.productId)}" />
          <button type="submit">Remove</button>
        </form>
      </td>
    </tr>`);

  const body = view.lines.length === 0
    ? '<section class="cart"><h1>Your cart</h1><p class="empty">Your cart is empty.</p></section>'
    : `<section class="cart">
  <h1>Your cart</h1>
  <table>
    <thead><tr><th></th><th>Product</th><th>Price</th><th>Qty</th><th>Total</th><th></th></tr></thead>
    <tbody>
    ${rows.join('\n    ')}
    </tbody>
  </table>
  <p class="cart-total">Total: <strong>${esc(formatMoney(view.total, ctx.currencyCode))}</strong></p>
  <form action="/checkout" method="post"><button type="submit">Checkout</button></form>
</section>`;
  return layout({ ...ctx, title: 'Cart', event: view.event }, body);
}

export function renderConfirmation(order: Order, ctx: PageContext): string {
  const items = order.items
    .map((item) => `<li data-product-id="${esc(item.productId)}">${esc(item.productId)} × ${item.quantity} — ${esc(formatMoney(item.unitPrice * item.quantity, ctx.currencyCode))}</li>`)
    .join('\n    ');
  const body = `<section class="confirmation">
  <h1>Thank you for your order</h1>
  <p>Order number <code class="transaction-id">${esc(order.transactionId)}</code></p>
  <ul>
    ${items}
  </ul>
  <p class="order-total">Total: <strong>${esc(formatMoney(order.total, ctx.currencyCode))}</strong></p>
  <a href="/">Continue shopping</a>
</section>`;
  return layout({ ...ctx, title: 'Order confirmed' }, body);
}

function chatTurn(turn: ChatTurn): string {
  const followup = turn.followupQuestion ? `<p class="followup">${esc(turn.followupQuestion)}</p>` : '';
  const answers = turn.suggestedAnswers?.length
    ? `<div class="suggestions">${turn.suggestedAnswers.map((a) => `<button type="button" class="suggestion" data-answer="${esc(a)}">${esc(a)}</button>`).join(' ')}</div>`
    : '';
  const refined = turn.refinedQuery
    ? `<a class="refined" href="/search?query=${esc(encodeURIComponent(turn.refinedQuery))}">See results for “${esc(turn.refinedQuery)}”</a>`
    : '';
  return `<li class="turn turn-${turn.role}"><p>${esc(turn.text)}</p>${followup}${answers}${refined}</li>`;
}

export function renderChat(history: ChatTurn[], state: ConversationState, ctx: PageContext): string {
  const body = `<section class="chat" data-state="${state}">
  <h1>Shopping assistant</h1>
  <ol class="transcript" id="transcript">
    ${history.map(chatTurn).join('\n    ')}
  </ol>
  <div class="chat-products" id="chat-products"></div>
  <form class="chat-input" id="chat-form">
    <input type="text" name="message" maxlength="${MAX_CHAT_MESSAGE_LENGTH}" autocomplete="off" placeholder="What are you looking for?" required />
    <button type="submit">Send</button>
  </form>
  <form action="/chat/clear" method="post"><button type="submit">Start over</button></form>
</section>
<script src="/static/js/chat.js" defer></script>`;
  return layout({ ...ctx, title: 'Shopping assistant' }, body);
}

export function renderError(message: string, ctx: PageContext): string {
  return layout({ ...ctx, title: 'Something went wrong', error: message }, '<section><h1>Something went wrong</h1><a href="/">Back to the store</a></section>');
}
