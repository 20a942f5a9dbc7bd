/**
 * Login page recognition
 */

import { loadHtml } from "@/extractors/common/DOMHelper";

const TOKEN_INPUT = /name=["']_token["']\s+value=["']([^"']+)["']/;
const TOKEN_META = /csrf-token["']\s+content=["']([^"']+)["']/;

/**
 * Anti-forgery token of a login page (hidden input first, then meta tag)
 */
export function extractCsrfToken(html: string): string | null {
  return TOKEN_INPUT.exec(html)?.[1] ?? TOKEN_META.exec(html)?.[1] ?? null;
}

export function isLoginUrl(url: string): boolean {
  return url.toLowerCase().includes("login");
}

/**
 * A page carrying the login form (email + password inputs)
 */
export function hasLoginForm(html: string): boolean {
  const $ = loadHtml(html);
  return (
    $('input[name="password"]').length > 0 &&
    $('input[name="email"]').length > 0
  );
}

/**
 * Whether an authenticated request was bounced to the login page
 */
export function looksLikeLoginPage(html: string, url: string): boolean {
  return isLoginUrl(url) || hasLoginForm(html);
}
