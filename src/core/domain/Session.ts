/**
 * Authenticated sessions
 *
 * A session is owned by the authenticator that created it and is passed
 * explicitly into every fetch. Validity is never checked up front: a fetch
 * that lands on the login page reports SessionExpiredError and the caller
 * asks the authenticator for a fresh one.
 */

import type { BrowserContext, Page } from "playwright";
import type { CookieJar } from "@/auth/CookieJar";

export interface HttpSession {
  backend: "http";
  cookies: CookieJar;
  csrfToken: string | null;
  createdAt: Date;
}

export interface BrowserSession {
  backend: "browser";
  context: BrowserContext;
  page: Page;
  createdAt: Date;
}

export type Session = HttpSession | BrowserSession;
