/**
 * Fetch targets and raw page content
 */

export const BACKEND_KINDS = ["http", "browser"] as const;

/**
 * Fetch backend selector
 * - http: plain GET + HTML parsing
 * - browser: headless Chromium, JavaScript-rendered DOM
 */
export type BackendKind = (typeof BACKEND_KINDS)[number];

export function otherBackend(kind: BackendKind): BackendKind {
  return kind === "http" ? "browser" : "http";
}

/**
 * One listing page on a given backend (1-based)
 */
export interface PageDescriptor {
  page: number;
  backend: BackendKind;
}

/**
 * What a fetch backend is asked to load
 */
export type FetchTarget =
  | { kind: "listing"; page: number }
  | { kind: "detail"; orderId: number; url: string };

/**
 * Rendered page returned by a backend
 */
export interface RawContent {
  html: string;
  status: number;
  /** Final URL after redirects */
  url: string;
  backend: BackendKind;
}

export function describeTarget(target: FetchTarget): string {
  return target.kind === "listing"
    ? `listing page ${target.page}`
    : `detail of order ${target.orderId}`;
}
