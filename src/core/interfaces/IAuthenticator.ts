import type { Session } from "@/core/domain/Session";

/**
 * Authenticator interface
 *
 * Owns exactly one session at a time.
 */
export interface IAuthenticator<TSession extends Session = Session> {
  /**
   * Existing session if one is held, otherwise run the login flow.
   * @throws AuthenticationError
   */
  ensureSession(): Promise<TSession>;

  /**
   * Drop the current session so the next ensureSession() logs in again
   */
  invalidate(): Promise<void>;

  /**
   * Release every resource (cookies, browser)
   */
  close(): Promise<void>;
}
