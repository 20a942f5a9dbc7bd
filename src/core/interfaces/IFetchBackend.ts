import type {
  BackendKind,
  FetchTarget,
  RawContent,
} from "@/core/domain/PageDescriptor";
import type { Session } from "@/core/domain/Session";
import type { IAuthenticator } from "@/core/interfaces/IAuthenticator";

/**
 * Fetch backend interface
 *
 * One operation: load a target with a session and return its rendered HTML.
 * Implementations must throw FetchError (transient | permanent) or
 * SessionExpiredError, never a raw library error.
 */
export interface IFetchBackend<TSession extends Session = Session> {
  readonly kind: BackendKind;

  /** Authenticator producing the sessions this backend accepts */
  readonly authenticator: IAuthenticator<TSession>;

  fetch(target: FetchTarget, session: TSession): Promise<RawContent>;

  close(): Promise<void>;
}
