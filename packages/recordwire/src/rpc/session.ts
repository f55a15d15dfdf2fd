/**
 * Session state.
 *
 * The session is an immutable snapshot. Every transition builds a new one,
 * so a reader holding a snapshot never sees a half-applied change.
 */
import { ConnectionError, SessionError } from "../errors";

// ============================================================
// Types
// ============================================================

/**
 * Passed to `use()` for a scope part that should stay as it is.
 */
export const KEEP: unique symbol = Symbol("recordwire.keep");

export type Keep = typeof KEEP;

/**
 * A namespace or database argument: a name selects it, `null` clears it
 * and {@link KEEP} leaves it unchanged.
 */
export type ScopeChange = string | null | Keep;

export type ConnectionState =
  | Readonly<{ status: "disconnected" }>
  | Readonly<{ status: "connecting" }>
  | Readonly<{ status: "connected"; authenticated: boolean }>;

export type Session = Readonly<{
  connection: ConnectionState;
  authToken: string | undefined;
  namespace: string | undefined;
  database: string | undefined;
  variables: Readonly<Record<string, unknown>>;
}>;

// ============================================================
// Transitions
// ============================================================

export const INITIAL_SESSION: Session = Object.freeze({
  connection: Object.freeze({ status: "disconnected" }),
  authToken: undefined,
  namespace: undefined,
  database: undefined,
  variables: Object.freeze({}),
});

function freezeSession(session: Session): Session {
  return Object.freeze({
    ...session,
    connection: Object.freeze({ ...session.connection }),
    variables: Object.freeze({ ...session.variables }),
  });
}

export function isConnected(session: Session): boolean {
  return session.connection.status === "connected";
}

export function isAuthenticated(session: Session): boolean {
  return (
    session.connection.status === "connected" &&
    session.connection.authenticated
  );
}

export const transitions = {
  connecting(): Session {
    return freezeSession({
      ...INITIAL_SESSION,
      connection: { status: "connecting" },
    });
  },

  connected(): Session {
    return freezeSession({
      ...INITIAL_SESSION,
      connection: { status: "connected", authenticated: false },
    });
  },

  disconnected(): Session {
    return INITIAL_SESSION;
  },

  authenticated(session: Session, token: string | undefined): Session {
    return freezeSession({
      ...session,
      connection: { status: "connected", authenticated: true },
      authToken: token,
    });
  },

  invalidated(session: Session): Session {
    return freezeSession({
      ...session,
      connection: {
        status: "connected",
        authenticated: false,
      },
      authToken: undefined,
    });
  },

  scoped(
    session: Session,
    namespace: ScopeChange,
    database: ScopeChange,
  ): Session {
    return freezeSession({
      ...session,
      namespace: applyScope(session.namespace, namespace),
      database: applyScope(session.database, database),
    });
  },

  variableSet(session: Session, name: string, value: unknown): Session {
    return freezeSession({
      ...session,
      variables: { ...session.variables, [name]: value },
    });
  },

  variableUnset(session: Session, name: string): Session {
    const variables = Object.fromEntries(
      Object.entries(session.variables).filter(([key]) => key !== name),
    );
    return freezeSession({ ...session, variables });
  },

  /**
   * Clears token, scope and variables. The connection stays open.
   */
  reset(session: Session): Session {
    return freezeSession({
      ...INITIAL_SESSION,
      connection:
        session.connection.status === "connected" ?
          { status: "connected", authenticated: false }
        : session.connection,
    });
  },
} as const;

function applyScope(
  current: string | undefined,
  change: ScopeChange,
): string | undefined {
  if (change === KEEP) return current;
  return change ?? undefined;
}

// ============================================================
// Holder
// ============================================================

/**
 * Holds the current session and replaces it atomically.
 */
export class SessionState {
  #current: Session = INITIAL_SESSION;

  get current(): Session {
    return this.#current;
  }

  get connection(): ConnectionState {
    return this.#current.connection;
  }

  /**
   * Replaces the snapshot with `transition(current)`.
   *
   * @returns the new snapshot
   */
  apply(transition: (session: Session) => Session): Session {
    this.#current = transition(this.#current);
    return this.#current;
  }

  /**
   * @throws ConnectionError when the transport is not connected
   */
  requireConnected(method: string): Session {
    const session = this.#current;
    if (!isConnected(session)) {
      throw new ConnectionError(`Cannot call ${method}: not connected`, {
        method,
        status: session.connection.status,
      });
    }
    return session;
  }

  /**
   * Gate for query-class calls: a connection plus a selected namespace and
   * database. Authentication is left to the server.
   *
   * @throws ConnectionError when not connected
   * @throws SessionError when namespace or database is unset
   */
  requireScope(method: string): Session {
    const session = this.requireConnected(method);
    if (session.namespace === undefined || session.database === undefined) {
      throw new SessionError(
        `Cannot call ${method}: no ${
          session.namespace === undefined ? "namespace" : "database"
        } selected`,
        { method, namespace: session.namespace, database: session.database },
      );
    }
    return session;
  }
}
