import { SessionStateError, errorMessage, type SessionState } from './errors';
import type { FaxBackend, FaxBackendHandle } from './types';

export type SessionResult = { ok: true } | { ok: false; message: string };

export type SessionOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; stage: 'connect' | 'login'; message: string };

export interface SessionOptions {
  host: string;
  username?: string;
  /** Aborting abandons the session: the backend handle is released immediately. */
  signal?: AbortSignal;
}

const NOT_CONNECTED = 'Not connected to server';

/**
 * One connection to the fax backend, owned by a single request.
 * Unconnected -> Connected -> Authenticated; disconnect returns to Unconnected.
 */
export class FaxSession {
  private readonly handle: FaxBackendHandle;
  private _connected = false;
  private _authenticated = false;
  private released = false;

  constructor(
    backend: FaxBackend,
    readonly host: string,
  ) {
    this.handle = backend.create(host);
  }

  get connected(): boolean {
    return this._connected;
  }

  get authenticated(): boolean {
    return this._authenticated;
  }

  get state(): SessionState {
    if (this._authenticated) return 'authenticated';
    return this._connected ? 'connected' : 'unconnected';
  }

  get isReleased(): boolean {
    return this.released;
  }

  async connect(): Promise<SessionResult> {
    if (this.released) return { ok: false, message: 'Session has been released' };
    if (this._connected) return { ok: true };
    const reply = await this.handle.connect();
    if (!reply.ok) return { ok: false, message: reply.message };
    this._connected = true;
    return { ok: true };
  }

  async login(username?: string): Promise<SessionResult> {
    if (!this._connected) return { ok: false, message: NOT_CONNECTED };
    if (this._authenticated) return { ok: true };
    const reply = await this.handle.login(username ? username : undefined);
    if (!reply.ok) return { ok: false, message: reply.message };
    this._authenticated = true;
    return { ok: true };
  }

  async disconnect(): Promise<true> {
    if (!this._connected) return true;
    this._connected = false;
    this._authenticated = false;
    if (!this.released) {
      const clean = await this.handle.disconnect();
      if (!clean) console.warn(`[Fax] Disconnect from ${this.host} was not clean`);
    }
    return true;
  }

  /** Releases the backend handle. Safe to call more than once. */
  release(): void {
    if (this.released) return;
    this.released = true;
    this._connected = false;
    this._authenticated = false;
    this.handle.destroy();
  }

  authenticatedHandle(operation: string): FaxBackendHandle {
    if (!this._authenticated || this.released) {
      throw new SessionStateError(operation, this.state);
    }
    return this.handle;
  }
}

async function teardown(session: FaxSession): Promise<void> {
  try {
    await session.disconnect();
  } catch (error) {
    console.warn(`[Fax] Disconnect from ${session.host} failed: ${errorMessage(error)}`);
  } finally {
    session.release();
  }
}

function abandonOnAbort(session: FaxSession, signal: AbortSignal | undefined): () => void {
  if (!signal) return () => undefined;
  const abandon = () => {
    console.warn(`[Fax] Session to ${session.host} abandoned by caller`);
    session.release();
  };
  if (signal.aborted) {
    abandon();
    return () => undefined;
  }
  signal.addEventListener('abort', abandon, { once: true });
  return () => signal.removeEventListener('abort', abandon);
}

/**
 * Opens a session, authenticates, runs `operation` and always tears the
 * session down afterwards, whether the operation returned or threw.
 */
export async function withFaxSession<T>(
  backend: FaxBackend,
  options: SessionOptions,
  operation: (session: FaxSession) => Promise<T>,
): Promise<SessionOutcome<T>> {
  const session = new FaxSession(backend, options.host);
  const detach = abandonOnAbort(session, options.signal);
  try {
    const connected = await session.connect();
    if (!connected.ok) return { ok: false, stage: 'connect', message: connected.message };

    const loggedIn = await session.login(options.username);
    if (!loggedIn.ok) return { ok: false, stage: 'login', message: loggedIn.message };

    return { ok: true, value: await operation(session) };
  } finally {
    detach();
    await teardown(session);
  }
}

/** Connect-only reachability check; never logs in. */
export async function probeBackend(backend: FaxBackend, host: string): Promise<SessionResult> {
  const session = new FaxSession(backend, host);
  try {
    return await session.connect();
  } finally {
    await teardown(session);
  }
}
