/**
 * Portal SDK - Session
 *
 * Holds the portal address, the credentials and the access token issued by
 * the login endpoint.
 */

import { ConfigurationError, PreconditionError } from './errors.js';

export interface Credentials {
  server: string;
  login: string;
  key: string;
}

/** Strip one trailing slash, so `http://x/` and `http://x` are the same server. */
export function normalizeServer(server: string): string {
  return server.endsWith('/') ? server.slice(0, -1) : server;
}

export class Session {
  private _server: string | null = null;
  private _login: string | null = null;
  private _key: string | null = null;
  private _accessToken: string | null = null;

  constructor(server?: string, login?: string, key?: string) {
    this.configure(server, login, key);
  }

  /**
   * Store whichever credentials are given. Empty values leave the current
   * ones in place.
   */
  configure(server?: string, login?: string, key?: string): void {
    if (server) this._server = normalizeServer(server);
    if (login) this._login = login;
    if (key) this._key = key;
  }

  get server(): string | null {
    return this._server;
  }

  get accessToken(): string | null {
    return this._accessToken;
  }

  get isLoggedIn(): boolean {
    return this._accessToken !== null;
  }

  /** Credentials for a login call; fails on the first missing field. */
  credentials(): Credentials {
    if (!this._server) throw new ConfigurationError('server', 'Server is required.');
    if (!this._login) throw new ConfigurationError('login', 'Login is required.');
    if (!this._key) throw new ConfigurationError('key', 'Key is required.');
    return { server: this._server, login: this._login, key: this._key };
  }

  setToken(token: string): void {
    this._accessToken = token;
  }

  logoff(): void {
    this._accessToken = null;
  }

  requireToken(): string {
    if (this._accessToken === null) {
      throw new PreconditionError();
    }
    return this._accessToken;
  }
}
