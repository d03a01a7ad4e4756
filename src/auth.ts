/**
 * Care API authentication
 *
 * Logs in with username/password, keeps the access token until five
 * minutes before it expires, and renews it through the refresh endpoint,
 * falling back to a fresh login. Concurrent callers share one renewal.
 * A preconfigured access token is used as-is and never renewed.
 */

import { z } from 'zod';
import {
  DEFAULT_TOKEN_LIFETIME_SECONDS,
  SERVER_NAME,
  SERVER_VERSION,
  TIME,
  TIMEOUTS,
  TOKEN_EXPIRY_SKEW_MS,
} from './constants.js';
import { AuthenticationError, HttpStatusError, toError } from './errors.js';
import { HttpClient, type ApiClient } from './http-client.js';
import { ConsoleLogger, type Logger } from './logger.js';

export interface AuthProvider {
  /** Request headers, with `Authorization` when a token is available */
  getHeaders(): Promise<Record<string, string>>;
  authenticate(): Promise<boolean>;
}

export interface AuthHandlerOptions {
  loginUrl: string;
  refreshUrl: string;
  username?: string;
  password?: string;
  /** Static token; disables login and refresh */
  accessToken?: string;
  client?: ApiClient;
  logger?: Logger;
  timeoutMs?: number;
  /** Clock, in epoch milliseconds */
  now?: () => number;
}

const tokenResponseSchema = z.object({
  access: z.string().min(1).optional(),
  access_token: z.string().min(1).optional(),
  refresh: z.string().min(1).optional(),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.coerce.number().positive().optional().catch(undefined),
});

const BASE_HEADERS = {
  'Content-Type': 'application/json',
  Accept: 'application/json',
  'User-Agent': `${SERVER_NAME}/${SERVER_VERSION}`,
} as const;

export class AuthHandler implements AuthProvider {
  private readonly loginUrl: string;
  private readonly refreshUrl: string;
  private readonly username?: string;
  private readonly password?: string;
  private readonly staticToken: boolean;
  private readonly client: ApiClient;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  private accessToken?: string;
  private refreshToken?: string;
  private expiresAt?: number;
  private inFlight?: Promise<boolean>;

  constructor(options: AuthHandlerOptions) {
    this.loginUrl = options.loginUrl;
    this.refreshUrl = options.refreshUrl;
    this.username = options.username;
    this.password = options.password;
    this.accessToken = options.accessToken;
    this.staticToken = options.accessToken !== undefined;
    this.logger = options.logger ?? new ConsoleLogger();
    this.client = options.client ?? new HttpClient({ logger: this.logger });
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.AUTH_MS;
    this.now = options.now ?? Date.now;
  }

  hasCredentials(): boolean {
    return Boolean(this.username && this.password);
  }

  /**
   * Log in with the configured credentials
   *
   * Returns false when there are no credentials or the login fails.
   */
  async authenticate(): Promise<boolean> {
    if (this.staticToken) {
      return true;
    }
    if (!this.hasCredentials()) {
      this.logger.warn('No credentials provided for authentication');
      return false;
    }
    return this.singleFlight(() => this.login());
  }

  isTokenValid(): boolean {
    if (!this.accessToken) return false;
    if (this.expiresAt === undefined) return true;
    return this.now() < this.expiresAt - TOKEN_EXPIRY_SKEW_MS;
  }

  /**
   * Current access token, renewing it first when expired
   */
  async getValidToken(): Promise<string | undefined> {
    if (this.staticToken || this.isTokenValid()) {
      return this.accessToken;
    }
    if (!this.hasCredentials()) {
      return undefined;
    }

    const renewed = await this.singleFlight(() => this.renew());
    return renewed ? this.accessToken : undefined;
  }

  async getHeaders(): Promise<Record<string, string>> {
    const token = await this.getValidToken();
    return token
      ? { ...BASE_HEADERS, Authorization: `Bearer ${token}` }
      : { ...BASE_HEADERS };
  }

  private singleFlight(task: () => Promise<boolean>): Promise<boolean> {
    if (!this.inFlight) {
      this.inFlight = task().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async renew(): Promise<boolean> {
    if (this.refreshToken && await this.refresh(this.refreshToken)) {
      return true;
    }
    return this.login();
  }

  private async login(): Promise<boolean> {
    try {
      const response = await this.client.send({
        method: 'POST',
        url: this.loginUrl,
        headers: { ...BASE_HEADERS },
        body: { username: this.username, password: this.password },
        timeoutMs: this.timeoutMs,
      });
      this.storeTokens(response.data);
      this.logger.info('Authenticated with Care API', { username: this.username });
      return true;
    } catch (error) {
      this.logger.error('Authentication failed', toError(error), this.failureContext(error));
      return false;
    }
  }

  private async refresh(refreshToken: string): Promise<boolean> {
    try {
      const response = await this.client.send({
        method: 'POST',
        url: this.refreshUrl,
        headers: { ...BASE_HEADERS },
        body: { refresh: refreshToken },
        timeoutMs: this.timeoutMs,
      });
      this.storeTokens(response.data);
      this.logger.info('Access token refreshed');
      return true;
    } catch (error) {
      this.logger.warn('Token refresh failed, logging in again', {
        error: toError(error).message,
        ...this.failureContext(error),
      });
      return false;
    }
  }

  /**
   * Keep the tokens from a login or refresh answer
   *
   * A refresh answer without a new refresh token keeps the current one.
   */
  private storeTokens(data: unknown): void {
    const parsed = tokenResponseSchema.safeParse(data);
    const accessToken = parsed.success ? parsed.data.access ?? parsed.data.access_token : undefined;
    if (!parsed.success || !accessToken) {
      throw new AuthenticationError('Token response did not include an access token');
    }

    this.accessToken = accessToken;
    this.refreshToken = parsed.data.refresh ?? parsed.data.refresh_token ?? this.refreshToken;

    const lifetimeSeconds = parsed.data.expires_in ?? DEFAULT_TOKEN_LIFETIME_SECONDS;
    this.expiresAt = this.now() + lifetimeSeconds * TIME.MS_PER_SECOND;
  }

  private failureContext(error: unknown): Record<string, unknown> {
    return error instanceof HttpStatusError ? { status: error.status } : {};
  }
}
