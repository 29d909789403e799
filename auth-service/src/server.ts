/**
 * Auth Server
 *
 * Front controller: a single entry point that validates a request, picks the
 * handler for its `type` and turns the outcome into a response. Errors never
 * escape; every failure becomes `{ result: false, error: { code, message } }`
 * with a code from AUTH_ERRORS. Passwords are never echoed or logged.
 */

import type { AccessEngine } from 'access-engine';
import {
  AuthError,
  NotFoundError,
  assertValid,
  generateCorrelationId,
  getErrorMessage,
  isServiceError,
  logger as defaultLogger,
  retry,
  STORAGE_READ_RETRY,
  type,
  withCorrelationId,
  type Logger,
} from 'core-service';
import { AUTH_ERRORS, ERROR_CODE_BY_KIND, type AuthErrorCode } from './error-codes.js';
import type { AccountStore } from './services/accounts.js';
import type { ActivationManager } from './services/activations.js';
import type { SessionManager } from './services/sessions.js';
import type { PasswordHasher } from './types.js';

// ═══════════════════════════════════════════════════════════════════
// Request Schemas
// ═══════════════════════════════════════════════════════════════════

const credentials = {
  email: 'string.email',
  password: 'string > 0',
} as const;

const registerRequest = type({ type: "'register'", ...credentials });
const activateRequest = type({ type: "'activate'", token: 'string > 0' });
const resendActivationRequest = type({ type: "'resend-activation'", email: 'string.email' });
const loginRequest = type({ type: "'login'", ...credentials });
const authorizeRequest = type({ type: "'authorize'", objectId: 'string > 0', 'sessionToken?': 'string' });
const logoutRequest = type({ type: "'logout'", sessionToken: 'string > 0' });

export const REQUEST_TYPES = ['register', 'activate', 'resend-activation', 'login', 'authorize', 'logout'] as const;

export type AuthRequestType = typeof REQUEST_TYPES[number];

export type AuthResponseData = {
  userId?: string;
  sessionToken?: string;
  allowed?: boolean;
};

export interface AuthResponse {
  type: string;
  /** Whether the request was processed; for authorize see data.allowed */
  result: boolean;
  data?: AuthResponseData;
  error?: { code: AuthErrorCode; message: string };
}

export interface AuthServerComponents {
  accounts: AccountStore;
  sessions: SessionManager;
  activations: ActivationManager;
  engine: AccessEngine;
  hasher: PasswordHasher;
  defaultRoleId: string;
  anonymousRoleId: string;
  logger?: Logger;
}

type Handler = (request: unknown) => Promise<AuthResponseData>;

function isRequestType(value: unknown): value is AuthRequestType {
  return typeof value === 'string' && REQUEST_TYPES.some(known => known === value);
}

function requestTypeOf(request: unknown): unknown {
  return typeof request === 'object' && request !== null && 'type' in request ? request.type : undefined;
}

export class AuthServer {
  private handlers: Record<AuthRequestType, Handler>;
  private log: Logger;

  constructor(private components: AuthServerComponents) {
    this.log = components.logger ?? defaultLogger;
    this.handlers = {
      register: request => this.register(request),
      activate: request => this.activate(request),
      'resend-activation': request => this.resendActivation(request),
      login: request => this.login(request),
      authorize: request => this.authorize(request),
      logout: request => this.logout(request),
    };
  }

  /**
   * Handle one request and resolve its response; never rejects
   */
  handleRequest(request: unknown): Promise<AuthResponse> {
    return withCorrelationId(generateCorrelationId(), () => this.dispatch(request));
  }

  private async dispatch(request: unknown): Promise<AuthResponse> {
    const requestType = requestTypeOf(request);
    const type = typeof requestType === 'string' ? requestType : 'unknown';

    if (!isRequestType(requestType)) {
      this.log.warn('Unrecognized request type', { type });
      return {
        type,
        result: false,
        error: { code: AUTH_ERRORS.UnknownRequestType, message: `Unrecognized request type: ${type}` },
      };
    }

    try {
      const data = await this.handlers[requestType](request);
      this.log.info('Request handled', { type });
      return { type, result: true, data };
    } catch (error) {
      return { type, result: false, error: this.toErrorBody(type, error) };
    }
  }

  private toErrorBody(type: string, error: unknown): { code: AuthErrorCode; message: string } {
    if (isServiceError(error)) {
      const code = ERROR_CODE_BY_KIND[error.kind];
      this.log.info('Request failed', { type, code });
      return { code, message: error.message };
    }
    this.log.error('Request failed unexpectedly', { type, error: getErrorMessage(error) });
    return { code: AUTH_ERRORS.InternalError, message: 'Internal error' };
  }

  // ═══════════════════════════════════════════════════════════════════
  // Handlers
  // ═══════════════════════════════════════════════════════════════════

  private async register(request: unknown): Promise<AuthResponseData> {
    const { email, password } = assertValid(registerRequest(request), 'register request');
    const passwordHash = await this.components.hasher.hash(password);
    const userId = await this.components.accounts.register(email, passwordHash, this.components.defaultRoleId);
    return { userId };
  }

  private async activate(request: unknown): Promise<AuthResponseData> {
    const { token } = assertValid(activateRequest(request), 'activate request');
    const userId = await this.components.activations.redeem(token);
    return { userId };
  }

  private async resendActivation(request: unknown): Promise<AuthResponseData> {
    const { email } = assertValid(resendActivationRequest(request), 'resend-activation request');
    // Same answer whether or not the address has an account awaiting activation
    try {
      const user = await this.components.accounts.find({ email });
      await this.components.activations.reissue(user.id);
    } catch (error) {
      if (!(error instanceof NotFoundError || error instanceof AuthError)) {
        throw error;
      }
      this.log.info('Activation resend skipped', { reason: error.kind });
    }
    return {};
  }

  private async login(request: unknown): Promise<AuthResponseData> {
    const { email, password } = assertValid(loginRequest(request), 'login request');
    const sessionToken = await this.components.sessions.login(email, password);
    return { sessionToken };
  }

  /**
   * Resolve the caller's role (anonymous without a session) and check it
   */
  private async authorize(request: unknown): Promise<AuthResponseData> {
    const { objectId, sessionToken } = assertValid(authorizeRequest(request), 'authorize request');

    let userId: string | null = null;
    let currentToken: string | undefined;
    if (sessionToken) {
      const session = await this.components.sessions.refresh(sessionToken);
      userId = session.userId;
      currentToken = session.sessionToken;
    }

    const { result: allowed } = await retry(
      async () => {
        const roleId = userId === null
          ? this.components.anonymousRoleId
          : (await this.components.accounts.find({ userId })).roleId;
        return this.components.engine.can(roleId, objectId);
      },
      { ...STORAGE_READ_RETRY, name: 'authorize' }
    );

    return currentToken === undefined ? { allowed } : { allowed, sessionToken: currentToken };
  }

  private async logout(request: unknown): Promise<AuthResponseData> {
    const { sessionToken } = assertValid(logoutRequest(request), 'logout request');
    const userId = await this.components.sessions.validate(sessionToken);
    await this.components.sessions.logout(userId);
    return {};
  }
}
