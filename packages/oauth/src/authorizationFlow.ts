import {
  ExchangeError,
  SessionNotFoundError,
  ValidationError,
  silentLogger,
} from '@riskscan/core';
import type { Logger } from '@riskscan/core';
import { assertOAuthConfigured, describeConfig } from './config.js';
import type { AuthorizationFlow, AuthorizationFlowDeps, FlowState } from './types.js';

const FORWARD_ORDER: FlowState[] = [
  'Idle',
  'SessionCreated',
  'CodeReceived',
  'TokenExchanged',
  'ProfileFetched',
  'IdentityUpserted',
];

const TERMINAL_FAILURES: ReadonlySet<FlowState> = new Set<FlowState>(['SessionExpired', 'ExchangeFailed']);

/**
 * Tracks one login attempt. Transitions only move forward; a failure state
 * ends the attempt.
 */
class FlowTracker {
  private current: FlowState = 'Idle';
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  advance(to: FlowState): void {
    const from = this.current;
    if (TERMINAL_FAILURES.has(from)) {
      throw new Error(`Flow already ended in ${from}`);
    }
    if (!TERMINAL_FAILURES.has(to) && FORWARD_ORDER.indexOf(to) <= FORWARD_ORDER.indexOf(from)) {
      throw new Error(`Flow cannot move from ${from} to ${to}`);
    }

    this.current = to;
    if (TERMINAL_FAILURES.has(to)) {
      this.logger.warn('Authorization flow failed', { from, to });
    } else {
      this.logger.info('Authorization flow transition', { from, to });
    }
  }
}

/**
 * Create the login flow: authorize redirect on the way out, code exchange,
 * profile fetch and identity upsert on the way back.
 */
export function createAuthorizationFlow(deps: AuthorizationFlowDeps): AuthorizationFlow {
  const { config, sessions, tokens, identities } = deps;
  const logger = (deps.logger ?? silentLogger).child({ component: 'authorization-flow' });

  return {
    async beginLogin() {
      assertOAuthConfigured(config);
      const flow = new FlowTracker(logger);

      const session = await sessions.create();
      flow.advance('SessionCreated');

      const url = new URL(config.endpoints.authorizeUrl);
      url.searchParams.set('client_key', config.clientKey);
      url.searchParams.set('response_type', 'code');
      url.searchParams.set('scope', config.scopes);
      url.searchParams.set('redirect_uri', config.redirectUri);
      url.searchParams.set('state', session.state);
      url.searchParams.set('code_challenge', session.codeChallenge);
      url.searchParams.set('code_challenge_method', 'S256');

      return { redirectUrl: url.toString(), state: session.state };
    },

    async handleCallback(params) {
      assertOAuthConfigured(config);
      const { code, state, error } = params;

      if (!state) {
        throw new ValidationError('Missing state parameter', { parameter: 'state' });
      }
      if (!error && !code) {
        throw new ValidationError('Missing code parameter', { parameter: 'code' });
      }

      // The callback belongs to a session created by an earlier beginLogin().
      const flow = new FlowTracker(logger);
      flow.advance('SessionCreated');

      let codeVerifier: string;
      try {
        codeVerifier = await sessions.consume(state);
      } catch (err) {
        if (err instanceof SessionNotFoundError) flow.advance('SessionExpired');
        throw err;
      }

      if (error || !code) {
        flow.advance('ExchangeFailed');
        throw new ExchangeError(`Authorization was not granted: ${error ?? 'no code'}`, null, {
          error,
          error_description: params.errorDescription ?? null,
        });
      }
      flow.advance('CodeReceived');

      try {
        const tokenSet = await tokens.exchange(code, codeVerifier);
        flow.advance('TokenExchanged');

        const profile = await tokens.fetchProfile(tokenSet.accessToken);
        flow.advance('ProfileFetched');

        const identity = await identities.upsert(profile.openId, tokenSet, profile);
        flow.advance('IdentityUpserted');
        return identity;
      } catch (err) {
        if (err instanceof ExchangeError) flow.advance('ExchangeFailed');
        throw err;
      }
    },

    configStatus() {
      return describeConfig(config);
    },
  };
}
