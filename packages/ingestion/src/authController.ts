import type { Request, Response } from 'express';
import type { AuthorizationFlow } from '@riskscan/oauth';
import type { Logger } from '@riskscan/core';
import { toIdentityView } from './contentQuery.js';
import { readString, sendError } from './http.js';

/**
 * Create the login endpoint handlers.
 * Responses never carry tokens, verifiers or the client secret.
 */
export function createAuthController(auth: AuthorizationFlow, logger: Logger) {
  return {
    /**
     * GET /auth/login
     * Redirects to the provider, or returns `{ redirectUrl, state }` with `?format=json`.
     */
    async login(req: Request, res: Response): Promise<void> {
      try {
        const redirect = await auth.beginLogin();
        if (req.query['format'] === 'json') {
          res.json(redirect);
          return;
        }
        res.redirect(302, redirect.redirectUrl);
      } catch (err) {
        sendError(res, err, logger);
      }
    },

    /**
     * GET /auth/callback
     * Completes the login and returns the connected identity.
     */
    async callback(req: Request, res: Response): Promise<void> {
      try {
        const identity = await auth.handleCallback({
          code: readString(req.query['code']),
          state: readString(req.query['state']),
          error: readString(req.query['error']),
          errorDescription: readString(req.query['error_description']),
        });
        res.json({ ok: true, identity: toIdentityView(identity) });
      } catch (err) {
        sendError(res, err, logger);
      }
    },

    /** GET /auth/config-status */
    configStatus(_req: Request, res: Response): void {
      res.json(auth.configStatus());
    },
  };
}
