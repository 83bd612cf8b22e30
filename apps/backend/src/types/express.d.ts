import type { IAuthContext } from '@everly/types';

declare global {
  namespace Express {
    interface Request {
      /** Correlation id set by the request-context middleware. */
      id?: string;

      /** Identity set by the authentication guard on protected routes. */
      auth?: IAuthContext;
    }
  }
}

export {};
