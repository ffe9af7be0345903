/**
 * Local Redirect Listener
 *
 * Loopback HTTP endpoint on the one fixed redirect port. Bound for the
 * lifetime of the client, not per flow. The handler is synchronous, so
 * requests are dispatched strictly one after another.
 */

import express, { type Express, type Request, type Response } from 'express';
import { createServer, type Server } from 'node:http';
import { logger } from '@hostloop/observability';
import type { RedirectDispatcher } from './redirect-dispatcher.js';
import { renderRedirectPage } from './redirect-page.js';
import { REDIRECT_HOST } from './providers/base-provider.js';
import type { RedirectParams } from './providers/types.js';

export interface RedirectListenerOptions {
  port: number;
  /** Defaults to the host the redirect URIs name */
  host?: string;
}

/**
 * Fatal at startup: another process owns the redirect port
 */
export class RedirectPortInUseError extends Error {
  readonly code = 'redirect_port_in_use';

  constructor(public readonly port: number) {
    super(`OAuth redirect port ${port} is already in use`);
    this.name = 'RedirectPortInUseError';
  }
}

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  return undefined;
}

export function parseRedirectQuery(query: Request['query']): RedirectParams {
  return {
    code: firstString(query.code),
    state: firstString(query.state),
    error: firstString(query.error),
    error_description: firstString(query.error_description),
  };
}

export class RedirectListener {
  private readonly app: Express;
  private server?: Server;
  private readonly host: string;

  constructor(
    private readonly dispatcher: RedirectDispatcher,
    private readonly options: RedirectListenerOptions
  ) {
    this.host = options.host ?? REDIRECT_HOST;
    this.app = express();
    this.app.disable('x-powered-by');
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get('/', (req: Request, res: Response) => {
      const outcome = this.dispatcher.dispatch(parseRedirectQuery(req.query));
      const page = renderRedirectPage(outcome);

      logger.oauthDebug('Redirect handled', { outcome: outcome.kind, status: page.status });

      res.setHeader('Cache-Control', 'no-store');
      res.setHeader('Pragma', 'no-cache');
      res.status(page.status).type('html').send(page.html);
    });

    this.app.use((_req: Request, res: Response) => {
      res.setHeader('Cache-Control', 'no-store');
      res.status(404).type('text').send('Not found');
    });
  }

  /**
   * Bind the redirect port. Rejects with RedirectPortInUseError when the
   * port is taken.
   */
  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = createServer(this.app);

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        if ('code' in error && error.code === 'EADDRINUSE') {
          reject(new RedirectPortInUseError(this.options.port));
        } else {
          reject(error);
        }
      };

      server.once('error', onError);
      server.listen(this.options.port, this.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (error: Error) => {
      logger.oauthError('Redirect listener error', error);
    });

    this.server = server;
    logger.oauthInfo('Redirect listener started', { host: this.host, port: this.options.port });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;

    await new Promise<void>((resolve, reject) => {
      server.close((error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
      server.closeAllConnections();
    });

    logger.oauthInfo('Redirect listener stopped', { port: this.options.port });
  }

  getHost(): string {
    return this.host;
  }

  isListening(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Get the Express app for testing
   */
  getApp(): Express {
    return this.app;
  }
}
