import express from 'express';
import type { Application, Request, Response } from 'express';
import { createServer } from 'http';
import type { Server as HttpServerType } from 'http';
import cors from 'cors';
import { singleton, inject } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { ILoggerFactory, Logger } from '../../core/logging/types.js';
import { HmacAuthentication } from '../../protocol/hmac-authentication.js';
import type { ProcessLifecyclePolicy } from '../../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../../runtime/ports/process-signals.js';
import type { ShutdownEvents, ShutdownSignal } from '../../runtime/ports/shutdown-events.js';
import { createHmacMiddleware } from './hmac-middleware.js';
import type { HmacMiddlewarePair } from './hmac-middleware.js';

export const GREETING = 'Hello, world!';

const CLOSE_TIMEOUT_MS = 5000;

/**
 * Demo server: every route answers "Hello, world!" behind the HMAC pair.
 *
 * - CORS open, with the signature header exposed to browsers
 * - Request logging at debug
 * - Graceful stop on SIGINT/SIGTERM when the lifecycle policy allows it
 */
@singleton()
export class HttpServer {
  private readonly app: Application;
  private readonly logger: Logger;
  private readonly hmacMiddleware: HmacMiddlewarePair;
  private server: HttpServerType | null = null;
  private baseUrl: string = '';
  private signalHandlersInstalled = false;

  constructor(
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Hmac.Authentication) private readonly auth: HmacAuthentication,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
    @inject(DI.Runtime.ProcessLifecyclePolicy)
    private readonly processLifecyclePolicy: ProcessLifecyclePolicy,
    @inject(DI.Runtime.ProcessSignals)
    private readonly processSignals: ProcessSignals,
    @inject(DI.Runtime.ShutdownEvents)
    private readonly shutdownEvents: ShutdownEvents
  ) {
    this.logger = loggerFactory.create('http');
    this.hmacMiddleware = createHmacMiddleware(this.auth, {
      logger: this.logger.child({ component: 'hmac' }),
      statusPolicy: this.config.hmac.statusPolicy,
      maxBodyBytes: this.config.hmac.maxBodyBytes,
    });
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * The Express application, for in-process tests.
   */
  getApp(): Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.disable('x-powered-by');

    this.app.use(cors({
      origin: '*',
      exposedHeaders: [this.auth.headerName],
    }));

    this.app.use((req, res, next) => {
      const start = Date.now();
      res.on('finish', () => {
        this.logger.debug(
          { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - start },
          'Request completed'
        );
      });
      next();
    });

    this.app.use(this.hmacMiddleware.authenticate, this.hmacMiddleware.sign);
  }

  private setupRoutes(): void {
    this.app.all('*', (_req: Request, res: Response) => {
      res.type('text/plain').send(GREETING);
    });
    this.app.use(this.hmacMiddleware.skipSigningOnError);
  }

  /**
   * Start listening. Port 0 picks a free port; the returned URL has the real one.
   */
  async start(port: number = this.config.server.port): Promise<string> {
    if (this.server) return this.baseUrl;

    const server = createServer(this.app);

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;
    const address = server.address();
    const boundPort = address !== null && typeof address === 'object' ? address.port : port;
    this.baseUrl = `http://localhost:${boundPort}`;

    this.installSignalHandlers();
    this.logger.info({ url: this.baseUrl, header: this.auth.headerName }, 'Server listening');
    return this.baseUrl;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve) => {
      const closeTimeout = setTimeout(() => {
        this.logger.warn({ timeoutMs: CLOSE_TIMEOUT_MS }, 'Server close timed out, forcing shutdown');
        server.closeAllConnections();
        resolve();
      }, CLOSE_TIMEOUT_MS);

      server.close(() => {
        clearTimeout(closeTimeout);
        this.logger.info('Server stopped');
        resolve();
      });
      server.closeIdleConnections();
    });
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Signal handlers stop the server and emit a shutdown request.
   * The server never exits the process itself; the composition root decides.
   */
  private installSignalHandlers(): void {
    if (this.processLifecyclePolicy.kind === 'no_signal_handlers') return;
    if (this.signalHandlersInstalled) return;
    this.signalHandlersInstalled = true;

    let isShuttingDown = false;

    const onSignal = async (signal: ShutdownSignal): Promise<void> => {
      if (isShuttingDown) return;
      isShuttingDown = true;

      this.logger.info({ signal }, 'Shutting down');
      try {
        await this.stop();
      } finally {
        this.shutdownEvents.emit({ kind: 'shutdown_requested', signal });
      }
    };

    this.processSignals.on('SIGINT', () => onSignal('SIGINT'));
    this.processSignals.on('SIGTERM', () => onSignal('SIGTERM'));
  }
}
