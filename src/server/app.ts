/**
 * Express wiring for the route table, plus server assembly from config.
 */
import express, { type ErrorRequestHandler, type Express, type Request, type RequestHandler, type Response } from 'express';
import { strToBytes } from '../crypto/encoding.js';
import { secureRandom } from '../crypto/random.js';
import type { ErrorResponseDto } from '../wire.js';
import { getProtocolSuite } from '../protocol/suite.js';
import type { ServerConfig } from './config.js';
import { CredentialIssuer } from './credential.js';
import { type Logger, consoleLogger } from './logger.js';
import { type Route, createRoutes } from './routes.js';
import { AuthService } from './service.js';

/** The 4xx status a body-parser error carries (bad JSON, too large, bad charset). */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) {
    return err instanceof SyntaxError ? 400 : undefined;
  }
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(routes: Route[], logger: Logger = consoleLogger('Server')): Express {
  const app = express();
  app.use(express.json({ limit: '16kb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  for (const route of routes) {
    const handler: RequestHandler = (req, res, next) => {
      route
        .handle({ body: req.body, authorization: req.get('authorization') })
        .then(({ status, body }) => {
          res.status(status).json(body);
        })
        .catch(next);
    };
    switch (route.method) {
      case 'GET': app.get(route.path, handler); break;
      case 'POST': app.post(route.path, handler); break;
      case 'DELETE': app.delete(route.path, handler); break;
    }
  }

  // Body-parser failures and anything a handler let through.
  const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      const message = err instanceof SyntaxError
        ? 'request body is not valid JSON'
        : err instanceof Error ? err.message : 'malformed request';
      logger.debug(`Rejected request body: ${status} ${message}`);
      const body: ErrorResponseDto = { error: 'MalformedRequest', message };
      res.status(status).json(body);
      return;
    }
    logger.error('Unhandled error', err);
    const body: ErrorResponseDto = { error: 'Internal', message: 'internal server error' };
    res.status(500).json(body);
  };
  app.use(onError);

  return app;
}

export interface AssembledServer {
  app: Express;
  service: AuthService<unknown>;
}

/** Build the service and Express app described by `config`. */
export function assembleServer(config: ServerConfig, logger: Logger = consoleLogger('Server')): AssembledServer {
  const suite = getProtocolSuite(config.suite);
  let key: Uint8Array;
  if (config.credentialSecret === undefined) {
    logger.warn('ZKP_CREDENTIAL_SECRET is not set; credentials will not survive a restart');
    key = secureRandom(32);
  } else {
    key = strToBytes(config.credentialSecret);
  }
  const service = new AuthService({
    suite,
    credentials: new CredentialIssuer(key, config.credentialTtlMs),
    sessionTtlMs: config.sessionTtlMs,
    replayWindowMs: config.replayWindowMs,
    allowOverwrite: config.allowOverwrite,
    logger: consoleLogger('AuthService'),
  });
  const routes = createRoutes(service, {
    argon2MemoryKib: config.argon2MemoryKib,
    argon2Iterations: config.argon2Iterations,
    argon2Parallelism: config.argon2Parallelism,
  }, consoleLogger('Routes'));
  return { app: createApp(routes, logger), service };
}
