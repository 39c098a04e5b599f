import type { Server } from 'http';

import {
  DefaultExecutionEventBusManager,
  DefaultRequestHandler,
  InMemoryTaskStore,
} from '@a2a-js/sdk/server';
import { A2AExpressApp } from '@a2a-js/sdk/server/express';
import cors from 'cors';
import express, {
  json,
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from 'express';

import type { ServiceConfig } from '../config.js';
import { Logger } from '../utils/logger.js';

import { buildAgentCard, normalizePath, resolveBaseUrl } from './agentCard.js';
import { createAgentExecutor } from './agentExecutor.js';
import { SSE_HEADERS, ServerSentEventsChannel } from './channels/index.js';
import type { TaskEngine } from './tasks/engine.js';
import { UnknownTaskError } from './tasks/errors.js';

export interface ServerConfig {
  serviceConfig: ServiceConfig;
  engine: TaskEngine;
}

/**
 * Builds the express app: A2A JSON-RPC and SSE on the configured path, the
 * agent card, a health check and a per-task event stream fed by the engine.
 */
export function createA2AApp(config: ServerConfig): Express {
  const { serviceConfig, engine } = config;
  const app = express();
  app.set('trust proxy', true);

  setupMiddleware(app, { logRequests: serviceConfig.logging.enabled });

  const a2aPath = normalizePath(serviceConfig.a2a.path);
  const agentCard = buildAgentCard(serviceConfig);

  const requestHandler = new DefaultRequestHandler(
    agentCard,
    new InMemoryTaskStore(),
    createAgentExecutor(engine),
    new DefaultExecutionEventBusManager(),
  );
  new A2AExpressApp(requestHandler).setupRoutes(app, a2aPath);

  const serveCard = (req: Request, res: Response): void => {
    res.json(buildAgentCard(serviceConfig, requestOrigin(req, serviceConfig)));
  };
  app.get('/.well-known/agent-card.json', serveCard);
  app.get('/.well-known/agent.json', serveCard);

  registerAdditionalRoutes(app, engine);
  return app;
}

/**
 * Creates the app and starts listening
 */
export async function createA2AServer(config: ServerConfig): Promise<Server> {
  const logger = Logger.getInstance('A2AServer');
  const { server: serverConfig, logging, a2a } = config.serviceConfig;

  logger.info('=== Server Configuration ===');
  logger.info(`Server: ${Logger.colorValue(`${serverConfig.host}:${serverConfig.port}`)}`);
  logger.info(`Log Level: ${Logger.colorValue(logging.level)}`);
  logger.info(`A2A Path: ${Logger.colorValue(normalizePath(a2a.path))}`);

  const app = createA2AApp(config);
  return await new Promise<Server>((resolve, reject) => {
    const httpServer = app.listen(serverConfig.port, serverConfig.host, () => {
      const base = resolveBaseUrl(serverConfig);
      logger.info(`Server ready at ${Logger.colorValue(base)}`);
      logger.info(`Agent card: ${Logger.colorValue(`${base}/.well-known/agent-card.json`)}`);
      resolve(httpServer);
    });
    httpServer.on('error', reject);
  });
}

interface MiddlewareConfig {
  logRequests?: boolean;
}

export function setupMiddleware(app: Express, config: MiddlewareConfig = {}): void {
  app.use(json());
  app.use(
    cors({
      origin: true,
      credentials: true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    }),
  );

  if (config.logRequests) {
    const logger = Logger.getInstance('A2AServer');
    app.use((req: Request, _res: Response, next: NextFunction) => {
      const body: unknown = req.body;
      if (req.method === 'POST' && body && typeof body === 'object' && 'method' in body) {
        logger.debug(`${String(body.method)} request`, { path: req.path });
      } else {
        logger.debug('HTTP request', { method: req.method, path: req.path });
      }
      next();
    });
  }
}

export function registerAdditionalRoutes(app: Express, engine: TaskEngine): void {
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).send('ok');
  });

  // Server-push stream of engine events for one task
  app.get('/tasks/:taskId/events', (req: Request, res: Response) => {
    const taskId = req.params['taskId'] ?? '';
    if (!engine.getTask(taskId)) {
      res.status(404).json({ error: `Task ${taskId} not found` });
      return;
    }

    res.writeHead(200, SSE_HEADERS);
    try {
      const handle = engine.subscribe(taskId, new ServerSentEventsChannel(res));
      req.on('close', () => {
        engine.unsubscribe(handle);
      });
    } catch (error) {
      if (!(error instanceof UnknownTaskError)) {
        throw error;
      }
      res.end();
    }
  });
}

function requestOrigin(req: Request, serviceConfig: ServiceConfig): string {
  if (serviceConfig.server.baseUrl) {
    return resolveBaseUrl(serviceConfig.server);
  }
  const forwardedProto = req.get('x-forwarded-proto');
  const host = req.get('x-forwarded-host') ?? req.get('host');
  if (!host) {
    return resolveBaseUrl(serviceConfig.server);
  }
  return `${forwardedProto ?? req.protocol}://${host}`.replace(/\/$/, '');
}

export async function shutdownServer(server: Server, engine?: TaskEngine): Promise<void> {
  engine?.stop();
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
