import express, { type Express } from 'express';
import cors from 'cors';
import { createGraphQLHandler } from './graphql/handler';
import { errorHandler, notFoundHandler } from './middleware/error/errorHandler';
import { errorLogger, requestLogger } from './middleware/logging/requestLogger';
import { createUserRoutes } from './routes/users';
import type { BotRegistry } from './services/registry/BotRegistry';

export interface AppDependencies {
  registry: BotRegistry;
  corsOrigin?: string;
}

export function createApp({ registry, corsOrigin }: AppDependencies): Express {
  const app = express();

  app.use(cors({ origin: corsOrigin ?? true }));
  app.use(express.json());
  app.use(requestLogger);

  // GraphQL endpoint
  const graphql = createGraphQLHandler(registry);
  app.route('/').get(graphql).post(graphql);

  // REST endpoints
  app.use('/users', createUserRoutes(registry));

  app.use(notFoundHandler);
  app.use(errorLogger);
  app.use(errorHandler);

  return app;
}
