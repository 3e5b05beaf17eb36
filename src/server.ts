import { ApolloServer } from '@apollo/server';
import { startStandaloneServer } from '@apollo/server/standalone';
import { buildSchema } from './graphql/schema';
import { loadConfig } from './config/environment';
import { createPlanningService } from './scheduler/planning_service';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

let server: ApolloServer | undefined;

async function start() {
  const config = loadConfig();

  try {
    const service = createPlanningService(config);
    const schema = buildSchema(service);

    server = new ApolloServer({
      schema,
      introspection: config.server.nodeEnv === 'development',
    });

    const { url } = await startStandaloneServer(server, {
      listen: { port: config.server.port },
    });

    logger.info('Production Scheduler Service started', {
      url,
      environment: config.server.nodeEnv,
      port: config.server.port,
      operatorPool: service.resourceCatalog.settings.operatorPool,
    });
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

async function shutdown(signal: string) {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  try {
    await server?.stop();
    logger.info('Server stopped');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: errorMessage(error) });
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

start().catch((err: unknown) => {
  const stack = err instanceof Error ? err.stack : undefined;
  logger.error('Unhandled error during startup', { error: errorMessage(err), stack });
  process.exit(1);
});
