import { createServer } from './api/server';
import { loadConfigFromEnvironment } from './config';
import { createServices, shutdownServices } from './services/container';
import { logger } from './utils/logger';

const config = loadConfigFromEnvironment();

logger.info('🚀 Starting geotrail server...');

const services = await createServices(config);

const registered = services.registry.all().map(plugin => plugin.name);
logger.info({ plugins: registered }, `🔌 ${registered.length} plugin(s) registered`);
for (const failure of services.registry.failures()) {
  logger.warn({ path: failure.path }, `⚠️  Plugin not loaded: ${failure.reason}`);
}

const app = createServer(services);

const server = app.listen(config.port, () => {
  logger.info({ port: config.port }, `✅ Server running on http://localhost:${config.port}`);
  logger.info('📊 API endpoints:');
  logger.info('   GET  /health                             - Health check');
  logger.info('   GET  /api/plugins                        - Plugins and configuration status');
  logger.info('   GET  /api/plugins/categories             - Plugins grouped by category');
  logger.info('   GET  /api/plugins/failures               - Plugins that failed to load');
  logger.info('   GET  /api/plugins/:name/config           - Plugin configuration');
  logger.info('   PUT  /api/plugins/:name/config/:section  - Update a configuration section');
  logger.info('   GET  /api/plugins/:name/targets?q=       - Search targets');
  logger.info('   POST /api/collections                    - Start a collection');
  logger.info('   GET  /api/collections/:id                - Collection state and result');
  logger.info('   POST /api/collections/:id/stop           - Stop a running collection');
  logger.info('   GET  /api/collections/:id/stream         - Real-time SSE progress stream 📡');
  logger.info('   GET  /api/cache/stats                    - Cache statistics');
  logger.info('   POST /api/cache/clear                    - Clear cache (?expired=true for expired only)');
});

// Graceful shutdown
const shutdown = async () => {
  logger.info('🛑 Shutting down gracefully...');
  await shutdownServices(services);
  server.close(() => {
    logger.info('✅ Server closed');
    process.exit(0);
  });
};

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());
