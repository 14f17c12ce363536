import { buildApp } from './app.js';
import { loadConfig } from './config/constants.js';

const config = loadConfig();
const fastify = await buildApp({ config });

// Start server
const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: config.host });
    fastify.log.info(`Server running on http://${config.host}:${config.port}`);
    fastify.log.info(
      `Rate sources: cbr-direct, ${config.relays.length} relay(s), ${config.alternates.length} alternate(s), fallback ${config.fallbackRate}`
    );
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
