// Course RAG API
// Answers questions about indexed course materials

// Load environment variables from .env file
import 'dotenv/config';

import { existsSync } from 'fs';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { env, logConfiguration } from './env.js';
import { queryRoutes } from './routes/query.js';
import { createRagSystem } from './services/rag-system.js';

const PORT = env.PORT;
const HOST = env.HOST;

const server = Fastify({
  logger: {
    level: env.LOG_LEVEL,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  },
});

// CORS for local development
await server.register(cors, {
  origin: [
    'http://localhost:8000',
    'http://127.0.0.1:8000',
    'http://localhost:3000',
    'http://127.0.0.1:3000',
  ],
  credentials: true,
});

const rag = createRagSystem();

const connection = await rag.testConnection();
if (!connection.success) {
  server.log.error(`Language model check failed: ${connection.message}`);
  process.exit(1);
}
server.log.info(`Language model check: ${connection.message}`);

if (existsSync(env.DOCS_PATH)) {
  try {
    const loaded = await rag.addCourseFolder(env.DOCS_PATH);
    server.log.info(`Loaded ${loaded.courses} course(s) with ${loaded.chunks} chunk(s) from ${env.DOCS_PATH}`);
  } catch (err) {
    server.log.error({ err }, `Failed to load documents from ${env.DOCS_PATH}`);
  }
} else {
  server.log.warn(`Documents folder not found: ${env.DOCS_PATH}`);
}

await server.register(queryRoutes, { rag });

server.addHook('onClose', async () => {
  rag.sessionManager.destroy();
});

// Start server
try {
  await server.listen({ port: PORT, host: HOST });
  console.log(`📚 Course RAG API listening on http://${HOST}:${PORT}`);
  console.log(`📊 Health: http://${HOST}:${PORT}/api/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
