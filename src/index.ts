// Dental clinic triage API
// Receives WhatsApp-style messages, classifies them and replies

// Load environment variables from .env file
import 'dotenv/config';

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { env, logConfiguration } from './env.js';
import { closeDb } from './db.js';
import { healthRoutes } from './routes/health.js';
import { triageRoutes } from './routes/triage.js';
import { patientRoutes } from './routes/patients.js';
import { appointmentRoutes } from './routes/appointments.js';

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

await server.register(cors, {
  origin: env.CORS_ORIGINS,
});

// API routes
await server.register(healthRoutes);
await server.register(triageRoutes);
await server.register(patientRoutes);
await server.register(appointmentRoutes);

// Graceful shutdown
async function shutdown(signal: string) {
  server.log.info(`${signal} received, shutting down`);
  try {
    await server.close();
    closeDb();
    process.exit(0);
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

// Start server
try {
  await server.listen({ port: PORT, host: HOST });
  console.log(`🦷 Triage API listening on http://${HOST}:${PORT}`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
