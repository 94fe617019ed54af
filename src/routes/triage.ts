// Triage routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { resolveDb, type DbPluginOptions } from '../db.js';
import { PatientStore } from '../services/patient-store.js';
import { cleanSenderId, runTriage } from '../services/triage/index.js';
import { fromZodError, guardRoute, sendError } from '../utils/errors.js';

const TriageRequestSchema = z.object({
  sender_id: z
    .string()
    .trim()
    .min(1)
    .max(128)
    .refine(value => cleanSenderId(value).length > 0, {
      message: 'sender_id must contain an identifier before "@"',
    }),
  message: z.string(),
  sender_name: z.string().trim().max(120).nullish(),
  timestamp: z.string().datetime({ offset: true }).optional(),
});

export async function triageRoutes(server: FastifyInstance, opts: DbPluginOptions) {
  // POST /triage - Classify an incoming message and reply to it
  server.post('/triage', async (request, reply) => {
    const parsed = TriageRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(request, reply, fromZodError(parsed.error));
    }
    const body = parsed.data;

    return guardRoute(request, reply, () => {
      const store = new PatientStore(resolveDb(opts));
      const result = runTriage(store, {
        sender_id: body.sender_id,
        message: body.message,
        sender_name: body.sender_name ?? undefined,
        timestamp: body.timestamp,
      });

      request.log.info(
        { intent: result.intent, isNewPatient: result.is_new_patient, nextAction: result.next_action },
        'triage completed',
      );
      return result;
    });
  });
}
