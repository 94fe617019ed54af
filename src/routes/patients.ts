// Patient routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { resolveDb, type DbPluginOptions } from '../db.js';
import { PatientStore } from '../services/patient-store.js';
import { SchedulingService } from '../services/scheduling.js';
import { cleanSenderId } from '../services/triage/index.js';
import { AppError, fromZodError, guardRoute, sendError } from '../utils/errors.js';

const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional().default(50),
});

export async function patientRoutes(server: FastifyInstance, opts: DbPluginOptions) {
  // GET /patients/:id - Patient profile with recent interactions and appointments
  server.get<{ Params: { id: string } }>('/patients/:id', async (request, reply) => {
    const parsed = HistoryQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return sendError(request, reply, fromZodError(parsed.error, 'Invalid query string'));
    }
    const { limit } = parsed.data;
    const id = cleanSenderId(request.params.id);

    return guardRoute(request, reply, () => {
      const db = resolveDb(opts);
      const store = new PatientStore(db);

      const patient = store.getPatient(id);
      if (!patient) {
        throw AppError.notFound('Patient not found');
      }

      return {
        patient,
        interactions: store.listInteractions(id, limit),
        appointments: new SchedulingService(db).listForPatient(id),
      };
    });
  });
}
