// Scheduling routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { resolveDb, type DbPluginOptions } from '../db.js';
import { clinicHoursFromEnv, SchedulingService, type ClinicHours } from '../services/scheduling.js';
import { cleanSenderId } from '../services/triage/index.js';
import { fromZodError, guardRoute, sendError } from '../utils/errors.js';

export interface SchedulingRouteOptions extends DbPluginOptions {
  hours?: ClinicHours;
}

const AvailabilityQuerySchema = z.object({
  date: z.string().min(1),
});

const BookAppointmentSchema = z.object({
  sender_id: z.string().trim().min(1).max(128),
  date: z.string(),
  time: z.string(),
});

export async function appointmentRoutes(server: FastifyInstance, opts: SchedulingRouteOptions) {
  const hours = opts.hours ?? clinicHoursFromEnv();

  // GET /availability?date=YYYY-MM-DD - Free slots for a day
  server.get('/availability', async (request, reply) => {
    const parsed = AvailabilityQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return sendError(request, reply, fromZodError(parsed.error, 'Invalid query string'));
    }
    const { date } = parsed.data;

    return guardRoute(request, reply, () => new SchedulingService(resolveDb(opts), hours).availability(date));
  });

  // POST /appointments - Book a slot for a known patient
  server.post('/appointments', async (request, reply) => {
    const parsed = BookAppointmentSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(request, reply, fromZodError(parsed.error));
    }
    const body = parsed.data;

    return guardRoute(request, reply, () => {
      const scheduling = new SchedulingService(resolveDb(opts), hours);
      const appointment = scheduling.book(cleanSenderId(body.sender_id), body.date, body.time);
      request.log.info({ appointmentId: appointment.id, startsAt: appointment.starts_at }, 'appointment booked');
      return reply.code(201).send({ appointment });
    });
  });
}
