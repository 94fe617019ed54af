import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import Fastify from 'fastify';
import { openDatabase } from '../../db.js';
import { patientRoutes } from '../patients.js';
import { triageRoutes } from '../triage.js';

describe('Patient Routes', () => {
  const app = Fastify();
  const db = openDatabase(':memory:');

  beforeAll(async () => {
    await app.register(triageRoutes, { db });
    await app.register(patientRoutes, { db });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    db.close();
  });

  it('should return the patient with their interaction history', async () => {
    await app.inject({
      method: 'POST',
      url: '/triage',
      payload: {
        sender_id: '5511955554444@c.us',
        sender_name: 'Beatriz Lima',
        message: 'oi',
        timestamp: '2026-04-01T10:00:00.000Z',
      },
    });
    await app.inject({
      method: 'POST',
      url: '/triage',
      payload: {
        sender_id: '5511955554444',
        message: 'quero marcar uma limpeza',
        timestamp: '2026-04-01T10:05:00.000Z',
      },
    });

    const response = await app.inject({ method: 'GET', url: '/patients/5511955554444' });

    expect(response.statusCode).toBe(200);
    const body = JSON.parse(response.body);
    expect(body.patient).toEqual({
      id: '5511955554444',
      name: 'Beatriz Lima',
      created_at: '2026-04-01T10:00:00.000Z',
      last_message_at: '2026-04-01T10:05:00.000Z',
    });
    expect(body.interactions.map((item: { intent: string }) => item.intent)).toEqual([
      'schedule_appointment',
      'greeting',
    ]);
    expect(body.appointments).toEqual([]);
  });

  it('should limit the history with ?limit', async () => {
    const response = await app.inject({ method: 'GET', url: '/patients/5511955554444?limit=1' });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body).interactions).toHaveLength(1);
  });

  it('should reject an out-of-range limit', async () => {
    const response = await app.inject({ method: 'GET', url: '/patients/5511955554444?limit=0' });

    expect(response.statusCode).toBe(422);
  });

  it('should return 404 for an unknown patient', async () => {
    const response = await app.inject({ method: 'GET', url: '/patients/5511000000000' });

    expect(response.statusCode).toBe(404);
    expect(JSON.parse(response.body).error).toBe('not_found');
  });
});
