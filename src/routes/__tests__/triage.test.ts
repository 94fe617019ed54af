import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import Fastify from 'fastify';
import { openDatabase } from '../../db.js';
import { INTENTS } from '../../services/triage/types.js';
import { triageRoutes } from '../triage.js';

describe('Triage Routes', () => {
  const app = Fastify();
  const db = openDatabase(':memory:');

  beforeAll(async () => {
    await app.register(triageRoutes, { db });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    db.close();
  });

  describe('POST /triage', () => {
    it('should classify a booking request from a new patient', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/triage',
        payload: { sender_id: '+551199999999', message: 'quero agendar uma consulta' },
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.intent).toBe('schedule_appointment');
      expect(body.is_new_patient).toBe(true);
      expect(body.reply.length).toBeGreaterThan(0);
      expect(body.next_action).toBe('collect_contact_info');
    });

    it('should create the patient only once', async () => {
      const payload = { sender_id: '5511977776666@c.us', message: 'oi' };

      const first = await app.inject({ method: 'POST', url: '/triage', payload });
      const second = await app.inject({ method: 'POST', url: '/triage', payload });

      expect(JSON.parse(first.body).is_new_patient).toBe(true);
      expect(JSON.parse(second.body).is_new_patient).toBe(false);
      expect(JSON.parse(second.body).user_status).toBe('existing_patient');

      const row = db.prepare('SELECT COUNT(*) AS total FROM patients WHERE id = ?').get('5511977776666');
      expect(row).toEqual({ total: 1 });
    });

    it('should answer an empty message with the unknown intent', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/triage',
        payload: { sender_id: 'empty-sender', message: '' },
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.intent).toBe('unknown');
      expect(body.confidence).toBe(0);
    });

    it('should always return one of the known intents', async () => {
      const messages = ['bom dia', 'quanto custa?', 'desmarcar', 'asdf', 'agendar'];
      for (const message of messages) {
        const response = await app.inject({
          method: 'POST',
          url: '/triage',
          payload: { sender_id: 'label-check', message },
        });
        expect(response.statusCode).toBe(200);
        expect(INTENTS).toContain(JSON.parse(response.body).intent);
      }
    });

    it('should reject a missing sender_id', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/triage',
        payload: { message: 'oi' },
      });

      expect(response.statusCode).toBe(422);
      const body = JSON.parse(response.body);
      expect(body.error).toBe('validation_error');
      expect(body.details[0].field).toBe('sender_id');
    });

    it('should reject a missing message', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/triage',
        payload: { sender_id: 'no-message' },
      });

      expect(response.statusCode).toBe(422);
      expect(JSON.parse(response.body).details[0].field).toBe('message');
    });

    it('should reject a sender_id with nothing before "@"', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/triage',
        payload: { sender_id: '@c.us', message: 'oi' },
      });

      expect(response.statusCode).toBe(422);
    });

    it('should classify long messages instead of rejecting them', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/triage',
        payload: { sender_id: 'long-message', message: 'quero agendar ' + 'a'.repeat(5000) },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body).intent).toBe('schedule_appointment');
    });

    it('should store an ISO timestamp with offset in UTC', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/triage',
        payload: { sender_id: 'ts-offset', message: 'oi', timestamp: '2026-03-01T10:00:00-03:00' },
      });

      expect(response.statusCode).toBe(200);
      const row = db.prepare('SELECT created_at FROM patients WHERE id = ?').get('ts-offset');
      expect(row).toEqual({ created_at: '2026-03-01T13:00:00.000Z' });
    });

    it('should reject timestamps that are not ISO 8601', async () => {
      for (const timestamp of ['1', 'March 7', '2026-03-01 10:00']) {
        const response = await app.inject({
          method: 'POST',
          url: '/triage',
          payload: { sender_id: 'ts-loose', message: 'oi', timestamp },
        });

        expect(response.statusCode).toBe(422);
        expect(JSON.parse(response.body).details[0].field).toBe('timestamp');
      }

      const row = db.prepare('SELECT COUNT(*) AS total FROM patients WHERE id = ?').get('ts-loose');
      expect(row).toEqual({ total: 0 });
    });
  });
});

describe('Triage Routes with an unavailable database', () => {
  const app = Fastify();
  const db = openDatabase(':memory:');

  beforeAll(async () => {
    db.close();
    await app.register(triageRoutes, { db });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('should answer 500 with a storage error instead of crashing', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/triage',
      payload: { sender_id: '5511900000000', message: 'oi' },
    });

    expect(response.statusCode).toBe(500);
    const body = JSON.parse(response.body);
    expect(body.error).toBe('storage_error');
    expect(body.statusCode).toBe(500);
  });
});
