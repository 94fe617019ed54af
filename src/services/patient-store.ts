// Patient Store
// Owns the patients and interactions tables

import { guardStorage, type ClinicDb } from '../db.js';
import { AppError } from '../utils/errors.js';
import type { Intent, IntentAnalysis } from './triage/types.js';

export interface Patient {
  id: string;
  name: string | null;
  created_at: string;
  last_message_at: string;
}

export interface Interaction {
  id: number;
  patient_id: string;
  message_text: string;
  intent: Intent;
  confidence: number;
  created_at: string;
}

export interface GetOrCreateResult {
  patient: Patient;
  isNew: boolean;
}

export class PatientStore {
  constructor(private readonly db: ClinicDb) {}

  /**
   * Run `work` inside a single transaction. Nothing is written if it throws.
   */
  transaction<T>(work: () => T): T {
    return guardStorage('transaction', () => this.db.transaction(work)());
  }

  getPatient(id: string): Patient | null {
    return guardStorage('patient lookup', () => {
      const row = this.db
        .prepare<[string], Patient>('SELECT id, name, created_at, last_message_at FROM patients WHERE id = ?')
        .get(id);
      return row ?? null;
    });
  }

  /**
   * Return the patient with this id, inserting it on first contact.
   * A missing name is filled in from `name`; a stored name is kept.
   */
  getOrCreate(id: string, name?: string | null, at: Date = new Date()): GetOrCreateResult {
    return guardStorage('patient upsert', () => {
      const now = at.toISOString();
      const cleanName = name?.trim() || null;

      const inserted = this.db
        .prepare(
          `INSERT INTO patients (id, name, created_at, last_message_at)
           VALUES (?, ?, ?, ?)
           ON CONFLICT(id) DO NOTHING`,
        )
        .run(id, cleanName, now, now);

      if (inserted.changes === 0 && cleanName) {
        this.db.prepare('UPDATE patients SET name = ? WHERE id = ? AND name IS NULL').run(cleanName, id);
      }

      const patient = this.getPatient(id);
      if (!patient) {
        throw AppError.storage(`Patient ${id} vanished after upsert`);
      }
      return { patient, isNew: inserted.changes === 1 };
    });
  }

  recordInteraction(
    patientId: string,
    text: string,
    analysis: Pick<IntentAnalysis, 'intent' | 'confidence'>,
    at: Date = new Date(),
  ): Interaction {
    return guardStorage('interaction insert', () => {
      const now = at.toISOString();
      const result = this.db
        .prepare(
          `INSERT INTO interactions (patient_id, message_text, intent, confidence, created_at)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(patientId, text, analysis.intent, analysis.confidence, now);

      // MAX keeps an out-of-order (older) gateway timestamp from moving it backwards
      this.db
        .prepare('UPDATE patients SET last_message_at = MAX(last_message_at, ?) WHERE id = ?')
        .run(now, patientId);

      return {
        id: Number(result.lastInsertRowid),
        patient_id: patientId,
        message_text: text,
        intent: analysis.intent,
        confidence: analysis.confidence,
        created_at: now,
      };
    });
  }

  listInteractions(patientId: string, limit: number = 50): Interaction[] {
    return guardStorage('interaction history', () =>
      this.db
        .prepare<[string, number], Interaction>(
          `SELECT id, patient_id, message_text, intent, confidence, created_at
           FROM interactions
           WHERE patient_id = ?
           ORDER BY created_at DESC, id DESC
           LIMIT ?`,
        )
        .all(patientId, limit),
    );
  }
}
