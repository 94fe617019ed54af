// Triage entry point
// Classify -> resolve patient -> compose reply, in one store transaction

import type { PatientStore } from '../patient-store.js';
import { classifyIntent } from './classifier.js';
import { composeReply } from './replies.js';
import type { TriageInput, TriageResult } from './types.js';

/**
 * WhatsApp gateways send JIDs such as "5511999999999@c.us"; keep only the
 * part before the first "@".
 */
export function cleanSenderId(senderId: string): string {
  return senderId.split('@')[0]?.trim() ?? '';
}

function resolveTimestamp(timestamp: string | undefined): Date {
  if (timestamp) {
    const parsed = new Date(timestamp);
    if (!isNaN(parsed.getTime())) return parsed;
  }
  return new Date();
}

export function runTriage(store: PatientStore, input: TriageInput): TriageResult {
  const patientId = cleanSenderId(input.sender_id);
  const analysis = classifyIntent(input.message);
  const receivedAt = resolveTimestamp(input.timestamp);

  const { patient, isNew } = store.transaction(() => {
    const resolved = store.getOrCreate(patientId, input.sender_name, receivedAt);
    store.recordInteraction(patientId, input.message, analysis, receivedAt);
    return resolved;
  });

  const { reply, next_action } = composeReply(analysis.intent, isNew, patient.name);

  return {
    intent: analysis.intent,
    reply,
    is_new_patient: isNew,
    confidence: analysis.confidence,
    next_action,
    user_status: isNew ? 'new_lead' : 'existing_patient',
    patient_id: patient.id,
  };
}
