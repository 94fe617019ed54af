// Triage types for the clinic message API

export const INTENTS = [
  'schedule_appointment',
  'cancel_appointment',
  'request_price',
  'greeting',
  'unknown',
] as const;

export type Intent = (typeof INTENTS)[number];

export type NextAction =
  | 'collect_contact_info'  // New lead wants to book: ask for their name first
  | 'schedule_appointment'  // Known patient: ask for day and time
  | 'pivot_to_schedule'     // Price questions are steered to an evaluation visit
  | 'confirm_cancellation'
  | 'ask_how_can_help'
  | 'clarify_intent';

export type UserStatus = 'new_lead' | 'existing_patient';

export interface IntentAnalysis {
  intent: Intent;
  confidence: number; // 0-1
  matched_keywords: string[];
}

export interface TriageInput {
  sender_id: string;
  message: string;
  sender_name?: string;
  timestamp?: string;
}

export interface TriageResult {
  intent: Intent;
  reply: string;
  is_new_patient: boolean;
  confidence: number;
  next_action: NextAction;
  user_status: UserStatus;
  patient_id: string;
}
