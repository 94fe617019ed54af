// Intent classification
// Keyword matching on whole words, no external calls

import { KEYWORDS, type KeywordIntent } from './keywords.js';
import type { IntentAnalysis } from './types.js';

// First match wins: "quero cancelar a consulta" is a cancellation, not a booking
const PRIORITY: KeywordIntent[] = [
  'cancel_appointment',
  'schedule_appointment',
  'request_price',
  'greeting',
];

const MATCHED_CONFIDENCE = 0.9;
const UNMATCHED_CONFIDENCE = 0.3;

/**
 * Lower-case, strip accents and punctuation, collapse whitespace.
 * "Olá! Quanto custa?" -> "ola quanto custa"
 */
export function normalizeMessage(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

function findKeywords(padded: string, candidates: string[]): string[] {
  return candidates.filter(keyword => padded.includes(` ${keyword} `));
}

export function classifyIntent(text: string): IntentAnalysis {
  const normalized = normalizeMessage(text);
  if (!normalized) {
    return { intent: 'unknown', confidence: 0, matched_keywords: [] };
  }

  const padded = ` ${normalized} `;
  for (const intent of PRIORITY) {
    const matched = findKeywords(padded, KEYWORDS[intent]);
    if (matched.length > 0) {
      return { intent, confidence: MATCHED_CONFIDENCE, matched_keywords: matched };
    }
  }

  return { intent: 'unknown', confidence: UNMATCHED_CONFIDENCE, matched_keywords: [] };
}
