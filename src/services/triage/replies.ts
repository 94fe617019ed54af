// Reply templates keyed by (intent, is_new_patient)

import type { Intent, NextAction } from './types.js';

export interface ReplyTemplate {
  body: string;
  next_action: NextAction;
}

export interface ComposedReply {
  reply: string;
  next_action: NextAction;
}

const NEW_PATIENT_TEMPLATES: Record<Intent, ReplyTemplate> = {
  schedule_appointment: {
    body: 'Antes de agendarmos, preciso de algumas informações. Qual seu nome completo?',
    next_action: 'collect_contact_info',
  },
  cancel_appointment: {
    body: 'Não encontrei nenhuma consulta marcada para este número. Gostaria de agendar uma avaliação?',
    next_action: 'clarify_intent',
  },
  request_price: {
    body:
      'Para que eu possa te passar um orçamento preciso e justo, preciso primeiro entender seu caso em uma ' +
      'avaliação clínica. Vamos marcar uma consulta inicial sem compromisso?',
    next_action: 'pivot_to_schedule',
  },
  greeting: {
    body: 'Em que posso ajudar você hoje?',
    next_action: 'ask_how_can_help',
  },
  unknown: {
    body:
      'Poderia me dizer como posso ajudar? Por exemplo, gostaria de marcar uma consulta ou saber mais sobre ' +
      'nossos serviços?',
    next_action: 'clarify_intent',
  },
};

const EXISTING_PATIENT_TEMPLATES: Record<Intent, ReplyTemplate> = {
  schedule_appointment: {
    body: 'Vou te ajudar com o agendamento. Qual o melhor dia e horário para você?',
    next_action: 'schedule_appointment',
  },
  cancel_appointment: {
    body: 'Sem problemas. Pode me confirmar o dia e horário da consulta que deseja cancelar?',
    next_action: 'confirm_cancellation',
  },
  request_price: {
    body:
      'Entendo seu interesse nos valores. Para te passar um orçamento preciso e justo, eu preciso primeiro ' +
      'fazer uma avaliação clínica. Vamos marcar uma consulta sem compromisso para eu entender seu caso?',
    next_action: 'pivot_to_schedule',
  },
  greeting: {
    body: 'Em que posso ajudar você hoje?',
    next_action: 'ask_how_can_help',
  },
  unknown: {
    body:
      'Não entendi muito bem. Você gostaria de marcar uma consulta ou saber mais sobre nossos serviços?',
    next_action: 'clarify_intent',
  },
};

function firstName(name: string | null | undefined): string | null {
  const trimmed = name?.trim();
  if (!trimmed) return null;
  return trimmed.split(/\s+/)[0] ?? null;
}

export function selectTemplate(intent: Intent, isNewPatient: boolean): ReplyTemplate {
  return isNewPatient ? NEW_PATIENT_TEMPLATES[intent] : EXISTING_PATIENT_TEMPLATES[intent];
}

export function composeReply(
  intent: Intent,
  isNewPatient: boolean,
  patientName?: string | null,
): ComposedReply {
  const template = selectTemplate(intent, isNewPatient);
  const name = firstName(patientName);

  const opening = isNewPatient
    ? `Olá${name ? `, ${name}` : ''}! Bem-vindo à nossa clínica. `
    : `Olá ${name ?? 'cliente'}! `;

  return {
    reply: opening + template.body,
    next_action: template.next_action,
  };
}
