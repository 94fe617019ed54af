// Keyword lists per intent
// Written without accents: messages are accent-stripped before matching

import type { Intent } from './types.js';

export type KeywordIntent = Exclude<Intent, 'unknown'>;

export const KEYWORDS: Record<KeywordIntent, string[]> = {
  cancel_appointment: [
    'cancelar',
    'cancela',
    'cancelamento',
    'desmarcar',
    'desmarca',
    'nao vou poder ir',
    'nao poderei ir',
  ],
  schedule_appointment: [
    'marcar',
    'agendar',
    'agenda',
    'agendamento',
    'consulta',
    'horario',
    'horarios',
    'avaliacao',
    'atendimento',
  ],
  request_price: ['preco', 'precos', 'valor', 'valores', 'quanto', 'custa', 'custo', 'orcamento'],
  greeting: ['oi', 'ola', 'oie', 'bom dia', 'boa tarde', 'boa noite', 'e ai', 'tudo bem'],
};
