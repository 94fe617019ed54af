import { describe, it, expect } from 'vitest';
import { classifyIntent, normalizeMessage } from '../triage/classifier.js';
import { INTENTS } from '../triage/types.js';

describe('Intent Classifier', () => {
  describe('normalizeMessage', () => {
    it('should strip accents, punctuation and case', () => {
      expect(normalizeMessage('Olá! Quanto CUSTA o clareamento?')).toBe('ola quanto custa o clareamento');
    });

    it('should return an empty string for whitespace', () => {
      expect(normalizeMessage('   \n\t ')).toBe('');
    });
  });

  describe('classifyIntent', () => {
    it('should classify booking requests', () => {
      const result = classifyIntent('quero agendar uma consulta');
      expect(result.intent).toBe('schedule_appointment');
      expect(result.confidence).toBe(0.9);
      expect(result.matched_keywords).toEqual(['agendar', 'consulta']);
    });

    it('should match accented keywords without their accents', () => {
      expect(classifyIntent('Tem horário amanhã?').intent).toBe('schedule_appointment');
      expect(classifyIntent('Qual o preço da limpeza?').intent).toBe('request_price');
    });

    it('should prefer cancellation over booking', () => {
      const result = classifyIntent('Preciso cancelar minha consulta de amanhã');
      expect(result.intent).toBe('cancel_appointment');
      expect(result.matched_keywords).toEqual(['cancelar']);
    });

    it('should prefer booking over price questions', () => {
      expect(classifyIntent('quanto custa marcar uma avaliação?').intent).toBe('schedule_appointment');
    });

    it('should classify price questions', () => {
      const result = classifyIntent('Quanto custa um implante?');
      expect(result.intent).toBe('request_price');
      expect(result.matched_keywords).toEqual(['quanto', 'custa']);
    });

    it('should classify greetings, including multi-word ones', () => {
      expect(classifyIntent('Oi').intent).toBe('greeting');
      expect(classifyIntent('Bom dia!').intent).toBe('greeting');
      expect(classifyIntent('E aí, tudo bem?').matched_keywords).toEqual(['e ai', 'tudo bem']);
    });

    it('should match whole words only', () => {
      // "oito" contains "oi", "boi" ends with it
      const result = classifyIntent('oito bois');
      expect(result.intent).toBe('unknown');
      expect(result.confidence).toBe(0.3);
    });

    it('should return unknown with zero confidence for empty input', () => {
      expect(classifyIntent('')).toEqual({ intent: 'unknown', confidence: 0, matched_keywords: [] });
      expect(classifyIntent('   ')).toEqual({ intent: 'unknown', confidence: 0, matched_keywords: [] });
    });

    it('should be deterministic and always return a known label', () => {
      const messages = ['quero agendar', 'obrigado', '???', 'desmarcar', 'valor'];
      for (const message of messages) {
        const first = classifyIntent(message);
        expect(classifyIntent(message)).toEqual(first);
        expect(INTENTS).toContain(first.intent);
      }
    });
  });
});
