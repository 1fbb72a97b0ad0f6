/**
 * Subject Classification Tests
 *
 * These tests define the contract for routing questions to a subject:
 * - Heuristic scoring decides confident cases without the LLM
 * - Greetings and acknowledgments are classified as conversational
 * - The LLM is asked only when the heuristics are unsure
 * - LLM failures fall back to the heuristic result
 *
 * The implementation lives in: src/classifier.ts
 */

import { describe, it, expect } from 'vitest';
import {
  classifySubject,
  isConversational,
  parseSubjectAnswer,
  scoreConfidence,
  scoreSubjects,
} from '../src/classifier.js';
import { createToolError } from '../src/utils.js';
import { ScriptedLlmClient, unconfiguredLlm } from './helpers.js';

// ============================================================================
// Test Data
// ============================================================================

const OFF_PATTERN_QUESTION = 'Tell me about black holes';

describe('Subject Classification', () => {
  describe('Heuristic Scoring', () => {
    it('should classify arithmetic as math', async () => {
      const result = await classifySubject({ question: 'What is 5 + 3?' });
      expect(result).toMatchObject({ subject: 'math', method: 'heuristic', confidence: 0.95 });
      expect(result.scores).toEqual({ math: 2, physics: 0, chemistry: 0 });
    });

    it('should classify constants questions as physics', async () => {
      const result = await classifySubject({ question: 'What is the speed of light?' });
      expect(result).toMatchObject({ subject: 'physics', method: 'heuristic', confidence: 0.95 });
      expect(result.scores.physics).toBe(5);
    });

    it('should count formulas and arrows toward chemistry', async () => {
      const result = await classifySubject({ question: 'Balance the equation H2 + O2 -> H2O' });
      expect(result.scores).toEqual({ math: 2, physics: 0, chemistry: 6 });
      expect(result).toMatchObject({ subject: 'chemistry', method: 'heuristic', confidence: 0.75 });
    });

    it('should count element names toward chemistry', () => {
      expect(scoreSubjects('Compare sodium and chlorine').chemistry).toBe(2);
    });

    it('should not score all-caps words as chemical formulas', () => {
      expect(scoreSubjects('SOS, my INPUT was wrong')).toEqual({ math: 0, physics: 0, chemistry: 0 });
    });
  });

  describe('Conversational Detection', () => {
    it('should classify greetings as unknown', async () => {
      const llm = new ScriptedLlmClient();
      const result = await classifySubject({ question: 'Hello there!' }, { llm });
      expect(result).toMatchObject({ subject: 'unknown', method: 'conversational', confidence: 0.9 });
      expect(llm.calls).toHaveLength(0);
    });

    it('should treat very short input as conversational', () => {
      expect(isConversational('ok')).toBe(true);
      expect(isConversational('hm')).toBe(true);
      expect(isConversational('What is torque?')).toBe(false);
    });
  });

  describe('Confidence', () => {
    it('should damp single weak matches', () => {
      expect(scoreConfidence(1, 0)).toBe(0.75);
      expect(scoreConfidence(2, 2)).toBe(0.5);
      expect(scoreConfidence(8, 0)).toBe(0.95);
      expect(scoreConfidence(0, 0)).toBe(0);
    });
  });

  describe('LLM Second Opinion', () => {
    it('should ask the LLM when no pattern matches', async () => {
      const llm = new ScriptedLlmClient(['Physics.']);
      const result = await classifySubject({ question: OFF_PATTERN_QUESTION }, { llm });
      expect(result).toMatchObject({ subject: 'physics', method: 'llm', confidence: 0.8 });
      expect(llm.calls[0].options?.kind).toBe('classify');
      expect(llm.calls[0].prompt).toContain(OFF_PATTERN_QUESTION);
    });

    it('should fall back when the LLM answer is not a subject', async () => {
      const llm = new ScriptedLlmClient(['biology']);
      const result = await classifySubject({ question: OFF_PATTERN_QUESTION }, { llm });
      expect(result).toMatchObject({ subject: 'unknown', method: 'fallback', confidence: 0 });
    });

    it('should fall back when the LLM fails', async () => {
      const llm = new ScriptedLlmClient([createToolError('LLM_ERROR', 'boom')]);
      const result = await classifySubject({ question: OFF_PATTERN_QUESTION }, { llm });
      expect(result).toMatchObject({ subject: 'unknown', method: 'fallback' });
    });

    it('should keep the heuristic winner when the LLM is not used', async () => {
      const result = await classifySubject({ question: 'What is the mass?', use_llm: false, threshold: 0.9 });
      expect(result).toMatchObject({ subject: 'physics', method: 'fallback', confidence: 0.75 });
    });

    it('should not call an unconfigured LLM', async () => {
      const llm = unconfiguredLlm();
      await classifySubject({ question: OFF_PATTERN_QUESTION }, { llm });
      expect(llm.calls).toHaveLength(0);
    });

    it('should propagate failures after the caller aborts', async () => {
      const controller = new AbortController();
      controller.abort();
      const llm = new ScriptedLlmClient([createToolError('TIMEOUT', 'Request timed out')]);
      await expect(
        classifySubject({ question: OFF_PATTERN_QUESTION }, { llm, signal: controller.signal })
      ).rejects.toMatchObject({ code: 'TIMEOUT' });
    });
  });

  describe('Answer Parsing', () => {
    it('should read one-word subjects', () => {
      expect(parseSubjectAnswer('Chemistry')).toBe('chemistry');
      expect(parseSubjectAnswer(' UNKNOWN ')).toBe('unknown');
      expect(parseSubjectAnswer('history')).toBeNull();
    });
  });
});
