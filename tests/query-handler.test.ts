/**
 * Query Pipeline Tests
 *
 * These tests define the contract for one tutor request end to end:
 * - Input validation before any work starts
 * - Session continuity and history context on follow-up questions
 * - The request deadline, with tracker and metrics bookkeeping
 *
 * The implementation lives in: src/query-handler.ts
 */

import { afterEach, describe, it, expect } from 'vitest';
import { createRuntime } from '../src/app.js';
import type { TutorRuntime } from '../src/app.js';
import { SubjectAgent } from '../src/agents/base-agent.js';
import type { AgentRunOptions } from '../src/agents/base-agent.js';
import type { AgentResponse } from '../src/types.js';
import { ScriptedLlmClient, testConfig } from './helpers.js';

// ============================================================================
// Helper Functions
// ============================================================================

/** Math agent that only settles when its signal aborts */
class StalledMathAgent extends SubjectAgent {
  readonly subject = 'math' as const;

  answer(_question: string, options: AgentRunOptions = {}): Promise<AgentResponse> {
    return new Promise((_resolve, reject) => {
      options.signal?.addEventListener('abort', () => reject(options.signal?.reason));
    });
  }
}

let runtime: TutorRuntime | undefined;

afterEach(() => {
  runtime?.dispose();
  runtime = undefined;
});

function start(llm: ScriptedLlmClient, timeoutMs?: number, stalled = false): TutorRuntime {
  const config = testConfig(timeoutMs === undefined ? {} : { server: { request_timeout_ms: timeoutMs } });
  runtime = createRuntime(config, {
    llm,
    agents: stalled ? { math: new StalledMathAgent(llm) } : undefined,
  });
  return runtime;
}

describe('Query Handler', () => {
  describe('Validation', () => {
    it('should reject an empty question', async () => {
      const { queries } = start(new ScriptedLlmClient());
      await expect(queries.handle({ question: '   ' })).rejects.toMatchObject({
        code: 'INVALID_INPUT',
        message: 'Invalid input: question: Question cannot be empty',
      });
    });

    it('should reject an over-long question', async () => {
      const { queries } = start(new ScriptedLlmClient());
      await expect(queries.handle({ question: 'x'.repeat(2001) })).rejects.toMatchObject({
        message: 'Invalid input: question: Question is too long (max 2000 characters)',
      });
    });

    it('should reject a malformed session id', async () => {
      const { queries } = start(new ScriptedLlmClient());
      await expect(queries.handle({ question: 'What is 5 + 3?', session_id: 'not valid!' })).rejects.toMatchObject({
        code: 'INVALID_INPUT',
      });
    });
  });

  describe('Answering', () => {
    it('should return the answer with request metadata', async () => {
      const { queries, history, metrics } = start(new ScriptedLlmClient(['Eight.']));
      const response = await queries.handle({ question: '  What is 5 + 3?  ' }, 'req-1');

      expect(response).toMatchObject({
        request_id: 'req-1',
        question: 'What is 5 + 3?',
        subject_identified: 'math',
        classification: { method: 'heuristic', confidence: 0.95 },
        cached: false,
      });
      expect(response.response.answer).toBe('Eight.');
      expect(response.session_id).toMatch(/^[0-9a-f-]{36}$/);
      expect(history.getHistory(response.session_id)).toHaveLength(1);

      const snapshot = metrics.snapshot();
      expect(snapshot.requests.succeeded).toBe(1);
      expect(snapshot.subjects.math).toBe(1);
      expect(snapshot.tools.calculator).toEqual({ calls: 1, failures: 0 });
    });

    it('should pass earlier turns as context within a session', async () => {
      const llm = new ScriptedLlmClient(['Eight.', 'Eight again.']);
      const { queries } = start(llm);

      await queries.handle({ question: 'What is 5 + 3?', session_id: 'student-1' });
      const followUp = await queries.handle({ question: 'What is 2 * 4?', session_id: 'student-1' });

      expect(followUp.session_id).toBe('student-1');
      expect(llm.calls[1].options?.context).toBe(
        'Recent conversation context:\nPrevious Q: What is 5 + 3?\nPrevious A: Eight.\n'
      );
    });
  });

  describe('Deadline', () => {
    it('should time out, abort the agent and record the timeout', async () => {
      const { queries, tracker, metrics } = start(new ScriptedLlmClient(), 20, true);

      await expect(queries.handle({ question: 'What is 5 + 3?' }, 'slow-1')).rejects.toMatchObject({
        code: 'TIMEOUT',
        message: 'Request timed out after 0.02 seconds',
      });
      expect(tracker.get('slow-1')).toMatchObject({ status: 'timeout', error: 'Request timed out after 0.02 seconds' });
      expect(tracker.counts().recent_timeouts).toBe(1);

      const snapshot = metrics.snapshot();
      expect(snapshot.requests.timed_out).toBe(1);
      expect(snapshot.errors).toEqual({ TIMEOUT: 1 });
    });
  });
});
