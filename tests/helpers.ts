/**
 * Shared test helpers: a scripted in-process LLM, config and error capture.
 */

import { loadConfig } from '../src/config.js';
import type { ConfigOverrides, TutorConfig } from '../src/config.js';
import type { CircuitState } from '../src/services/circuit-breaker.js';
import type { GenerateOptions, LlmClient, LlmStats } from '../src/services/gemini-client.js';
import type { ToolError } from '../src/types.js';
import { createToolError } from '../src/utils.js';

/**
 * One scripted reply: text, a thrown error, or a function of the prompt
 */
export type ScriptStep = string | ToolError | ((prompt: string) => string);

export interface RecordedCall {
  prompt: string;
  options?: GenerateOptions;
}

/**
 * LlmClient that replays a script in order. An exhausted script fails the
 * call with LLM_ERROR so unexpected calls show up in assertions.
 */
export class ScriptedLlmClient implements LlmClient {
  readonly model = 'test-model';
  readonly calls: RecordedCall[] = [];
  private readonly script: ScriptStep[];

  constructor(script: ScriptStep[] = [], private readonly configured: boolean = true) {
    this.script = [...script];
  }

  isConfigured(): boolean {
    return this.configured;
  }

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    this.calls.push({ prompt, options });
    if (!this.configured) {
      throw createToolError('LLM_NOT_CONFIGURED', 'GEMINI_API_KEY is not set');
    }
    const step = this.script.shift();
    if (step === undefined) {
      throw createToolError('LLM_ERROR', 'No scripted response left');
    }
    if (typeof step === 'string') return step;
    if (typeof step === 'function') return step(prompt);
    throw step;
  }

  getStats(): LlmStats {
    return {
      model: this.model,
      configured: this.configured,
      requests: this.calls.length,
      successes: 0,
      failures: 0,
      retries: 0,
      rate_limited: 0,
      avg_latency_ms: 0,
      circuit_state: 'closed',
    };
  }

  circuitState(): CircuitState {
    return 'closed';
  }

  /** Scripted replies not yet consumed */
  get remaining(): number {
    return this.script.length;
  }
}

/**
 * LlmClient without an API key
 */
export function unconfiguredLlm(): ScriptedLlmClient {
  return new ScriptedLlmClient([], false);
}

export function testConfig(overrides: ConfigOverrides = {}): TutorConfig {
  return loadConfig({ ENVIRONMENT: 'test' }, overrides);
}

/**
 * Run a function expected to throw and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
