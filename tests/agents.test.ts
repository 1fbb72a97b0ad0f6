/**
 * Subject Agent Tests
 *
 * These tests define the contract for the math, physics and chemistry agents:
 * - Deterministic tools run before the LLM and are recorded in tools_used
 * - Verified tool output is embedded in the explanation prompt
 * - Without the LLM, answers degrade to tool output when there is any
 *
 * The implementation lives in: src/agents/
 */

import { describe, it, expect } from 'vitest';
import { DEGRADED_NOTE, ToolTrace } from '../src/agents/base-agent.js';
import { ChemistryAgent, extractReaction, parseStoichiometryRequest } from '../src/agents/chemistry-agent.js';
import { extractMathText, isPlainExpression, MathAgent } from '../src/agents/math-agent.js';
import { parseAnalysis, PhysicsAgent } from '../src/agents/physics-agent.js';
import { calculate } from '../src/tools/calculator.js';
import { createToolError } from '../src/utils.js';
import { ScriptedLlmClient, unconfiguredLlm } from './helpers.js';

const LLM_DOWN = createToolError('LLM_UNAVAILABLE', 'The language model is temporarily unavailable');

describe('Tool Trace', () => {
  it('should record successes and tool errors', () => {
    const trace = new ToolTrace();
    trace.run('calculator', { expression: '1 + 1' }, () => calculate({ expression: '1 + 1' }));
    const failed = trace.run('calculator', { expression: '1 / 0' }, () => calculate({ expression: '1 / 0' }));

    expect(failed).toBeNull();
    expect(trace.results.map(result => [result.success, result.error_message])).toEqual([
      [true, undefined],
      [false, 'Division by zero'],
    ]);
    expect(trace.promptSection()).toBe('Verified tool results:\n- 2');
    expect(trace.degradedAnswer()).toBe(`2\n\n${DEGRADED_NOTE}`);
  });

  it('should have nothing to offer when no tool produced output', () => {
    const trace = new ToolTrace();
    expect(trace.promptSection()).toBeUndefined();
    expect(trace.degradedAnswer()).toBeNull();
  });

  it('should propagate errors that are not tool errors', () => {
    const trace = new ToolTrace();
    expect(() => trace.run('calculator', {}, () => {
      throw new TypeError('bug');
    })).toThrow('bug');
  });
});

describe('Math Agent', () => {
  describe('Question Parsing', () => {
    it('should reduce questions to expressions', () => {
      expect(extractMathText('What is the square root of 144?')).toBe('sqrt 144');
      expect(extractMathText('Calculate 15 times 4 plus 2')).toBe('15 * 4 + 2');
      expect(extractMathText('What is 5 + 3 = ?')).toBe('5 + 3');
      expect(extractMathText('Solve the equation 2x + 3 = 7')).toBe('2x + 3 = 7');
    });

    it('should recognise closed expressions', () => {
      expect(isPlainExpression('2pi + 1')).toBe(true);
      expect(isPlainExpression('2x + 1')).toBe(false);
      expect(isPlainExpression('a prime number')).toBe(false);
    });
  });

  describe('Answering', () => {
    it('should calculate before explaining', async () => {
      const llm = new ScriptedLlmClient(['5 + 3 is 8.']);
      const response = await new MathAgent(llm).answer('What is 5 + 3?');

      expect(response).toMatchObject({ agent_type: 'math', answer: '5 + 3 is 8.', confidence: 0.9 });
      expect(response.tools_used).toHaveLength(1);
      expect(response.tools_used[0]).toMatchObject({
        tool_type: 'calculator',
        input_data: { expression: '5 + 3' },
        success: true,
      });
      expect(llm.calls[0].prompt).toContain('Verified tool results:\n- 5 + 3 = 8');
      expect(llm.calls[0].options?.kind).toBe('generate');
    });

    it('should solve equations for a named variable', async () => {
      const llm = new ScriptedLlmClient(['x is 2.']);
      const response = await new MathAgent(llm).answer('Solve 2x + 3 = 7 for x');

      expect(response.tools_used[0]).toMatchObject({
        tool_type: 'equation_solver',
        input_data: { equation: '2x + 3 = 7', variable: 'x' },
        success: true,
      });
      expect(llm.calls[0].prompt).toContain('- 2x + 3 = 7: x = 2');
    });

    it('should ask the LLM for the expression in worded problems', async () => {
      const llm = new ScriptedLlmClient(['`3 - 1`', 'Two apples remain.']);
      const response = await new MathAgent(llm).answer('If I have three apples and eat one, how many remain?');

      expect(response.answer).toBe('Two apples remain.');
      expect(response.tools_used[0]).toMatchObject({ tool_type: 'calculator', input_data: { expression: '3 - 1' } });
      expect(llm.calls[1].prompt).toContain('- 3 - 1 = 2');
    });

    it('should skip the calculator when none is needed', async () => {
      const llm = new ScriptedLlmClient(['No calculation needed.', 'A prime has exactly two divisors.']);
      const response = await new MathAgent(llm).answer('What is a prime number?');

      expect(response.tools_used).toEqual([]);
      expect(response.answer).toBe('A prime has exactly two divisors.');
    });

    it('should answer from the calculator when the LLM is down', async () => {
      const response = await new MathAgent(new ScriptedLlmClient([LLM_DOWN])).answer('What is 5 + 3?');
      expect(response).toMatchObject({
        answer: `5 + 3 = 8\n\n${DEGRADED_NOTE}`,
        confidence: 0.6,
        degraded: true,
      });
    });

    it('should fail when neither the LLM nor a tool can answer', async () => {
      await expect(new MathAgent(unconfiguredLlm()).answer('What is a prime number?'))
        .rejects.toMatchObject({ code: 'LLM_NOT_CONFIGURED' });
    });
  });
});

describe('Physics Agent', () => {
  describe('Analysis Parsing', () => {
    it('should read fenced JSON', () => {
      expect(parseAnalysis('```json\n{"needs_constant": true, "constant_name": "G"}\n```')).toEqual({
        needs_constant: true,
        constant_name: 'G',
      });
    });

    it('should return null for anything else', () => {
      expect(parseAnalysis('I think you need gravity')).toBeNull();
      expect(parseAnalysis('{"needs_constant": "maybe"}')).toBeNull();
      expect(parseAnalysis('{broken')).toBeNull();
    });
  });

  describe('Answering', () => {
    it('should convert units named in the question', async () => {
      const llm = new ScriptedLlmClient(['About 3.1 miles.']);
      const response = await new PhysicsAgent(llm).answer('Convert 5 km to miles');

      expect(response.tools_used[0]).toMatchObject({
        tool_type: 'unit_converter',
        input_data: { value: 5, from: 'km', to: 'miles' },
        success: true,
      });
      expect(llm.calls[0].prompt).toContain('- 5 km = 3.106855961 mi');
    });

    it('should look up constants mentioned by name without an analysis call', async () => {
      const llm = new ScriptedLlmClient(['Light is fast.']);
      const response = await new PhysicsAgent(llm).answer('What is the speed of light?');

      expect(response.answer).toBe('Light is fast.');
      expect(response.tools_used[0]).toMatchObject({ tool_type: 'constant_lookup', success: true });
      expect(llm.calls).toHaveLength(1);
      expect(llm.calls[0].prompt).toContain('Reference value: speed of light (c) = 299792458 m/s');
    });

    it('should fall back to the constant value when the LLM is down', async () => {
      const response = await new PhysicsAgent(new ScriptedLlmClient([LLM_DOWN])).answer('What is the speed of light?');
      expect(response).toMatchObject({
        answer: 'c = 299792458 m/s\n\nSpeed of light in vacuum (exact)',
        confidence: 0.6,
        degraded: true,
      });
    });

    it('should follow the analysis to a constant', async () => {
      const llm = new ScriptedLlmClient(['{"needs_constant": true, "constant_name": "k"}', 'It is the Boltzmann constant.']);
      const response = await new PhysicsAgent(llm).answer('What number links temperature and particle energy?');

      expect(response.tools_used[0]).toMatchObject({
        tool_type: 'constant_lookup',
        input_data: { query: 'k', subject: 'physics' },
        success: true,
      });
      expect(llm.calls[1].prompt).toContain('Reference value: boltzmann constant (k)');
    });

    it('should explain the concept the analysis names', async () => {
      const llm = new ScriptedLlmClient([
        '```json\n{"needs_constant": false, "explanation_needed": "Rayleigh scattering"}\n```',
        'Because of scattering.',
      ]);
      const response = await new PhysicsAgent(llm).answer('Why is the sky blue?');

      expect(response).toMatchObject({ answer: 'Because of scattering.', confidence: 0.9 });
      expect(response.tools_used.map(tool => tool.tool_type)).toEqual(['formula_fetcher']);
      expect(llm.calls[1].prompt).toContain('Focus on explaining: Rayleigh scattering');
    });

    it('should lower confidence when the analysis is unreadable', async () => {
      const llm = new ScriptedLlmClient(['not json at all', 'Because of scattering.']);
      const response = await new PhysicsAgent(llm).answer('Why is the sky blue?');

      expect(response.confidence).toBe(0.8);
      expect(llm.calls[1].prompt).toContain('Focus on explaining: the underlying physics concepts');
    });

    it('should include matching formulas in the prompt', async () => {
      const llm = new ScriptedLlmClient(['{"needs_constant": false}', 'KE is half m v squared.']);
      await new PhysicsAgent(llm).answer('How do I find kinetic energy?');
      expect(llm.calls[1].prompt).toContain('- Kinetic energy: KE = ½·m·v²');
    });
  });
});

describe('Chemistry Agent', () => {
  describe('Question Parsing', () => {
    it('should pull reactions out of questions', () => {
      expect(extractReaction('Balance H2 + O2 -> H2O please')).toBe('H2 + O2 -> H2O');
      expect(extractReaction('What is 2 + 2?')).toBeNull();
    });

    it('should stop at the end of a clause', () => {
      const question = 'If 4 g of H2 reacts in 2H2 + O2 -> 2H2O, how many grams of H2O form?';
      expect(extractReaction(question)).toBe('2H2 + O2 -> 2H2O');
    });

    it('should read given and target species', () => {
      const question = 'If 4 g of H2 reacts in 2H2 + O2 -> 2H2O, how many grams of H2O form?';
      expect(parseStoichiometryRequest(question, '2H2 + O2 -> 2H2O')).toEqual({
        equation: '2H2 + O2 -> 2H2O',
        given: { formula: 'H2', amount: 4, unit: 'g' },
        target: 'H2O',
      });
    });
  });

  describe('Answering', () => {
    it('should balance reactions', async () => {
      const llm = new ScriptedLlmClient(['Two hydrogen molecules per oxygen.']);
      const response = await new ChemistryAgent(llm).answer('Balance the equation H2 + O2 -> H2O');

      expect(response.tools_used[0]).toMatchObject({
        tool_type: 'stoichiometry',
        input_data: { equation: 'H2 + O2 -> H2O' },
        success: true,
      });
      expect(llm.calls[0].prompt).toContain('- Balanced: 2H2 + O2 -> 2H2O');
    });

    it('should answer balancing from the tool when the LLM is down', async () => {
      const response = await new ChemistryAgent(new ScriptedLlmClient([LLM_DOWN])).answer('Balance the equation H2 + O2 -> H2O');
      expect(response.answer).toBe(`Balanced: 2H2 + O2 -> 2H2O\n\n${DEGRADED_NOTE}`);
      expect(response.degraded).toBe(true);
    });

    it('should run reaction stoichiometry', async () => {
      const llm = new ScriptedLlmClient(['About 35.7 g.']);
      const response = await new ChemistryAgent(llm).answer(
        'If 4 g of H2 reacts in 2H2 + O2 -> 2H2O, how many grams of H2O form?'
      );
      expect(response.tools_used[0]).toMatchObject({ tool_type: 'stoichiometry', success: true });
      expect(response.tools_used[0].input_data).toMatchObject({ target: 'H2O' });
    });

    it('should compute molar masses with amounts', async () => {
      const llm = new ScriptedLlmClient(['Two moles.']);
      const response = await new ChemistryAgent(llm).answer('How many moles are in 36.03 g of H2O?');
      expect(response.tools_used[0]).toMatchObject({
        tool_type: 'molar_mass',
        input_data: { formula: 'H2O', mass_g: 36.03 },
        success: true,
      });
    });

    it('should look up elements by name', async () => {
      const llm = new ScriptedLlmClient(['Both are in period 3.']);
      const response = await new ChemistryAgent(llm).answer('Tell me about sodium and chlorine');
      expect(response.tools_used.map(tool => tool.input_data)).toEqual([{ query: 'Sodium' }, { query: 'Chlorine' }]);
    });

    it('should look up elements by atomic number', async () => {
      const llm = new ScriptedLlmClient(['Iron.']);
      const response = await new ChemistryAgent(llm).answer('What is element 26?');
      expect(response.tools_used[0]).toMatchObject({ tool_type: 'periodic_table', input_data: { query: '26' } });
    });
  });
});
