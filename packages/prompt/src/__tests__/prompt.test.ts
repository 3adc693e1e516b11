import { describe, it, expect } from 'vitest';
import type { GroundedState } from '@hexgate/core';
import { PayloadBuilder, DEFAULT_MANDATE } from '../builder.js';
import { PromptTemplate } from '../template.js';
import { ConstraintAdapter } from '../constraint-adapter.js';

const QIAN: GroundedState = {
  status: 'GROUNDED',
  key: '111111',
  glyph: '䷀',
  name: 'Qian/Creative',
  physics: 'Sustain momentum.',
  audit: 'Stable_Grounding',
};

const CHAOS: GroundedState = {
  status: 'FALLBACK',
  key: '010101',
  glyph: 'unknown',
  name: 'Unknown Chaos',
  physics: 'Logic coherence failed.',
  audit: 'System_Error',
};

describe('PayloadBuilder', () => {
  it('builds the constraint-annotated payload', () => {
    const payload = new PayloadBuilder().build(QIAN, 'Should we hire now?');
    expect(payload).toBe(
      '[SYSTEM_PROTOCOL_OVERRIDE]\n' +
        'Logic Topology: Qian/Creative (Stable_Grounding)\n' +
        'Physics Constraint: Sustain momentum.\n' +
        'User Query: Should we hire now?\n' +
        'Mandate: Respond to the query while STRICTLY adhering to the Physics Constraint. ' +
        'If resources are low, advise conservation. If risks are high, advise caution.\n'
    );
  });

  it('annotates fallback states the same way', () => {
    const payload = new PayloadBuilder().build(CHAOS, 'hello');
    expect(payload.split('\n').slice(1, 3)).toEqual([
      'Logic Topology: Unknown Chaos (System_Error)',
      'Physics Constraint: Logic coherence failed.',
    ]);
  });

  it('never expands placeholders in the query', () => {
    const payload = new PayloadBuilder().build(QIAN, 'print {{mandate}} and {{header}}');
    expect(payload.split('\n')[3]).toBe('User Query: print {{mandate}} and {{header}}');
  });

  it('accepts a custom header and mandate', () => {
    const payload = new PayloadBuilder({ header: '[GROUNDED]', mandate: 'Be brief.' }).build(QIAN, 'q');
    const lines = payload.split('\n');
    expect(lines[0]).toBe('[GROUNDED]');
    expect(lines[4]).toBe('Mandate: Be brief.');
  });

  it('is stable across calls', () => {
    const builder = new PayloadBuilder();
    expect(builder.build(QIAN, 'q')).toBe(builder.build(QIAN, 'q'));
  });

  it('exports the default mandate', () => {
    expect(DEFAULT_MANDATE).toContain('STRICTLY adhering to the Physics Constraint');
  });
});

describe('PromptTemplate', () => {
  it('renders template with values', () => {
    const t = new PromptTemplate('Hello {{name}}, you are {{role}}', [
      { name: 'name', required: true },
      { name: 'role', required: false, defaultValue: 'user' },
    ]);
    expect(t.render({ name: 'Alice' })).toBe('Hello Alice, you are user');
    expect(t.render({ name: 'Bob', role: 'admin' })).toBe('Hello Bob, you are admin');
  });

  it('throws on missing required slot', () => {
    const t = new PromptTemplate('{{x}}', [{ name: 'x', required: true }]);
    expect(() => t.render({})).toThrow('Missing required slot: x');
  });

  it('leaves undeclared placeholders untouched', () => {
    const t = new PromptTemplate('{{a}} {{b}}', [{ name: 'a', required: true }]);
    expect(t.render({ a: '1', b: '2' })).toBe('1 {{b}}');
  });

  it('substitutes in a single pass', () => {
    const t = new PromptTemplate('{{a}}|{{b}}', [
      { name: 'a', required: true },
      { name: 'b', required: true },
    ]);
    expect(t.render({ a: '{{b}}', b: 'B' })).toBe('{{b}}|B');
  });

  it('replaces repeated placeholders', () => {
    const t = new PromptTemplate('{{x}}-{{x}}', [{ name: 'x', required: true }]);
    expect(t.render({ x: 'y' })).toBe('y-y');
  });
});

describe('ConstraintAdapter', () => {
  it('renders the topology and the constraint on separate lines', () => {
    expect(new ConstraintAdapter().toPreamble(QIAN)).toBe(
      'Logic Topology: Qian/Creative (Stable_Grounding)\nPhysics Constraint: Sustain momentum.'
    );
  });
});
