/**
 * Unit tests for the SAS macro environment
 */

import { describe, it, expect } from 'vitest';
import { MacroEnvironment, sanitizeMacroValue } from '../../../extractors/macro-environment.js';

describe('MacroEnvironment.expand', () => {
  it('should substitute dotted and plain references', () => {
    const env = MacroEnvironment.from({ lib: 'stage', tbl: 'orders' });
    expect(env.expand('&lib..&tbl')).toBe('stage.orders');
    expect(env.expand('&lib..&tbl._clean')).toBe('stage.orders_clean');
  });

  it('should expand nested references over several passes', () => {
    const env = MacroEnvironment.from({ a: '&b', b: 'final' });
    expect(env.expand('x_&a')).toBe('x_final');
  });

  it('should leave unknown references in place', () => {
    expect(MacroEnvironment.empty().expand('&missing..t')).toBe('&missing.t');
  });

  it('should stop after the pass limit', () => {
    const env = MacroEnvironment.from({ loop: '&loop' });
    expect(env.expand('&loop', 3)).toBe('&loop');
  });

  it('should look names up case-insensitively', () => {
    const env = MacroEnvironment.from({ Lib: 'stage' });
    expect(env.get('LIB')).toBe('stage');
    expect(env.expand('&LIB..t')).toBe('stage.t');
  });
});

describe('MacroEnvironment.evaluateAssignments', () => {
  it('should evaluate %let statements in order', () => {
    const updates = MacroEnvironment.empty().evaluateAssignments('%let a = one;\n%let B = &a._two;');
    expect([...updates.entries()]).toEqual([
      ['a', 'one'],
      ['b', 'one_two']
    ]);
  });

  it('should see the enclosing environment', () => {
    const env = MacroEnvironment.from({ root: 'dw' });
    expect(env.evaluateAssignments('%let target = &root..facts;').get('target')).toBe('dw.facts');
  });

  it('should not change the environment it was called on', () => {
    const env = MacroEnvironment.empty();
    const next = env.with(env.evaluateAssignments('%let lib = work;'));

    expect(env.get('lib')).toBeUndefined();
    expect(next.get('lib')).toBe('work');
    expect(env.with(new Map())).toBe(env);
  });
});

describe('sanitizeMacroValue', () => {
  it('should strip nested surrounding quotes', () => {
    expect(sanitizeMacroValue(` "'quoted'" `)).toBe('quoted');
  });

  it('should strip one quoting function wrapper', () => {
    expect(sanitizeMacroValue('%str(work.tmp)')).toBe('work.tmp');
    expect(sanitizeMacroValue('%NRSTR( stage.orders )')).toBe('stage.orders');
  });

  it('should keep other macro function calls', () => {
    expect(sanitizeMacroValue('%sysfunc(today())')).toBe('%sysfunc(today())');
  });
});
