import { describe, it, expect } from 'vitest';
import { SiegeDialogue } from '@/engine/systems/dialogue/SiegeDialogue';
import { TextTemplate } from '@/engine/utils/TextTemplate';

describe('TextTemplate', () => {
  it('substitutes known placeholders', () => {
    expect(TextTemplate.render('{CITY} has {N} gates', { CITY: 'Testhold', N: 3 })).toBe('Testhold has 3 gates');
  });

  it('uses the fallback for missing or empty values', () => {
    expect(TextTemplate.render('Hail {LEADER}', { LEADER: null }, { LEADER: 'the leader' })).toBe('Hail the leader');
    expect(TextTemplate.render('Hail {LEADER}', { LEADER: '' }, { LEADER: 'the leader' })).toBe('Hail the leader');
  });

  it('leaves unresolved placeholders literal', () => {
    expect(TextTemplate.render('{CITY} and {UNKNOWN}', { CITY: 'Testhold' })).toBe('Testhold and {UNKNOWN}');
  });

  it('does not treat lowercase braces as placeholders', () => {
    expect(TextTemplate.render('{city}', { city: 'x' })).toBe('{city}');
  });
});

describe('SiegeDialogue', () => {
  it('splits lines on semicolons and drops blanks', () => {
    expect(SiegeDialogue.parseLines(' One ; Two;;  ')).toEqual(['One', 'Two']);
  });

  it('splits scripts on pipes', () => {
    expect(SiegeDialogue.parseScripts('A;B|C| ')).toEqual([['A', 'B'], ['C']]);
  });

  it('prepares a script with city and leader filled in', () => {
    const script = SiegeDialogue.prepareScript(
      [['{CITY} falls', '{LEADER} kneels'], ['other']],
      'Testhold',
      'Lord Tester',
      () => 0,
    );
    expect(script).toEqual(['Testhold falls', 'Lord Tester kneels']);
  });

  it('falls back to "the leader" when the objective has no name', () => {
    expect(SiegeDialogue.prepareScript([['{LEADER}!']], 'Testhold', null, () => 0)).toEqual(['the leader!']);
  });

  it('returns an empty script when there are none', () => {
    expect(SiegeDialogue.prepareScript([], 'Testhold', null, () => 0)).toEqual([]);
  });

  it('walks the script line by line', () => {
    const script = ['a', 'b'];
    const first = SiegeDialogue.nextLine({ script, cursor: 0 });
    expect(first).toEqual({ line: 'a', cursor: 1 });
    expect(SiegeDialogue.nextLine({ script, cursor: 1 })).toEqual({ line: 'b', cursor: 2 });
    expect(SiegeDialogue.nextLine({ script, cursor: 2 })).toBeNull();
  });

  it('picks random lines from a pool', () => {
    expect(SiegeDialogue.randomLine(['x', 'y'], () => 0.99)).toBe('y');
    expect(SiegeDialogue.randomLine([], () => 0)).toBeNull();
  });
});
