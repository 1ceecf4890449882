/**
 * History, Choice and Junction Resolution Tests
 */

import { Context } from '../src/context';
import { ChoiceState, JunctionState } from '../src/pseudostates';
import { ELSE_PRIORITY, findJunctionPath, orderChoices, resolveHistory, selectChoice } from '../src/resolution';
import { SimpleState } from '../src/state';
import { HistoryType } from '../src/types';
import { createMachine } from './helpers';

describe('Resolution', () => {
  const a = new SimpleState('A');
  const b = new SimpleState('B');
  const c = new SimpleState('C');
  const ctx = new Context(createMachine('resolution'));

  describe('choices', () => {
    it('should order by priority, keeping insertion order on ties', () => {
      const ordered = orderChoices([
        { guard: () => true, target: a, priority: 0 },
        { guard: () => true, target: b, priority: 5 },
        { guard: () => true, target: c, priority: 0 },
        { guard: () => true, target: a, priority: ELSE_PRIORITY },
      ]);

      expect(ordered.map(option => `${option.target.name}:${option.priority}`)).toEqual([
        'B:5',
        'A:0',
        'C:0',
        `A:${ELSE_PRIORITY}`,
      ]);
    });

    it('should select the first option whose guard holds', () => {
      const options = [
        { guard: () => false, target: a, priority: 10 },
        { guard: () => true, target: b, priority: 1 },
        { guard: () => true, target: c, priority: 0 },
      ];

      expect(selectChoice(options, ctx)).toBe(b);
      expect(selectChoice([{ guard: () => false, target: a, priority: 0 }], ctx)).toBeUndefined();
    });

    it('should keep the else option last whatever its insertion point', () => {
      const choice = new ChoiceState('choose');
      choice.addElseChoice(c);
      choice.addChoiceWithPriority(() => false, a, -100);
      choice.addChoice(() => ctx.get('pick') === 'b', b);

      expect(choice.getChoices().map(option => option.target.name)).toEqual(['B', 'A', 'C']);
      expect(choice.resolve(ctx)).toBe(c);
      ctx.set('pick', 'b');
      expect(choice.resolve(ctx)).toBe(b);
      ctx.delete('pick');
    });
  });

  describe('junctions', () => {
    it('should take the first path from the source whose guard holds', () => {
      const junction = new JunctionState('J');
      junction.addPath(a, b, () => false);
      junction.addPath(a, c);
      junction.addPath(b, a);

      expect(junction.findPath(a, ctx)).toBe(c);
      expect(junction.findPath(b, ctx)).toBe(a);
      expect(junction.findPath(c, ctx)).toBeUndefined();
      expect(findJunctionPath([], a, ctx)).toBeUndefined();
    });
  });

  describe('history', () => {
    it('should restore the recorded child for shallow history', () => {
      expect(resolveHistory({ type: HistoryType.SHALLOW, lastChain: [a, b] })).toEqual([a]);
    });

    it('should restore the recorded chain for deep history', () => {
      expect(resolveHistory({ type: HistoryType.DEEP, lastChain: [a, b] })).toEqual([a, b]);
    });

    it('should fall back to the default state, else nothing', () => {
      expect(resolveHistory({ type: HistoryType.DEEP, lastChain: [], defaultState: c })).toEqual([c]);
      expect(resolveHistory({ type: HistoryType.SHALLOW, lastChain: [] })).toBeUndefined();
    });
  });
});
