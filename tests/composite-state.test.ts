/**
 * Composite State Tests
 */

import { CompositeState } from '../src/composite-state';
import { InvalidHierarchyError, MissingChildError } from '../src/errors';
import { Event } from '../src/event';
import { ChoiceState, JunctionState } from '../src/pseudostates';
import { EntryPointState, ExitPointState, SimpleState } from '../src/state';
import { StateMachine } from '../src/state-machine';
import { createMachine, recordingObserver } from './helpers';

describe('CompositeState', () => {
  describe('hierarchy', () => {
    it('should make the first child the initial one', () => {
      const c = new CompositeState('C');
      const a = new SimpleState('A');
      const b = new SimpleState('B');
      c.addChild(a).addChild(b);

      expect(c.getInitialChild()).toBe(a);
      expect(c.getChildren()).toEqual([a, b]);
      expect(c.getChild('B')).toBe(b);
      expect(b.parent).toBe(c);
      expect(b.path).toBe('C.B');

      c.setInitialChild(b);
      expect(c.getInitialChild()).toBe(b);
    });

    it('should accept the same child twice', () => {
      const c = new CompositeState('C');
      const a = new SimpleState('A');

      c.addChild(a).addChild(a);

      expect(c.getChildren()).toHaveLength(1);
    });

    it('should reject a second child with the same name', () => {
      const c = new CompositeState('C');
      c.addChild(new SimpleState('A'));

      expect(() => c.addChild(new SimpleState('A'))).toThrow(InvalidHierarchyError);
    });

    it('should reject a child that already has another parent', () => {
      const first = new CompositeState('First');
      const second = new CompositeState('Second');
      const a = new SimpleState('A');
      first.addChild(a);

      expect(() => second.addChild(a)).toThrow('Cannot attach A: already a child of First');
    });

    it('should reject cycles', () => {
      const outer = new CompositeState('Outer');
      const inner = new CompositeState('Inner');
      outer.addChild(inner);

      expect(() => inner.addChild(outer)).toThrow('Cannot attach Outer: it contains Inner');
      expect(() => outer.addChild(outer)).toThrow(InvalidHierarchyError);
    });
  });

  describe('in an engine', () => {
    let sm: StateMachine;
    let c: CompositeState;
    let a: SimpleState;
    let b: SimpleState;
    let calls: string[];

    beforeEach(() => {
      sm = createMachine('composite');
      calls = [];
      c = new CompositeState('C')
        .addEntryAction(() => {
          calls.push('enter C');
        })
        .addExitAction(() => {
          calls.push('exit C');
        });
      a = new SimpleState('A')
        .addEntryAction(() => {
          calls.push('enter A');
        })
        .addExitAction(() => {
          calls.push('exit A');
        });
      b = new SimpleState('B').addEntryAction(() => {
        calls.push('enter B');
      });
      c.addChild(a).addChild(b);
      sm.setInitialState(c);
    });

    afterEach(async () => {
      await sm.reset();
    });

    it('should enter the composite and its initial child', async () => {
      await sm.start();

      expect(calls).toEqual(['enter C', 'enter A']);
      expect(sm.getCurrentState()).toBe(c);
      expect(c.getCurrentChild()).toBe(a);
      expect(sm.getActiveConfiguration()).toEqual(['C.A']);
    });

    it('should switch children without leaving the composite', async () => {
      sm.addTransition(a, b, 'NEXT');
      const { observer, log } = recordingObserver();
      sm.addObserver(observer);
      await sm.start();

      await sm.handleEvent(Event.create('NEXT'));

      expect(sm.getActiveConfiguration()).toEqual(['C.B']);
      expect(a.isActive()).toBe(false);
      expect(c.isActive()).toBe(true);
      expect(calls).toEqual(['enter C', 'enter A', 'exit A', 'enter B']);
      expect(log).toEqual(['enter:C', 'exit:A', 'enter:B', 'transition:A->B:NEXT', 'processed:NEXT']);
    });

    it('should match transitions declared from the dotted child name', async () => {
      sm.addTransition(new SimpleState('C.A'), b, 'NEXT');
      await sm.start();

      await sm.handleEvent(Event.create('NEXT'));

      expect(c.getCurrentChild()).toBe(b);
    });

    it('should apply internal transitions before the child sees the event', async () => {
      let childSawEvent = false;
      a.addTransition(new SimpleState('Elsewhere'), 'SWAP', {
        guard: () => {
          childSawEvent = true;
          return false;
        },
      });
      c.addInternalTransition(a, b, 'SWAP');
      await sm.start();

      await sm.handleEvent(Event.create('SWAP'));

      expect(childSawEvent).toBe(false);
      expect(c.getCurrentChild()).toBe(b);
      expect(c.getInternalTransitions()).toHaveLength(1);
    });

    it('should leave the composite through an exit point', async () => {
      const out = new SimpleState('Out');
      const exitPoint = new ExitPointState('X').setTarget(out);
      c.addChild(exitPoint);
      a.addTransition(exitPoint, 'LEAVE');
      sm.addState(out);
      const { observer, log } = recordingObserver();
      sm.addObserver(observer);
      await sm.start();

      await sm.handleEvent(Event.create('LEAVE'));

      expect(sm.getCurrentState()).toBe(out);
      expect(c.isActive()).toBe(false);
      expect(calls).toEqual(['enter C', 'enter A', 'exit A', 'exit C']);
      expect(log).toEqual(['enter:C', 'exit:C', 'enter:Out', 'transition:C->Out:LEAVE', 'processed:LEAVE']);
    });

    it('should re-enter the composite on an external self-transition', async () => {
      sm.addTransition(a, b, 'NEXT');
      sm.addTransition(c, c, 'RESTART');
      await sm.start();
      await sm.handleEvent(Event.create('NEXT'));
      calls.length = 0;

      await sm.handleEvent(Event.create('RESTART'));

      expect(calls).toEqual(['exit C', 'enter C', 'enter A']);
      expect(sm.getActiveConfiguration()).toEqual(['C.A']);
    });

    it('should enter a nested target directly, skipping the initial child', async () => {
      const outside = new SimpleState('Outside');
      sm.setInitialState(outside);
      sm.addState(c);
      sm.addTransition(outside, b, 'IN');
      await sm.start();

      await sm.handleEvent(Event.create('IN'));

      expect(sm.getCurrentState()).toBe(c);
      expect(sm.getActiveConfiguration()).toEqual(['C.B']);
      expect(calls).toEqual(['enter C', 'enter B']);
    });

    it('should follow an entry point to its target child', async () => {
      const outside = new SimpleState('Outside');
      const entry = new EntryPointState('E').setTarget(b);
      c.addChild(entry);
      sm.setInitialState(outside);
      sm.addTransition(outside, entry, 'IN');
      await sm.start();

      await sm.handleEvent(Event.create('IN'));

      expect(sm.getActiveConfiguration()).toEqual(['C.B']);
    });

    it('should route a child transition through a junction keyed by that child', async () => {
      const out = new SimpleState('Out');
      const junction = new JunctionState('J').addPath(a, out);
      sm.addState(junction).addState(out);
      sm.addTransition(a, junction, 'GO');
      await sm.start();

      await sm.handleEvent(Event.create('GO'));

      expect(sm.getActiveConfiguration()).toEqual(['Out']);
      expect(calls).toEqual(['enter C', 'enter A', 'exit A', 'exit C']);
    });

    it('should fire transitions declared from a grandchild', async () => {
      const d = new CompositeState('D');
      const e = new SimpleState('E');
      const out = new SimpleState('Out');
      d.addChild(e);
      c.setInitialChild(d);
      sm.addState(out);
      sm.addTransition(e, out, 'ESCAPE');
      await sm.start();
      expect(sm.getActiveConfiguration()).toEqual(['C.D.E']);

      await sm.handleEvent(Event.create('ESCAPE'));

      expect(sm.getActiveConfiguration()).toEqual(['Out']);
    });

    it('should switch to a sibling of the grandchild owner without leaving the composite', async () => {
      const d = new CompositeState('D');
      const e = new SimpleState('E');
      d.addChild(e);
      c.setInitialChild(d);
      sm.addTransition(e, b, 'UP');
      await sm.start();

      await sm.handleEvent(Event.create('UP'));

      expect(sm.getActiveConfiguration()).toEqual(['C.B']);
      expect(d.isActive()).toBe(false);
      expect(calls).toEqual(['enter C', 'enter B']);
    });

    it('should settle an initial choice child to its selected option', async () => {
      const route = new ChoiceState('Route');
      route.addChoice(ctx => ctx.get('route') === 'b', b).addElseChoice(a);
      c.addChild(route).setInitialChild(route);
      sm.getContext().set('route', 'b');

      await sm.start();

      expect(c.getCurrentChild()).toBe(b);
    });
  });

  it('should fail to start when the composite has no children', async () => {
    const sm = createMachine('emptyComposite');
    sm.setInitialState(new CompositeState('Empty'));

    await expect(sm.start()).rejects.toBeInstanceOf(MissingChildError);
    await sm.reset();
  });
});
