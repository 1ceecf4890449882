/**
 * Defer State Tests
 */

import { CompositeState } from '../src/composite-state';
import { DeferState } from '../src/defer-state';
import { Event } from '../src/event';
import { SimpleState } from '../src/state';
import { StateMachine } from '../src/state-machine';
import { createMachine } from './helpers';

describe('DeferState', () => {
  let sm: StateMachine;
  let busy: DeferState;
  let idle: SimpleState;
  let processed: string[];

  beforeEach(() => {
    sm = createMachine('worker');
    const worker = new CompositeState('Worker');
    busy = new DeferState('Busy', ['JOB']);
    idle = new SimpleState('Idle');
    worker.addChild(busy).addChild(idle);
    worker.addInternalTransition(busy, idle, 'DONE');
    sm.setInitialState(worker);
    processed = [];
    sm.on('event_processed', (event: Event) => processed.push(`${event.name}:${String(event.payload)}`));
  });

  afterEach(async () => {
    await sm.reset();
  });

  it('should list the events it defers', () => {
    busy.addDeferredEvent('PING');

    expect(busy.getDeferredEventNames()).toEqual(['JOB', 'PING']);
    expect(busy.defers('JOB')).toBe(true);
    expect(busy.defers('DONE')).toBe(false);
  });

  it('should hold events while a nested defer state is active', async () => {
    await sm.start();
    sm.getContext().set('attempt', 1);

    await sm.handleEvent(Event.create('JOB', 'a'));
    await sm.handleEvent(Event.create('JOB', 'b'));

    expect(sm.getDeferredEventCount()).toBe(2);
    expect(processed).toEqual([]);
    const [first] = busy.getDeferredEvents();
    expect(first.context.get('attempt')).toBe(1);
    expect(first.deferredAt).toBeInstanceOf(Date);
  });

  it('should re-deliver held events after a child switch', async () => {
    await sm.start();
    await sm.handleEvent(Event.create('JOB', 'a'));
    await sm.handleEvent(Event.create('JOB', 'b'));

    await sm.handleEvent(Event.create('DONE'));

    expect(processed).toEqual(['DONE:undefined', 'JOB:a', 'JOB:b']);
    expect(sm.getDeferredEventCount()).toBe(0);
    expect(sm.getActiveConfiguration()).toEqual(['Worker.Idle']);
  });

  it('should drop held events on reset', async () => {
    await sm.start();
    await sm.handleEvent(Event.create('JOB', 'a'));

    await sm.reset();

    expect(sm.getDeferredEventCount()).toBe(0);
    expect(busy.getDeferredCount()).toBe(0);
  });
});
