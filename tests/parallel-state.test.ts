/**
 * Parallel State Tests
 */

import { ActionError, RegionError } from '../src/errors';
import { Event } from '../src/event';
import { ParallelState } from '../src/parallel-state';
import { FinalState, SimpleState } from '../src/state';
import { StateMachine } from '../src/state-machine';
import { TimeoutState } from '../src/timeout-state';
import { MachineRunState } from '../src/types';
import { createMachine, waitFor } from './helpers';

describe('ParallelState', () => {
  let sm: StateMachine;
  let left: StateMachine;
  let right: StateMachine;
  let parallel: ParallelState;
  let joined: SimpleState;

  beforeEach(() => {
    sm = createMachine('orders');
    left = createMachine('payment');
    right = createMachine('shipping');
    parallel = new ParallelState('P');
    joined = new SimpleState('Joined');
    parallel.addRegion('payment', left);
    parallel.addRegion('shipping', right);
    parallel.setJoinTarget(joined);
    sm.setInitialState(parallel);
    sm.addState(joined);
  });

  afterEach(async () => {
    await sm.reset();
    await left.reset();
    await right.reset();
  });

  function simpleRegion(machine: StateMachine, finishEvent: string): void {
    const pending = new SimpleState('Pending');
    const done = new FinalState('Done');
    machine.setInitialState(pending);
    machine.addState(done);
    machine.addTransition(pending, done, finishEvent);
  }

  it('should register regions by name', () => {
    expect(parallel.getRegions().map(region => region.name)).toEqual(['payment', 'shipping']);
    expect(parallel.getRegion('payment')?.engine).toBe(left);
    expect(parallel.getJoinTarget()).toBe(joined);
    expect(new ParallelState('Empty').areAllRegionsCompleted()).toBe(false);
  });

  it('should start every region on entry', async () => {
    simpleRegion(left, 'PAID');
    simpleRegion(right, 'SHIPPED');

    await sm.start();

    expect(left.isRunning()).toBe(true);
    expect(right.isRunning()).toBe(true);
    expect(sm.getActiveConfiguration()).toEqual(['P.payment.Pending', 'P.shipping.Pending']);
  });

  it('should join only once both regions have completed', async () => {
    simpleRegion(left, 'PAID');
    simpleRegion(right, 'SHIPPED');
    await sm.start();

    await sm.handleEvent(Event.create('PAID'));
    expect(left.isCompleted()).toBe(true);
    expect(sm.getCurrentState()).toBe(parallel);
    expect(sm.getActiveConfiguration()).toEqual(['P.payment.Done', 'P.shipping.Pending']);

    await sm.handleEvent(Event.create('SHIPPED'));

    expect(sm.getCurrentState()).toBe(joined);
    expect(left.getRunState()).toBe(MachineRunState.STOPPED);
    expect(right.getRunState()).toBe(MachineRunState.STOPPED);
    expect(sm.getQueueSize()).toBe(0);
  });

  it('should join when regions complete on their own', async () => {
    const done = new FinalState('Done');
    left.setInitialState(new TimeoutState('Waiting', 20, { target: done }));
    left.addState(done);
    right.setInitialState(new FinalState('Ready'));

    await sm.start();

    await waitFor(() => sm.getCurrentState() === joined);
  });

  it('should halt the parent when a region fails during a broadcast', async () => {
    simpleRegion(left, 'PAID');
    simpleRegion(right, 'SHIPPED');
    const broken = new SimpleState('Broken').addEntryAction(() => {
      throw new Error('card declined');
    });
    left.addTransition(left.getState('Pending'), broken, 'CHARGE');
    await sm.start();

    await expect(sm.handleEvent(Event.create('CHARGE'))).rejects.toThrow(
      'Region payment of P failed: entry action failed in Broken: card declined'
    );
    expect(sm.getRunState()).toBe(MachineRunState.ERROR);
    expect(sm.getLastError()).toBeInstanceOf(RegionError);
  });

  it('should halt the parent when a region fails on its own', async () => {
    left.setInitialState(
      new SimpleState('Charging').setDoActivity(async () => {
        throw new Error('gateway down');
      })
    );
    simpleRegion(right, 'SHIPPED');

    await sm.start();

    await waitFor(() => sm.getRunState() === MachineRunState.ERROR);
    expect(sm.getLastError()?.message).toBe('Region payment of P failed: do-activity failed in Charging: gateway down');
  });

  it('should stop started regions when another region cannot start', async () => {
    left.setInitialState(
      new SimpleState('Pending').addEntryAction(() => {
        throw new Error('no account');
      })
    );
    simpleRegion(right, 'SHIPPED');

    await expect(sm.start()).rejects.toBeInstanceOf(ActionError);

    expect(right.getRunState()).toBe(MachineRunState.STOPPED);
    expect(sm.getRunState()).toBe(MachineRunState.ERROR);
  });

  it('should give regions a fork of the parent context', async () => {
    simpleRegion(left, 'PAID');
    simpleRegion(right, 'SHIPPED');
    sm.getContext().set('orderId', 'order-1');

    await sm.start();
    left.getContext().set('paid', true);

    expect(left.getContext().get('orderId')).toBe('order-1');
    expect(sm.getContext().has('paid')).toBe(false);
  });
});
