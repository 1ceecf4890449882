/**
 * Workflow Builder Tests
 */

import { ifDataEquals, setData } from '../src/conditions';
import { ConfigurationError } from '../src/errors';
import { Event } from '../src/event';
import { StateMachine } from '../src/state-machine';
import { MachineRunState } from '../src/types';
import { DEFAULT_ADVANCE_EVENT, WorkflowBuilder } from '../src/workflow-builder';
import { silentLogger } from './helpers';

describe('WorkflowBuilder', () => {
  const options = { queueCapacity: 20, timerTickMs: 5, logger: silentLogger };
  let sm: StateMachine | undefined;

  afterEach(async () => {
    await sm?.reset();
    sm = undefined;
  });

  function onboarding(): StateMachine {
    const machine = new WorkflowBuilder('onboarding', options)
      .step('Collect', setData('collected', true))
      .branch('Route', { Premium: ifDataEquals('tier', 'gold') }, 'Standard')
      .parallel('Checks', { identity: ['Verify'], billing: ['Invoice', 'Charge'] })
      .step('Activate')
      .finish();
    sm = machine;
    return machine;
  }

  async function next(machine: StateMachine): Promise<string[]> {
    await machine.handleEvent(Event.create(DEFAULT_ADVANCE_EVENT));
    return machine.getActiveConfiguration();
  }

  it('should run steps, branches and parallel branches in order', async () => {
    const machine = onboarding();
    machine.getContext().set('tier', 'gold');
    await machine.start();

    expect(machine.getActiveConfiguration()).toEqual(['Collect']);
    expect(machine.getContext().get('collected')).toBe(true);
    expect(await next(machine)).toEqual(['Premium']);
    expect(await next(machine)).toEqual(['Checks.identity.Verify', 'Checks.billing.Invoice']);
    expect(await next(machine)).toEqual(['Checks.identity.Done', 'Checks.billing.Charge']);
    expect(await next(machine)).toEqual(['Activate']);
    expect(await next(machine)).toEqual(['Completed']);
    expect(machine.getRunState()).toBe(MachineRunState.COMPLETED);
  });

  it('should take the fallback route when no guard holds', async () => {
    const machine = onboarding();
    await machine.start();

    expect(await next(machine)).toEqual(['Standard']);
    expect(await next(machine)).toEqual(['Checks.identity.Verify', 'Checks.billing.Invoice']);
  });

  it('should advance on a custom event', async () => {
    const machine = new WorkflowBuilder('custom', { ...options, advanceEvent: 'DONE' })
      .step('Draft')
      .step('Review')
      .finish('Published');
    sm = machine;
    await machine.start();

    await machine.handleEvent(Event.create(DEFAULT_ADVANCE_EVENT));
    expect(machine.getCurrentStateName()).toBe('Draft');

    await machine.handleEvent(Event.create('DONE'));
    await machine.handleEvent(Event.create('DONE'));
    expect(machine.getCurrentStateName()).toBe('Published');
    expect(machine.isCompleted()).toBe(true);
  });

  it('should join a trailing parallel step straight into the final state', async () => {
    const machine = new WorkflowBuilder('fanout', options).parallel('Both', { left: ['L'], right: ['R'] }).finish();
    sm = machine;
    await machine.start();

    await machine.handleEvent(Event.create(DEFAULT_ADVANCE_EVENT));

    expect(machine.getCurrentStateName()).toBe('Completed');
    expect(machine.isCompleted()).toBe(true);
  });

  it('should build only once', () => {
    const builder = new WorkflowBuilder('once', options).step('Only');

    expect(builder.finish()).toBe(builder.finish());
  });

  it('should reject duplicate step names', () => {
    const builder = new WorkflowBuilder('dupes', options).step('Same').step('Same');

    expect(() => builder.finish()).toThrow(ConfigurationError);
  });
});
