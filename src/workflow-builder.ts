/**
 * Workflow shapes on top of MachineBuilder
 *
 * A workflow is a line of steps advanced by one event (NEXT by default).
 * Conditional branches fan out through a choice and rejoin at the next step;
 * parallel branches run as regions and join the next step once every region
 * has finished.
 */

import { MachineBuilder, ParallelBuilder } from './builder';
import type { StateMachine, StateMachineOptions } from './state-machine';
import type { Action, Guard, StateMachineObserver } from './types';

export const DEFAULT_ADVANCE_EVENT = 'NEXT';

export interface WorkflowOptions extends StateMachineOptions {
  /** Event that moves the workflow from one step to the next */
  advanceEvent?: string;
}

/** What the next step hangs off */
type Tail = { kind: 'state'; name: string } | { kind: 'join'; parallel: ParallelBuilder };

export class WorkflowBuilder {
  readonly advanceEvent: string;
  private builder: MachineBuilder;
  private tails: Tail[] = [];
  private finished?: StateMachine;

  constructor(name: string, options: WorkflowOptions = {}) {
    const { advanceEvent, ...machineOptions } = options;
    this.advanceEvent = advanceEvent ?? DEFAULT_ADVANCE_EVENT;
    this.builder = new MachineBuilder(name, machineOptions);
  }

  /**
   * Sequential step; the action runs when the step is entered
   */
  step(name: string, action?: Action): this {
    this.builder.state(name, state => {
      if (action) state.addEntryAction(action);
    });
    this.connectTo(name);
    this.tails = [{ kind: 'state', name }];
    return this;
  }

  /**
   * Route through the first route whose guard holds, else through `otherwise`
   *
   * Each route is a step of its own; all of them lead to the next step. A
   * branch without `otherwise` waits in the choice when no guard holds.
   */
  branch(name: string, routes: Record<string, Guard>, otherwise?: string): this {
    const targets = Object.keys(routes);
    this.builder.choice(name, choice => {
      for (const target of targets) {
        choice.when(routes[target], target);
      }
      if (otherwise !== undefined) choice.otherwise(otherwise);
    });
    this.connectTo(name);

    if (otherwise !== undefined) targets.push(otherwise);
    for (const target of targets) {
      this.builder.state(target);
    }
    this.tails = targets.map((target): Tail => ({ kind: 'state', name: target }));
    return this;
  }

  /**
   * Run each branch's steps as a region; the advance event is broadcast to
   * every region, so one event moves all branches forward together
   */
  parallel(name: string, branches: Record<string, string[]>): this {
    const advance = this.advanceEvent;
    this.builder.parallel(name, parallel => {
      for (const [branch, steps] of Object.entries(branches)) {
        parallel.region(branch, region => {
          for (const step of steps) {
            region.state(step);
          }
          region.final('Done');
          const line = [...steps, 'Done'];
          for (let i = 1; i < line.length; i++) {
            region.transition(line[i - 1], line[i], advance);
          }
        });
      }
      this.connectTo(name);
      this.tails = [{ kind: 'join', parallel }];
    });
    return this;
  }

  observer(observer: StateMachineObserver): this {
    this.builder.observer(observer);
    return this;
  }

  /**
   * Close the workflow with a final state and build the machine
   *
   * @throws ConfigurationError for duplicate step names or an empty workflow
   */
  finish(finalName: string = 'Completed'): StateMachine {
    if (this.finished) return this.finished;
    this.builder.final(finalName);
    this.connectTo(finalName);
    this.tails = [];
    this.finished = this.builder.build();
    return this.finished;
  }

  private connectTo(target: string): void {
    for (const tail of this.tails) {
      if (tail.kind === 'state') {
        this.builder.transition(tail.name, target, this.advanceEvent);
      } else {
        tail.parallel.join(target);
      }
    }
  }
}
