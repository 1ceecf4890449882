/**
 * Orthogonal regions
 *
 * Each region owns an independent engine with its own processing loop. The
 * parallel state broadcasts every event it receives to the active regions and
 * waits for all of them before deciding on the join.
 */

import type { Context } from './context';
import { RegionError, describeError } from './errors';
import { Event } from './event';
import { BaseState, State } from './state';
import type { StateMachine } from './state-machine';
import { MachineRunState } from './types';

export const PARALLEL_DONE_PREFIX = 'parallel.done.';
export const PARALLEL_ERROR_PREFIX = 'parallel.error.';

export class ParallelRegion {
  readonly name: string;
  readonly engine: StateMachine;
  private active = false;
  private completed = false;

  constructor(name: string, engine: StateMachine) {
    this.name = name;
    this.engine = engine;
  }

  isActive(): boolean {
    return this.active;
  }

  /**
   * Start the region's engine on a fork of the parent context
   */
  async start(ctx: Context): Promise<void> {
    this.completed = false;
    await this.engine.start({ context: ctx, signal: ctx.signal });
    this.active = true;
  }

  /**
   * Reset the region's engine, exiting its active chain
   */
  async stop(): Promise<void> {
    this.active = false;
    this.completed = false;
    await this.engine.reset();
  }

  isCompleted(): boolean {
    return this.completed || this.engine.isCompleted();
  }

  setCompleted(completed: boolean): void {
    this.completed = completed;
  }

  /**
   * Deliver an event and wait until the region has processed it
   */
  async dispatch(event: Event): Promise<void> {
    if (this.active && this.engine.isRunning()) {
      await this.engine.submit(event);
    }
  }
}

interface RegionWatch {
  region: ParallelRegion;
  onCompleted: () => void;
  onError: () => void;
}

export class ParallelState extends BaseState {
  readonly kind = 'parallel' as const;
  private regions = new Map<string, ParallelRegion>();
  private joinTarget?: State;
  private watches: RegionWatch[] = [];
  private broadcasts = 0;

  isParallel(): boolean {
    return true;
  }

  addRegion(name: string, engine: StateMachine): ParallelRegion {
    const region = new ParallelRegion(name, engine);
    this.regions.set(name, region);
    return region;
  }

  getRegion(name: string): ParallelRegion | undefined {
    return this.regions.get(name);
  }

  getRegions(): ParallelRegion[] {
    return Array.from(this.regions.values());
  }

  /**
   * State entered once every region has completed
   */
  setJoinTarget(target: State): this {
    this.joinTarget = target;
    return this;
  }

  getJoinTarget(): State | undefined {
    return this.joinTarget;
  }

  areAllRegionsCompleted(): boolean {
    const regions = this.getRegions();
    return regions.length > 0 && regions.every(region => region.isCompleted());
  }

  async enter(ctx: Context): Promise<void> {
    await super.enter(ctx);
    this.watchRegions(ctx);

    const regions = this.getRegions();
    const results = await Promise.allSettled(regions.map(region => region.start(ctx)));
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      this.unwatchRegions();
      await Promise.allSettled(regions.filter(region => region.isActive()).map(region => region.stop()));
      throw failure.reason;
    }
  }

  async exit(ctx: Context): Promise<void> {
    this.unwatchRegions();
    const results = await Promise.allSettled(this.getRegions().map(region => region.stop()));
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      throw failure.reason;
    }
    await super.exit(ctx);
  }

  async handleEvent(event: Event, _ctx: Context): Promise<State | undefined> {
    this.broadcasts++;
    try {
      await Promise.all(this.getRegions().map(region => region.dispatch(event)));
    } finally {
      this.broadcasts--;
    }

    const failed = this.getRegions().find(region => region.engine.getRunState() === MachineRunState.ERROR);
    if (failed) {
      throw new RegionError(this.name, failed.name, failed.engine.getLastError());
    }
    if (this.joinTarget && this.areAllRegionsCompleted()) {
      return this.joinTarget;
    }
    return undefined;
  }

  /**
   * Regions may complete or fail on their own (timers, activities); the
   * owning engine learns about it through a posted event
   */
  private watchRegions(ctx: Context): void {
    this.unwatchRegions();
    const owner = ctx.engine;
    const post = (name: string): void => {
      if (this.broadcasts > 0 || !owner.isRunning()) return;
      try {
        owner.sendEvent(Event.create(name));
      } catch (error) {
        owner.logger.warn('Could not post region notification', {
          machine: owner.getName(),
          state: this.name,
          event: name,
          error: describeError(error),
        });
      }
    };

    for (const region of this.getRegions()) {
      const watch: RegionWatch = {
        region,
        onCompleted: () => post(`${PARALLEL_DONE_PREFIX}${this.name}`),
        onError: () => post(`${PARALLEL_ERROR_PREFIX}${this.name}`),
      };
      region.engine.on('completed', watch.onCompleted);
      region.engine.on('machine_error', watch.onError);
      this.watches.push(watch);
    }
  }

  private unwatchRegions(): void {
    for (const watch of this.watches) {
      watch.region.engine.off('completed', watch.onCompleted);
      watch.region.engine.off('machine_error', watch.onError);
    }
    this.watches = [];
  }
}
