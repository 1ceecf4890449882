/**
 * Timer Wheel Tests
 */

import { TimerWheel } from '../src/timer-wheel';
import { silentLogger, waitFor } from './helpers';

describe('TimerWheel', () => {
  let wheel: TimerWheel;

  beforeEach(() => {
    wheel = new TimerWheel(5, 100, silentLogger);
  });

  afterEach(() => {
    wheel.clear();
  });

  it('should run a task after its delay', async () => {
    const fired: string[] = [];
    wheel.schedule('t1', 20, () => fired.push('t1'));

    expect(wheel.getPendingCount()).toBe(1);
    expect(wheel.has('t1')).toBe(true);
    await waitFor(() => fired.length === 1);
    expect(fired).toEqual(['t1']);
    expect(wheel.getPendingCount()).toBe(0);
  });

  it('should hold the process open while a task is pending', () => {
    const setTimeoutSpy = jest.spyOn(global, 'setTimeout');

    wheel.schedule('held', 50, () => undefined);

    expect(setTimeoutSpy).toHaveBeenCalledTimes(1);
    const handle = setTimeoutSpy.mock.results[0].value;
    expect(handle.hasRef()).toBe(true);
    setTimeoutSpy.mockRestore();
  });

  it('should not run a cancelled task', async () => {
    const fired: string[] = [];
    wheel.schedule('t1', 10, () => fired.push('t1'));

    expect(wheel.cancel('t1')).toBe(true);
    expect(wheel.cancel('t1')).toBe(false);
    await new Promise(resolve => setTimeout(resolve, 40));
    expect(fired).toEqual([]);
  });

  it('should replace a task scheduled under the same id', async () => {
    const fired: string[] = [];
    wheel.schedule('t', 10, () => fired.push('first'));
    wheel.schedule('t', 10, () => fired.push('second'));

    expect(wheel.getPendingCount()).toBe(1);
    await waitFor(() => fired.length > 0);
    expect(fired).toEqual(['second']);
  });

  it('should handle delays longer than one lap', async () => {
    const small = new TimerWheel(5, 4, silentLogger);
    const fired: number[] = [];
    const startedAt = Date.now();
    small.schedule('long', 50, () => fired.push(Date.now() - startedAt));

    await waitFor(() => fired.length === 1);
    expect(fired[0]).toBeGreaterThanOrEqual(50);
    small.clear();
  });

  it('should keep ticking when a callback throws', async () => {
    const fired: string[] = [];
    wheel.schedule('bad', 5, () => {
      throw new Error('boom');
    });
    wheel.schedule('good', 15, () => fired.push('good'));

    await waitFor(() => fired.length === 1);
    expect(fired).toEqual(['good']);
  });

  it('should report stats and clear', () => {
    wheel.schedule('a', 100, () => undefined);
    wheel.schedule('b', 200, () => undefined);

    const stats = wheel.getStats();
    expect(stats.pendingTasks).toBe(2);
    expect(stats.bucketsUsed).toBe(2);
    expect(stats.tickMs).toBe(5);
    expect(stats.wheelSize).toBe(100);

    wheel.clear();
    expect(wheel.getPendingCount()).toBe(0);
  });
});
