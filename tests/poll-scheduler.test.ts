import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../src/main/services/logger', () => ({
  createLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import { PeriodicTask } from '../src/main/services/poll-scheduler';

describe('PeriodicTask', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs the task once per interval', async () => {
    const fn = vi.fn();
    const task = new PeriodicTask('test', fn, 100);
    task.start();

    await vi.advanceTimersByTimeAsync(350);
    expect(fn).toHaveBeenCalledTimes(3);
    task.stop();
  });

  it('does not run before the first interval elapses', async () => {
    const fn = vi.fn();
    const task = new PeriodicTask('test', fn, 100);
    task.start();

    await vi.advanceTimersByTimeAsync(99);
    expect(fn).not.toHaveBeenCalled();
    task.stop();
  });

  it('stops running after stop()', async () => {
    const fn = vi.fn();
    const task = new PeriodicTask('test', fn, 100);
    task.start();
    await vi.advanceTimersByTimeAsync(100);
    task.stop();
    await vi.advanceTimersByTimeAsync(500);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(task.isRunning()).toBe(false);
  });

  it('does not stack timers when started twice', async () => {
    const fn = vi.fn();
    const task = new PeriodicTask('test', fn, 100);
    task.start();
    task.start();

    await vi.advanceTimersByTimeAsync(100);
    expect(fn).toHaveBeenCalledTimes(1);
    task.stop();
  });

  it('skips intervals while a run is still in flight', async () => {
    let release: () => void = () => {};
    const fn = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );
    const task = new PeriodicTask('test', fn, 100);

    const first = task.runOnce();
    await expect(task.runOnce()).resolves.toBe(false);
    expect(task.getSkippedCount()).toBe(1);
    expect(fn).toHaveBeenCalledTimes(1);

    release();
    await expect(first).resolves.toBe(true);
    await expect(task.runOnce()).resolves.toBe(true);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('keeps the schedule going after the task throws', async () => {
    const fn = vi.fn(() => {
      throw new Error('boom');
    });
    const task = new PeriodicTask('test', fn, 100);
    task.start();

    await vi.advanceTimersByTimeAsync(300);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(task.isRunning()).toBe(true);
    task.stop();
  });

  it('recovers after a rejected run', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('async boom')).mockResolvedValue(undefined);
    const task = new PeriodicTask('test', fn, 100);

    await expect(task.runOnce()).resolves.toBe(true);
    await expect(task.runOnce()).resolves.toBe(true);
    expect(task.getSkippedCount()).toBe(0);
  });

  it('applies a new interval to a running schedule', async () => {
    const fn = vi.fn();
    const task = new PeriodicTask('test', fn, 100);
    task.start();
    task.setIntervalMs(1000);

    await vi.advanceTimersByTimeAsync(999);
    expect(fn).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(task.getIntervalMs()).toBe(1000);
    task.stop();
  });

  it('does not start a stopped schedule when the interval changes', () => {
    const task = new PeriodicTask('test', vi.fn(), 100);
    task.setIntervalMs(50);
    expect(task.isRunning()).toBe(false);
    expect(task.getIntervalMs()).toBe(50);
  });
});
