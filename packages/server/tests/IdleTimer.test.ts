import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { IdleTimer } from '../src/index.js';

describe('IdleTimer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should fire once after the timeout', () => {
    const onTimeout = vi.fn();
    const timer = new IdleTimer({ timeoutMs: 1000, onTimeout });
    timer.start();

    vi.advanceTimersByTime(999);
    expect(onTimeout).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(onTimeout).toHaveBeenCalledTimes(1);
    expect(timer.isRunning).toBe(false);

    vi.advanceTimersByTime(5000);
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it('should push the deadline back when activity is recorded', () => {
    const onTimeout = vi.fn();
    const timer = new IdleTimer({ timeoutMs: 1000, onTimeout });
    timer.start();

    vi.advanceTimersByTime(800);
    timer.recordActivity();
    vi.advanceTimersByTime(800);
    expect(onTimeout).not.toHaveBeenCalled();

    vi.advanceTimersByTime(200);
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it('should not arm itself on activity before start', () => {
    const onTimeout = vi.fn();
    const timer = new IdleTimer({ timeoutMs: 1000, onTimeout });

    timer.recordActivity();
    vi.advanceTimersByTime(2000);

    expect(timer.isRunning).toBe(false);
    expect(onTimeout).not.toHaveBeenCalled();
  });

  it('should stop firing after stop() is called', () => {
    const onTimeout = vi.fn();
    const timer = new IdleTimer({ timeoutMs: 1000, onTimeout });
    timer.start();
    timer.stop();

    vi.advanceTimersByTime(10000);

    expect(onTimeout).not.toHaveBeenCalled();
    expect(timer.isRunning).toBe(false);
  });
});
