import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { settleWithin, sleep } from '../sleep';

describe('sleep', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves true once the delay has elapsed', async () => {
    let settled: boolean | undefined;
    const pending = sleep(1_000).then((value) => {
      settled = value;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(settled).toBeUndefined();

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(settled).toBe(true);
  });

  it('resolves false as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    await vi.advanceTimersByTimeAsync(100);
    controller.abort();

    await expect(pending).resolves.toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('does not start a timer for an already aborted signal', async () => {
    await expect(sleep(1_000, AbortSignal.abort())).resolves.toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('ignores an abort that arrives after the delay', async () => {
    const controller = new AbortController();
    const pending = sleep(500, controller.signal);

    await vi.advanceTimersByTimeAsync(500);
    controller.abort();

    await expect(pending).resolves.toBe(true);
  });
});

describe('settleWithin', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const never = () => new Promise<void>(() => {});

  it('resolves true when the work settles, even by rejecting', async () => {
    await expect(settleWithin(Promise.resolve(), {})).resolves.toBe(true);
    await expect(
      settleWithin(Promise.reject(new Error('nope')), {})
    ).resolves.toBe(true);
  });

  it('gives up on stalled work when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = settleWithin(never(), { signal: controller.signal });

    controller.abort();

    await expect(pending).resolves.toBe(false);
  });

  it('gives up on stalled work after the timeout', async () => {
    let settled: boolean | undefined;
    const pending = settleWithin(never(), { timeoutMs: 2_000 }).then(
      (value) => {
        settled = value;
      }
    );

    await vi.advanceTimersByTimeAsync(1_999);
    expect(settled).toBeUndefined();

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(settled).toBe(false);
  });

  it('clears its timer once the work settles', async () => {
    await settleWithin(Promise.resolve(), { timeoutMs: 2_000 });

    expect(vi.getTimerCount()).toBe(0);
  });
});
