import { describe, it, expect } from 'vitest';
import { createCombinedAbortSignal } from '../lib/abort-signal.js';

describe('createCombinedAbortSignal', () => {
  it('aborts with a timeout reason', async () => {
    const { signal, cleanup } = createCombinedAbortSignal(undefined, 10);
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBeInstanceOf(Error);
    expect(signal.reason instanceof Error ? signal.reason.message : '').toBe('Timed out after 10ms');
    cleanup();
  });

  it('follows the caller signal', () => {
    const caller = new AbortController();
    const { signal, cleanup } = createCombinedAbortSignal(caller.signal, 10_000);
    caller.abort(new Error('stop'));
    expect(signal.aborted).toBe(true);
    cleanup();
  });

  it('starts aborted when the caller already gave up', () => {
    const caller = new AbortController();
    const reason = new Error('cancelled');
    caller.abort(reason);
    const { signal, cleanup } = createCombinedAbortSignal(caller.signal, 10_000);
    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBe(reason);
    cleanup();
  });
});
