/**
 * Listener registry tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ListenerSet } from '../../../src/utils/listeners';
import type { LogTarget } from '../../../src/utils/logger';

function recordingLogger(): LogTarget & { errors: string[] } {
  const errors: string[] = [];
  return {
    errors,
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: (message, error) => {
      errors.push(`${message}: ${error?.message ?? ''}`);
    },
  };
}

describe('ListenerSet', () => {
  it('should call listeners in subscription order with the emitted arguments', () => {
    const set = new ListenerSet<[string, number]>('test', recordingLogger());
    const calls: string[] = [];
    set.add((id, n) => calls.push(`a:${id}:${n}`));
    set.add((id, n) => calls.push(`b:${id}:${n}`));

    set.emit('p1', 3);

    expect(calls).toEqual(['a:p1:3', 'b:p1:3']);
  });

  it('should stop calling a listener after unsubscribe', () => {
    const set = new ListenerSet<[]>('test', recordingLogger());
    const listener = vi.fn();
    const unsubscribe = set.add(listener);

    unsubscribe();
    set.emit();

    expect(listener).not.toHaveBeenCalled();
    expect(set.size).toBe(0);
  });

  it('should log a throwing listener and keep going', () => {
    const logger = recordingLogger();
    const set = new ListenerSet<[]>('readiness', logger);
    const after = vi.fn();
    set.add(() => {
      throw new Error('view crashed');
    });
    set.add(after);

    set.emit();

    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.errors).toEqual(['readiness listener threw: view crashed']);
  });

  it('should tolerate unsubscribing during emit', () => {
    const set = new ListenerSet<[]>('test', recordingLogger());
    const second = vi.fn();
    const unsubscribeSelf = set.add(() => unsubscribeSelf());
    set.add(second);

    set.emit();

    expect(second).toHaveBeenCalledTimes(1);
  });
});
