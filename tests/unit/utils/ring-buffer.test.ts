/**
 * Ring buffer tests
 */

import { describe, it, expect } from 'vitest';
import { RingBuffer } from '../../../src/utils/ring-buffer';

describe('RingBuffer', () => {
  it('should reject a non-positive capacity', () => {
    expect(() => new RingBuffer<number>(0)).toThrow(RangeError);
    expect(() => new RingBuffer<number>(2.5)).toThrow(RangeError);
  });

  it('should return items oldest first', () => {
    const buffer = new RingBuffer<number>(4);
    buffer.push(1);
    buffer.push(2);
    buffer.push(3);

    expect(buffer.toArray()).toEqual([1, 2, 3]);
    expect(buffer.size).toBe(3);
    expect(buffer.isFull()).toBe(false);
  });

  it('should overwrite the oldest item when full', () => {
    const buffer = new RingBuffer<number>(3);
    for (let i = 1; i <= 5; i++) buffer.push(i);

    expect(buffer.toArray()).toEqual([3, 4, 5]);
    expect(buffer.isFull()).toBe(true);
    expect(buffer.last()).toBe(5);
  });

  it('should return the newest items from tail', () => {
    const buffer = new RingBuffer<number>(5);
    for (let i = 1; i <= 7; i++) buffer.push(i);

    expect(buffer.tail(2)).toEqual([6, 7]);
    expect(buffer.tail(10)).toEqual([3, 4, 5, 6, 7]);
    expect(buffer.tail(0)).toEqual([]);
  });

  it('should empty on clear', () => {
    const buffer = new RingBuffer<string>(2);
    buffer.push('a');

    buffer.clear();

    expect(buffer.toArray()).toEqual([]);
    expect(buffer.last()).toBeUndefined();
  });
});
