import { describe, it, expect } from '@jest/globals';
import { AsyncQueue } from '../../../src/utils/async-queue';
import { DelayQueue } from '../../../src/utils/delay-queue';
import { ManualClock, T0 } from '../../helpers/fixtures';

describe('AsyncQueue', () => {
  it('should hand items out in FIFO order', async () => {
    const queue = new AsyncQueue<string>(3);
    queue.offer('a');
    queue.offer('b');

    expect(await queue.take(10)).toBe('a');
    expect(await queue.take(10)).toBe('b');
  });

  it('should refuse offers beyond capacity', () => {
    const queue = new AsyncQueue<number>(2);
    expect(queue.offer(1)).toBe(true);
    expect(queue.offer(2)).toBe(true);
    expect(queue.offer(3)).toBe(false);
    expect(queue.size).toBe(2);
  });

  it('should resolve undefined when a take times out', async () => {
    const queue = new AsyncQueue<number>(1);
    expect(await queue.take(5)).toBeUndefined();
  });

  it('should pass an offer straight to a waiting taker', async () => {
    const queue = new AsyncQueue<number>(1);
    const pending = queue.take(1000);
    expect(queue.offer(7)).toBe(true);

    expect(await pending).toBe(7);
    expect(queue.size).toBe(0);
  });

  it('should wake takers and refuse offers once closed', async () => {
    const queue = new AsyncQueue<number>(1);
    const pending = queue.take(1000);
    queue.close();

    expect(await pending).toBeUndefined();
    expect(queue.offer(1)).toBe(false);
    expect(queue.isClosed).toBe(true);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new AsyncQueue<number>(0)).toThrow(RangeError);
  });
});

describe('DelayQueue', () => {
  it('should hold items until they fall due on its clock', async () => {
    const clock = new ManualClock();
    const queue = new DelayQueue<string>(5, clock.now);
    queue.offer('later', new Date(T0.getTime() + 1000));

    expect(await queue.take(10)).toBeUndefined();

    clock.advance(1000);
    expect(await queue.take(10)).toBe('later');
  });

  it('should order by due time and keep insertion order for ties', async () => {
    const clock = new ManualClock();
    const queue = new DelayQueue<string>(5, clock.now);
    queue.offer('c', new Date(T0.getTime() + 300));
    queue.offer('a1', new Date(T0.getTime() + 100));
    queue.offer('a2', new Date(T0.getTime() + 100));
    clock.advance(500);

    expect(await queue.take(10)).toBe('a1');
    expect(await queue.take(10)).toBe('a2');
    expect(await queue.take(10)).toBe('c');
  });

  it('should refuse offers when full', () => {
    const queue = new DelayQueue<number>(1);
    expect(queue.offer(1, new Date())).toBe(true);
    expect(queue.offer(2, new Date())).toBe(false);
  });

  it('should drain everything and stop handing out items once closed', async () => {
    const queue = new DelayQueue<number>(3);
    queue.offer(1, new Date(Date.now() + 60000));
    queue.offer(2, new Date(Date.now() + 60000));

    expect(queue.drain()).toEqual([1, 2]);
    queue.close();
    expect(await queue.take(1000)).toBeUndefined();
    expect(queue.offer(3, new Date())).toBe(false);
  });
});
