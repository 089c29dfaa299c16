import { describe, it, expect } from 'vitest';
import { EvictingMap, EvictingQueue, FrozenMap } from '../../../src/trace/evicting-buffer.js';

describe('EvictingMap', () => {
  it('should keep entries in insertion order under capacity', () => {
    const map = new EvictingMap<string, number>(3);
    map.set('a', 1);
    map.set('b', 2);

    expect(Array.from(map)).toEqual([
      ['a', 1],
      ['b', 2],
    ]);
    expect(map.droppedCount).toBe(0);
  });

  it('should evict the oldest keys beyond capacity', () => {
    const map = new EvictingMap<string, number>(2);
    map.set('a', 1);
    map.set('b', 2);
    map.set('c', 3);
    map.set('d', 4);

    expect(Array.from(map.keys())).toEqual(['c', 'd']);
    expect(map.size).toBe(2);
    expect(map.droppedCount).toBe(2);
  });

  it('should update an existing key without growing or evicting', () => {
    const map = new EvictingMap<string, number>(2);
    map.set('a', 1);
    map.set('b', 2);
    map.set('a', 10);

    expect(map.size).toBe(2);
    expect(map.droppedCount).toBe(0);
    expect(map.get('a')).toBe(10);
  });

  it('should treat an updated key as the newest entry', () => {
    const map = new EvictingMap<string, number>(2);
    map.set('a', 1);
    map.set('b', 2);
    map.set('a', 10);
    map.set('c', 3);

    expect(map.toMap()).toEqual(
      new Map([
        ['a', 10],
        ['c', 3],
      ])
    );
    expect(map.has('b')).toBe(false);
  });

  it('should retain nothing at capacity zero', () => {
    const map = new EvictingMap<string, number>(0);

    expect(map.set('a', 1)).toBe(false);
    expect(map.set('a', 2)).toBe(false);
    expect(map.size).toBe(0);
    expect(map.droppedCount).toBe(2);
  });

  it('should reject invalid capacities', () => {
    expect(() => new EvictingMap(-1)).toThrow(RangeError);
    expect(() => new EvictingMap(1.5)).toThrow(RangeError);
  });

  it('should return an independent copy from toMap', () => {
    const map = new EvictingMap<string, number>(2);
    map.set('a', 1);
    const copy = map.toMap();
    map.set('b', 2);

    expect(copy.size).toBe(1);
  });
});

describe('EvictingQueue', () => {
  it('should retain only the most recent entries, oldest first', () => {
    const queue = new EvictingQueue<number>(3);
    for (let i = 1; i <= 5; i++) {
      queue.push(i);
    }

    expect(queue.toArray()).toEqual([3, 4, 5]);
    expect(queue.droppedCount).toBe(2);
  });

  it('should keep duplicate values as separate entries', () => {
    const queue = new EvictingQueue<string>(3);
    queue.push('x');
    queue.push('x');

    expect(queue.toArray()).toEqual(['x', 'x']);
  });

  it('should be iterable', () => {
    const queue = new EvictingQueue<number>(2);
    queue.push(1);
    queue.push(2);

    expect([...queue]).toEqual([1, 2]);
  });

  it('should empty itself on drain', () => {
    const queue = new EvictingQueue<number>(2);
    queue.push(1);
    queue.push(2);
    queue.push(3);

    expect(queue.drain()).toEqual([2, 3]);
    expect(queue.size).toBe(0);
    expect(queue.droppedCount).toBe(1);

    queue.push(4);
    expect(queue.toArray()).toEqual([4]);
  });

  it('should drop every push at capacity zero', () => {
    const queue = new EvictingQueue<number>(0);
    expect(queue.push(1)).toBe(false);
    expect(queue.toArray()).toEqual([]);
    expect(queue.droppedCount).toBe(1);
  });
});

describe('FrozenMap', () => {
  it('should keep the entries it was built with, in order', () => {
    const map = new FrozenMap([
      ['a', 1],
      ['b', 2],
    ]);

    expect(Array.from(map.keys())).toEqual(['a', 'b']);
    expect(map.get('b')).toBe(2);
    expect(Object.isFrozen(map)).toBe(true);
  });

  it('should throw on every write', () => {
    const map = new FrozenMap([['a', 1]]);

    expect(() => map.set('b', 2)).toThrow('Cannot set b: map is frozen');
    expect(() => map.delete('a')).toThrow('Cannot delete a: map is frozen');
    expect(() => map.clear()).toThrow('Cannot clear: map is frozen');
    expect(map.size).toBe(1);
  });

  it('should be produced by EvictingMap.toFrozenMap', () => {
    const source = new EvictingMap<string, number>(2);
    source.set('a', 1);
    const frozen = source.toFrozenMap();
    source.set('b', 2);

    expect(frozen).toBeInstanceOf(FrozenMap);
    expect(Array.from(frozen.keys())).toEqual(['a']);
  });
});
