import { describe, it, expect } from 'vitest';
import { createWindow } from '../src/buffer';

describe('createWindow', () => {
  it('starts empty', () => {
    const win = createWindow<number>(5);
    expect(win.length).toBe(0);
    expect(win.toArray()).toEqual([]);
    expect(win.peekOldest()).toBeUndefined();
  });

  it('pushes values under capacity', () => {
    const win = createWindow<number>(5);
    win.push(1);
    win.push(2);
    win.push(3);
    expect(win.length).toBe(3);
    expect(win.toArray()).toEqual([1, 2, 3]);
  });

  it('evicts the oldest value once past capacity', () => {
    const win = createWindow<number>(3);
    win.push(1);
    win.push(2);
    win.push(3);
    win.push(4); // evicts 1
    expect(win.length).toBe(3);
    expect(win.toArray()).toEqual([2, 3, 4]);
  });

  it('wraps around multiple times', () => {
    const win = createWindow<number>(3);
    for (let i = 1; i <= 10; i++) win.push(i);
    expect(win.length).toBe(3);
    expect(win.toArray()).toEqual([8, 9, 10]);
  });

  it('forEach iterates in insertion order after wrapping', () => {
    const win = createWindow<number>(3);
    for (const v of [10, 20, 30, 40]) win.push(v);

    const collected: number[] = [];
    win.forEach((v) => collected.push(v));
    expect(collected).toEqual([20, 30, 40]);
  });

  it('snapshot can be iterated more than once', () => {
    const win = createWindow<string>(2);
    win.push('a');
    win.push('b');
    win.push('c');

    const view = win.snapshot();
    expect([...view]).toEqual(['b', 'c']);
    expect([...view]).toEqual(['b', 'c']);
  });

  it('peekOldest and shift consume from the front', () => {
    const win = createWindow<number>(4);
    for (const v of [5, 6, 7, 8, 9]) win.push(v);

    expect(win.peekOldest()).toBe(6);
    win.shift();
    expect(win.peekOldest()).toBe(7);
    expect(win.toArray()).toEqual([7, 8, 9]);

    win.push(10);
    expect(win.toArray()).toEqual([7, 8, 9, 10]);
  });

  it('shift on an empty window is a no-op', () => {
    const win = createWindow<number>(2);
    win.shift();
    expect(win.length).toBe(0);
  });

  it('clear resets to empty and accepts new values', () => {
    const win = createWindow<number>(3);
    win.push(1);
    win.push(2);
    win.push(3);
    win.clear();
    expect(win.length).toBe(0);

    win.push(10);
    win.push(20);
    expect(win.toArray()).toEqual([10, 20]);
  });

  it('treats capacities below 1 as 1', () => {
    const win = createWindow<number>(0);
    expect(win.capacity).toBe(1);
    win.push(5);
    win.push(10);
    expect(win.toArray()).toEqual([10]);
  });
});
