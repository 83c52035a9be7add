export interface BoundedWindow<T> {
  /** Push a value, evicting the oldest if at capacity. */
  push(value: T): void;
  /** Iterate values in insertion order (oldest first). */
  forEach(fn: (value: T) => void): void;
  /** Lazy, restartable view of the current values (oldest first). */
  snapshot(): Iterable<T>;
  /** Copy current values into a plain array (oldest first). */
  toArray(): T[];
  /** Oldest value still held, or undefined when empty. */
  peekOldest(): T | undefined;
  /** Drop the oldest value. No-op when empty. */
  shift(): void;
  /** Reset to empty without reallocating. */
  clear(): void;
  /** Current number of values stored. */
  readonly length: number;
  readonly capacity: number;
}

/**
 * Fixed-capacity circular buffer.
 * O(1) push and eviction; slots are reused once the window is full.
 */
export function createWindow<T>(capacity: number): BoundedWindow<T> {
  const size = Math.max(1, Math.floor(capacity));
  const data: T[] = [];
  let head = 0;
  let count = 0;

  function at(i: number): T {
    return data[(head - count + i + size) % size];
  }

  return {
    push(value: T) {
      data[head] = value;
      head = (head + 1) % size;
      if (count < size) count++;
    },

    forEach(fn: (value: T) => void) {
      for (let i = 0; i < count; i++) fn(at(i));
    },

    snapshot(): Iterable<T> {
      return {
        *[Symbol.iterator]() {
          const n = count;
          for (let i = 0; i < n; i++) yield at(i);
        },
      };
    },

    toArray(): T[] {
      const result: T[] = new Array(count);
      for (let i = 0; i < count; i++) result[i] = at(i);
      return result;
    },

    peekOldest(): T | undefined {
      return count > 0 ? at(0) : undefined;
    },

    shift() {
      if (count > 0) count--;
    },

    clear() {
      data.length = 0;
      head = 0;
      count = 0;
    },

    get length() {
      return count;
    },

    get capacity() {
      return size;
    },
  };
}
