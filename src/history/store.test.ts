import { describe, it, expect } from 'vitest';
import { HistoryStore } from './store.js';
import type { HistoryLine } from '../types.js';

function line(text: string, isBotAuthored = false): HistoryLine {
  return { isBotAuthored, text };
}

describe('HistoryStore', () => {
  it('should return an empty snapshot for an unknown conversation without creating it', () => {
    const store = new HistoryStore(3);

    expect(store.snapshot('nope')).toEqual([]);
    expect(store.conversationCount()).toBe(0);
  });

  it('should keep lines in insertion order', () => {
    const store = new HistoryStore(5);
    store.append('c1', line('a'));
    store.append('c1', line('b'));

    expect(store.snapshot('c1').map(l => l.text)).toEqual(['a', 'b']);
  });

  it('should evict the oldest line once capacity is reached', () => {
    const store = new HistoryStore(3);
    for (const text of ['1', '2', '3', '4', '5']) {
      store.append('c1', line(text));
    }

    expect(store.size('c1')).toBe(3);
    expect(store.snapshot('c1').map(l => l.text)).toEqual(['3', '4', '5']);
  });

  it('should always hold the most recent min(capacity, appended) lines', () => {
    const capacity = 4;
    const store = new HistoryStore(capacity);
    const appended: string[] = [];

    for (let i = 0; i < 10; i++) {
      appended.push(`line-${i}`);
      store.append('c1', line(`line-${i}`));

      const expected = appended.slice(-Math.min(capacity, appended.length));
      expect(store.snapshot('c1').map(l => l.text)).toEqual(expected);
    }
  });

  it('should not deduplicate identical lines', () => {
    const store = new HistoryStore(5);
    store.append('c1', line('same'));
    store.append('c1', line('same'));

    expect(store.size('c1')).toBe(2);
  });

  it('should keep conversations separate', () => {
    const store = new HistoryStore(2);
    store.append('c1', line('one'));
    store.append('c2', line('two'));

    expect(store.snapshot('c1').map(l => l.text)).toEqual(['one']);
    expect(store.snapshot('c2').map(l => l.text)).toEqual(['two']);
    expect(store.conversationCount()).toBe(2);
  });

  it('should treat numeric and string ids as the same conversation', () => {
    const store = new HistoryStore(5);
    store.append(42, line('numeric'));
    store.append('42', line('string'));

    expect(store.snapshot(42).map(l => l.text)).toEqual(['numeric', 'string']);
  });

  it('should not change an earlier snapshot on later appends', () => {
    const store = new HistoryStore(2);
    store.append('c1', line('a'));
    const before = store.snapshot('c1');

    store.append('c1', line('b'));
    store.append('c1', line('c'));

    expect(before.map(l => l.text)).toEqual(['a']);
    expect(Object.isFrozen(before)).toBe(true);
  });

  it('should return equal snapshots when nothing was appended in between', () => {
    const store = new HistoryStore(3);
    store.append('c1', line('a', true));

    expect(store.snapshot('c1')).toEqual(store.snapshot('c1'));
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new HistoryStore(0)).toThrow(RangeError);
    expect(() => new HistoryStore(2.5)).toThrow(RangeError);
  });
});
