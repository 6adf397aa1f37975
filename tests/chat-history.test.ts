import { describe, it, expect } from 'vitest';
import { BoundedQueue } from '../src/services/chat/bounded-queue';
import { ChatHistoryStore } from '../src/services/chat/chat-history';
import type { ChatEntry } from '../src/types/chat';

function entry(message: string): ChatEntry {
  return { type: 'user', message, timestamp: '2026-10-18T10:00:00.000Z' };
}

describe('BoundedQueue', () => {
  it('should keep entries in insertion order below capacity', () => {
    const queue = new BoundedQueue<number>(3);
    queue.push(1);
    queue.push(2);
    expect(queue.toArray()).toEqual([1, 2]);
    expect(queue.size).toBe(2);
  });

  it('should evict the oldest entries first', () => {
    const queue = new BoundedQueue<number>(3);
    for (let i = 1; i <= 5; i++) {
      queue.push(i);
    }
    expect(queue.toArray()).toEqual([3, 4, 5]);
  });

  it('should evict correctly when several entries are pushed at once', () => {
    const queue = new BoundedQueue<string>(2);
    queue.push('a', 'b', 'c');
    expect(queue.toArray()).toEqual(['b', 'c']);
  });

  it('should return a copy', () => {
    const queue = new BoundedQueue<number>(2);
    queue.push(1);
    queue.toArray().push(99);
    expect(queue.toArray()).toEqual([1]);
  });

  it('should clear', () => {
    const queue = new BoundedQueue<number>(2);
    queue.push(1, 2);
    queue.clear();
    expect(queue.size).toBe(0);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new BoundedQueue<number>(0)).toThrow(RangeError);
    expect(() => new BoundedQueue<number>(1.5)).toThrow(RangeError);
  });
});

describe('ChatHistoryStore', () => {
  it('should cap each user at 50 entries by default', () => {
    const history = new ChatHistoryStore();
    for (let i = 0; i < 60; i++) {
      history.append('alice', entry(`message ${i}`));
    }

    const entries = history.get('alice');
    expect(entries).toHaveLength(50);
    expect(entries[0].message).toBe('message 10');
    expect(entries[49].message).toBe('message 59');
  });

  it('should keep histories per user', () => {
    const history = new ChatHistoryStore(5);
    history.append('alice', entry('hi from alice'));
    history.append('bob', entry('hi from bob'));

    expect(history.get('alice').map(e => e.message)).toEqual(['hi from alice']);
    expect(history.get('bob').map(e => e.message)).toEqual(['hi from bob']);
    expect(history.get('carol')).toEqual([]);
  });

  it('should clear one user only', () => {
    const history = new ChatHistoryStore(5);
    history.append('alice', entry('a'));
    history.append('bob', entry('b'));
    history.clear('alice');

    expect(history.get('alice')).toEqual([]);
    expect(history.get('bob')).toHaveLength(1);
  });
});
