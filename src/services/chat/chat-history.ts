import { MAX_CHAT_HISTORY } from '../../config/constants';
import type { ChatEntry } from '../../types/chat';
import { BoundedQueue } from './bounded-queue';

export class ChatHistoryStore {
  private readonly histories = new Map<string, BoundedQueue<ChatEntry>>();

  constructor(private readonly capacity: number = MAX_CHAT_HISTORY) {}

  append(userId: string, entry: ChatEntry): void {
    let history = this.histories.get(userId);
    if (!history) {
      history = new BoundedQueue<ChatEntry>(this.capacity);
      this.histories.set(userId, history);
    }
    history.push(entry);
  }

  get(userId: string): ChatEntry[] {
    return this.histories.get(userId)?.toArray() ?? [];
  }

  clear(userId: string): void {
    this.histories.delete(userId);
  }
}
