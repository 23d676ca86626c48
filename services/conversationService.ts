import type { Turn } from "../models/conversations";

/**
 * One session's chat transcript. Append-only until cleared.
 */
export class ConversationStore {
  private turns: Turn[] = [];

  append(turn: Turn): void {
    this.turns.push(Object.freeze({ role: turn.role, content: turn.content }));
  }

  /**
   * Get every turn in submission order
   * @returns A copy; changing it does not change the store
   */
  all(): Turn[] {
    return [...this.turns];
  }

  clear(): void {
    this.turns = [];
  }

  get size(): number {
    return this.turns.length;
  }
}
