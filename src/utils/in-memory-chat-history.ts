import { AIMessage, HumanMessage, type BaseMessage } from '@langchain/core/messages';

export interface ChatTurn {
  query: string;
  answer: string;
  timestamp: Date;
}

export interface ChatEntry {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Conversation log of one session. Turns are appended in order; once more than
 * `maxTurns` are held, the oldest are dropped.
 */
export class InMemoryChatHistory {
  private turns: ChatTurn[] = [];

  constructor(private readonly maxTurns: number = 20) {}

  addTurn(query: string, answer: string): void {
    this.turns.push({ query, answer, timestamp: new Date() });
    if (this.turns.length > this.maxTurns) {
      this.turns = this.turns.slice(this.turns.length - this.maxTurns);
    }
  }

  getUserMessages(): string[] {
    return this.turns.map((t) => t.query);
  }

  getEntries(): ChatEntry[] {
    return this.turns.flatMap((t): ChatEntry[] => [
      { role: 'user', content: t.query },
      { role: 'assistant', content: t.answer },
    ]);
  }

  /** Alternating human/AI messages for the model's context. */
  toMessages(): BaseMessage[] {
    return this.turns.flatMap((t) => [new HumanMessage(t.query), new AIMessage(t.answer)]);
  }
}
