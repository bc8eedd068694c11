import type { LlmClient } from '../llm/client';
import { NO_CONTEXT_ANSWER } from '../llm/prompts';
import type { EmbeddingClient } from '../rag/embeddings';
import type { ConversationTurn, RetrievedChunk } from '../rag/schema';
import type { VectorIndex } from '../rag/vectorIndex';
import { retrieveTopChunks } from './retrieve';

type ChatSessionOptions = {
  index: VectorIndex;
  embeddingClient: EmbeddingClient;
  llmClient: LlmClient;
  topK?: number;
  /** Prior turns sent along with each question; 0 disables memory. */
  historyTurns?: number;
};

export type ChatAnswer = {
  answer: string;
  sources: RetrievedChunk[];
};

export class ChatSession {
  private readonly turns: ConversationTurn[] = [];

  private readonly topK: number;

  private readonly historyTurns: number;

  constructor(private readonly options: ChatSessionOptions) {
    this.topK = options.topK ?? 4;
    this.historyTurns = Math.max(0, options.historyTurns ?? 3);
  }

  get history(): ConversationTurn[] {
    return [...this.turns];
  }

  reset(): void {
    this.turns.length = 0;
  }

  private remember(turn: ConversationTurn): void {
    if (!this.historyTurns) {
      return;
    }

    this.turns.push(turn);

    while (this.turns.length > this.historyTurns) {
      this.turns.shift();
    }
  }

  async ask(question: string): Promise<ChatAnswer> {
    const { index, embeddingClient, llmClient } = this.options;
    const sources = await retrieveTopChunks(index, embeddingClient, question, this.topK);

    if (!sources.length) {
      return { answer: NO_CONTEXT_ANSWER, sources };
    }

    const answer = await llmClient.generate({
      question,
      context: sources,
      history: this.history,
    });

    this.remember({ question, answer });

    return { answer, sources };
  }
}
