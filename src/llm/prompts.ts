import type { ConversationTurn, RetrievedChunk } from '../rag/schema';

export type ChatRole = 'system' | 'user' | 'assistant';

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export const DOCUMENT_ASSISTANT_PROMPT = `You are an assistant that answers questions about a collection of PDF documents.
Use only the numbered document excerpts provided with each question.

Response guidelines:
- Give a direct answer first, then the supporting details from the excerpts.
- Quote figures, dates and measurements exactly as they appear, with their units.
- Cite the excerpts you used by their number, e.g. [2].
- If the excerpts do not contain the answer, say "This information is not available in the documents."
- If the question is ambiguous, say what is unclear instead of guessing.`;

export const NO_CONTEXT_ANSWER = 'No relevant information was found in the documents for your question.';

export const formatContext = (chunks: RetrievedChunk[]): string =>
  chunks
    .map((chunk, index) => `[${index + 1}] (${chunk.metadata.source}, page ${chunk.metadata.page})\n${chunk.content.trim()}`)
    .join('\n\n');

export const buildUserMessage = (question: string, chunks: RetrievedChunk[]): string => `**Document Context:**
${chunks.length ? formatContext(chunks) : '(none)'}

**Question:** ${question.trim()}

Please provide a comprehensive answer based on the document content above.`;

export type PromptInput = {
  question: string;
  /** Retrieved chunks, nearest first. */
  context: RetrievedChunk[];
  history?: ConversationTurn[];
  maxInputChars: number;
};

export type AssembledPrompt = {
  messages: ChatMessage[];
  context: RetrievedChunk[];
  droppedChunks: number;
  droppedTurns: number;
};

const toMessages = (question: string, chunks: RetrievedChunk[], history: ConversationTurn[]): ChatMessage[] => [
  { role: 'system', content: DOCUMENT_ASSISTANT_PROMPT },
  ...history.flatMap<ChatMessage>((turn) => [
    { role: 'user', content: turn.question },
    { role: 'assistant', content: turn.answer },
  ]),
  { role: 'user', content: buildUserMessage(question, chunks) },
];

export const measureMessages = (messages: ChatMessage[]): number =>
  messages.reduce((total, message) => total + message.content.length, 0);

/**
 * Fits the prompt under `maxInputChars` by dropping the oldest turns first and
 * then the lowest-ranked chunks. The question itself is never cut.
 */
export const buildPrompt = ({ question, context, history = [], maxInputChars }: PromptInput): AssembledPrompt => {
  const turns = [...history];
  const chunks = [...context];
  let messages = toMessages(question, chunks, turns);

  while (measureMessages(messages) > maxInputChars && turns.length) {
    turns.shift();
    messages = toMessages(question, chunks, turns);
  }

  while (measureMessages(messages) > maxInputChars && chunks.length) {
    chunks.pop();
    messages = toMessages(question, chunks, turns);
  }

  return {
    messages,
    context: chunks,
    droppedChunks: context.length - chunks.length,
    droppedTurns: history.length - turns.length,
  };
};
