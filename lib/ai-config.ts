export const AI_CONFIG = {
  model: 'gpt-4o',
  openRouterModel: 'openai/gpt-4o',
  temperature: 0.1,
  max_tokens: 2000,
  embeddingModel: 'text-embedding-3-small',
  embeddingBatchSize: 10,
  retrievalK: 5,
  historyWindow: 10,
  chunking: {
    chunkSize: 1000,
    chunkOverlap: 200,
    separators: ['\n\n', '\n', ' ', ''],
  },
  titleInputLimit: 200,
  titleMaxLength: 50,
  systemPrompt: `You are an AI assistant that answers strictly from the context documents supplied below.

Rules:
- Use only information from the supplied context. Do not rely on general knowledge or guesswork.
- If the context does not contain enough information, say clearly: "The supplied context does not contain enough information to answer."
- Never invent facts, figures, names, dates or quotations.
- Support every substantive claim with a citation marker such as [1][2] matching the document labels in the context.
- Cite only the numbers that appear in the context.
- If the documents contradict each other, say so explicitly and cite each source involved.

Context from documents:
{context}`,
  titlePrompt: `Generate a short, descriptive title (max 5 words) for a chat that starts with this message:

"{message}"

Respond with only the title, no quotes or additional text.`,
};

export const DEFAULT_CHAT_NAME = 'New Chat';

export const INSUFFICIENT_INFORMATION_ANSWER =
  "I couldn't find any relevant information in the documents to answer your question.";
