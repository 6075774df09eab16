export const PROMPT_PREAMBLE =
  'You are a helpful AI assistant. Please answer the following question clearly and concisely.';

export function buildPrompt(question: string): string {
  return `${PROMPT_PREAMBLE}\n\nQuestion: ${question}\n\nAnswer:`;
}
