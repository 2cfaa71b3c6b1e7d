/**
 * Prompt templates sent to the chat endpoint
 */

export function editPrompt(instruction: string, content: string): string {
  return `Edit the following code/content: ${instruction}\n\nContent:\n${content}`;
}

export function analyzePrompt(instruction: string, table: string): string {
  return `Analyze this data: ${instruction}\n\nData:\n${table}`;
}

export function nlpPrompt(task: string, text: string): string {
  return `Perform NLP task: ${task}\n\nText: ${text}`;
}
