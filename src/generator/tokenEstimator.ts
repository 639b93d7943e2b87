/** Rough prompt-token estimate: about four characters per token, never below one. */
export function estimateTokens(text?: string): number {
  if (!text) return 0;
  return Math.max(1, Math.ceil(text.length / 4));
}
