/**
 * Estimated USD price per 1K tokens, matched by model id prefix (longest
 * prefix wins). Unknown models cost 0.
 */
const PRICE_PER_1K_TOKENS: ReadonlyArray<{ prefix: string; input: number; output: number }> = [
  { prefix: 'claude-opus-4', input: 0.015, output: 0.075 },
  { prefix: 'claude-sonnet-4', input: 0.003, output: 0.015 },
  { prefix: 'claude-3-7-sonnet', input: 0.003, output: 0.015 },
  { prefix: 'claude-3-5-sonnet', input: 0.003, output: 0.015 },
  { prefix: 'claude-haiku-4', input: 0.001, output: 0.005 },
  { prefix: 'claude-3-5-haiku', input: 0.0008, output: 0.004 },
  { prefix: 'claude-3-haiku', input: 0.00025, output: 0.00125 },
];

export function estimateCostUsd(model: string, inputTokens: number, outputTokens: number): number {
  const id = model.toLowerCase();
  let match: { input: number; output: number } | undefined;
  let matchLength = -1;
  for (const entry of PRICE_PER_1K_TOKENS) {
    if (id.startsWith(entry.prefix) && entry.prefix.length > matchLength) {
      match = entry;
      matchLength = entry.prefix.length;
    }
  }
  if (!match) return 0;
  return (inputTokens / 1000) * match.input + (outputTokens / 1000) * match.output;
}
