// Response helpers shared by the generator and the orchestrator

import type { ModelResponse, ToolUseBlock } from '../../providers/types.js';

/**
 * Concatenates every text block in order. Tool-use blocks carry no
 * user-facing text and are skipped; no text at all yields ''.
 */
export function extractText(response: Pick<ModelResponse, 'content'>): string {
  let text = '';
  for (const block of response.content) {
    if (block.type === 'text') {
      text += block.text;
    }
  }
  return text;
}

export function getToolUseBlocks(response: Pick<ModelResponse, 'content'>): ToolUseBlock[] {
  return response.content.filter((block): block is ToolUseBlock => block.type === 'tool_use');
}

export function formatToolError(message: string): string {
  return `I encountered an error while searching: ${message}`;
}
