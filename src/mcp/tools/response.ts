import { debugError } from '../../shared/debug.js';

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: 'text' as const, text }] };
}

export function errorResponse(text: string): ToolResponse {
  return { content: [{ type: 'text' as const, text }], isError: true };
}

/**
 * Runs a tool body, turning any thrown error into an `isError` response so a
 * bad call never takes the server down.
 */
export async function runTool(
  tool: string,
  fn: () => ToolResponse | Promise<ToolResponse>,
): Promise<ToolResponse> {
  try {
    return await fn();
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Unknown error';
    debugError('mcp', `${tool}: error`, err);
    return errorResponse(`${tool} failed: ${message}`);
  }
}

export function plural(n: number, word: string): string {
  return `${n} ${word}${n !== 1 ? 's' : ''}`;
}
