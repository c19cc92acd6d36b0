import type { ToolResult } from '@conclave/agent-contracts';

export function toolError(input: {
  code: string;
  message: string;
  retryable?: boolean;
  hint?: string;
  details?: Record<string, unknown>;
}): ToolResult {
  const header = `${input.code}: ${input.message}`;
  const hintBlock = input.hint ? `\n\nHint: ${input.hint}` : '';
  return {
    success: false,
    error: `${header}${hintBlock}`,
    errorDetails: {
      code: input.code,
      message: input.message,
      retryable: input.retryable,
      hint: input.hint,
      details: input.details,
    },
    metadata: {
      errorCode: input.code,
      retryable: input.retryable ?? false,
      ...(input.details || {}),
    },
  };
}

export function toolSuccess(output: string, metadata?: Record<string, unknown>): ToolResult {
  return metadata ? { success: true, output, metadata } : { success: true, output };
}

/**
 * Failed result for an exception caught at a tool boundary.
 */
export function toolErrorFromException(code: string, error: unknown, hint?: string): ToolResult {
  const message = error instanceof Error ? error.message : String(error);
  const details =
    error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? { causeCode: error.code }
      : undefined;
  return toolError({ code, message, hint, details });
}
