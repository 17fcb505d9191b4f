import {
  createDetailedError,
  ErrorCode,
  formatDetailedError,
  getSuggestion,
} from '../lib/errors.js';

// Type aliases: the SDK's tool result type has an index signature
type TextContent = {
  type: 'text';
  text: string;
};

export type ToolSuccess<T> = {
  content: TextContent[];
  structuredContent: T;
};

interface ToolErrorStructuredContent extends Record<string, unknown> {
  ok: false;
  error: {
    code: string;
    message: string;
    path?: string;
    suggestion?: string;
  };
}

export type ToolFailure = {
  content: TextContent[];
  structuredContent: ToolErrorStructuredContent;
  isError: true;
};

export type ToolResult<T> = ToolSuccess<T> | ToolFailure;

export function toolSuccess<T>(text: string, structuredContent: T): ToolSuccess<T> {
  return { content: [{ type: 'text', text }], structuredContent };
}

export function toolFailure(
  error: unknown,
  fallbackCode: ErrorCode,
  path?: string
): ToolFailure {
  const detailed = createDetailedError(error, path);
  if (detailed.code === ErrorCode.E_UNKNOWN) {
    detailed.code = fallbackCode;
    detailed.suggestion = getSuggestion(fallbackCode);
  }

  return {
    content: [{ type: 'text', text: formatDetailedError(detailed) }],
    structuredContent: {
      ok: false,
      error: {
        code: detailed.code,
        message: detailed.message,
        path: detailed.path,
        suggestion: detailed.suggestion,
      },
    },
    isError: true,
  };
}

/** Run a tool body, turning any thrown error into an `isError` result. */
export async function runTool<T>(
  run: () => Promise<ToolSuccess<T>>,
  fallbackCode: ErrorCode,
  path?: string
): Promise<ToolResult<T>> {
  try {
    return await run();
  } catch (error: unknown) {
    return toolFailure(error, fallbackCode, path);
  }
}
