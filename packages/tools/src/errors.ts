/**
 * Error classes for external tool invocations
 */

/**
 * Base error class for tool errors
 */
export class ToolError extends Error {
  constructor(
    message: string,
    public readonly tool?: string,
  ) {
    super(message);
    this.name = 'ToolError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ToolError);
    }
  }
}

/**
 * Error thrown when the tool executable cannot be found
 */
export class ToolNotFoundError extends ToolError {
  constructor(tool: string) {
    super(`Command not found: ${tool}`, tool);
    this.name = 'ToolNotFoundError';
  }
}

/**
 * Error thrown when a tool exits with a status the caller cannot interpret
 */
export class ToolExecutionError extends ToolError {
  constructor(
    tool: string,
    public readonly args: readonly string[],
    public readonly exitCode: number,
    public readonly stderr: string = '',
  ) {
    const detail = stderr.trim();
    super(
      `'${[tool, ...args].join(' ')}' exited with code ${exitCode}${detail ? `: ${detail}` : ''}`,
      tool,
    );
    this.name = 'ToolExecutionError';
  }
}

/**
 * Error thrown when the license linter cannot produce a report
 */
export class LinterError extends ToolError {
  constructor(
    message: string,
    tool?: string,
    public readonly exitCode?: number,
  ) {
    super(message, tool);
    this.name = 'LinterError';
  }
}

/**
 * Error thrown when the history of a single file cannot be read
 */
export class HistoryError extends ToolError {
  constructor(
    public readonly path: string,
    reason: string,
    tool?: string,
  ) {
    super(`Failed to read history of ${path}${reason ? `: ${reason}` : ''}`, tool);
    this.name = 'HistoryError';
  }
}
