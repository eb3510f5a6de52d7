export type ToolsmithErrorCode =
  | 'SPECIFICATION_INCOMPLETE'
  | 'MODULE_LOAD_FAILURE'
  | 'FIX_REJECTED'
  | 'TRANSPORT_ERROR'
  | 'TOOL_NOT_FOUND'
  | 'DEBUG_SESSION_BUSY'
  | 'LIBRARY_ERROR'
  | 'INVALID_TOOL_NAME';

export class ToolsmithError extends Error {
  constructor(
    readonly code: ToolsmithErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class SpecificationIncompleteError extends ToolsmithError {
  constructor(
    readonly toolName: string,
    readonly missingDocument: string
  ) {
    super('SPECIFICATION_INCOMPLETE', `${missingDocument}.md not found for tool ${toolName}`);
  }
}

export class ModuleLoadError extends ToolsmithError {
  constructor(
    readonly modulePath: string,
    detail: string
  ) {
    super('MODULE_LOAD_FAILURE', `Failed to load ${modulePath}: ${detail}`);
  }
}

export class FixRejectedError extends ToolsmithError {
  constructor(
    readonly toolName: string,
    detail: string
  ) {
    super('FIX_REJECTED', `Fix for ${toolName} rejected: ${detail}`);
  }
}

export class TransportError extends ToolsmithError {
  constructor(
    readonly component: string,
    detail: string
  ) {
    super('TRANSPORT_ERROR', `LLM call for ${component} failed: ${detail}`);
  }
}

export class ToolNotFoundError extends ToolsmithError {
  constructor(readonly toolName: string) {
    super('TOOL_NOT_FOUND', `Tool '${toolName}' not found. Please check the tool name or install it first.`);
  }
}

export class DebugSessionBusyError extends ToolsmithError {
  constructor(readonly toolName: string) {
    super('DEBUG_SESSION_BUSY', `A debug session for ${toolName} is already in progress`);
  }
}

export class LibraryError extends ToolsmithError {
  constructor(
    readonly library: string,
    detail: string,
    readonly status?: number
  ) {
    super('LIBRARY_ERROR', `${library} library: ${detail}`);
  }
}

export class InvalidToolNameError extends ToolsmithError {
  constructor(readonly toolName: string) {
    super('INVALID_TOOL_NAME', `'${toolName}' is not a valid tool name.`);
  }
}

export interface StatusMessage {
  status: 'error';
  code: string;
  message: string;
}

export function toStatusMessage(error: unknown): StatusMessage {
  if (error instanceof ToolsmithError) {
    return { status: 'error', code: error.code, message: error.message };
  }
  return {
    status: 'error',
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}
