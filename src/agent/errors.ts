export abstract class CoachError extends Error {
  abstract readonly code: string;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends CoachError {
  readonly code = 'CONFIG_ERROR';
}

export class ProviderUnavailable extends CoachError {
  readonly code = 'PROVIDER_UNAVAILABLE';
  override readonly retryable = true;
}

export class ProviderTimeout extends CoachError {
  readonly code = 'PROVIDER_TIMEOUT';
  override readonly retryable = true;
}

export class PlanningFailure extends CoachError {
  readonly code = 'PLANNING_FAILURE';

  constructor(message: string, override readonly retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
  }
}

// Never reaches the user: the responder answers with a canned apology instead.
export class ResponderFailure extends CoachError {
  readonly code = 'RESPONDER_FAILURE';
}

// Per-invocation failures. They end up in a ToolResult, not in a thrown path.

export class UnknownTool extends CoachError {
  readonly code = 'UNKNOWN_TOOL';

  constructor(readonly toolName: string) {
    super(`Tool "${toolName}" is not registered`);
  }
}

export class InvalidArguments extends CoachError {
  readonly code = 'INVALID_ARGUMENTS';

  constructor(readonly toolName: string, readonly issues: string) {
    super(`Invalid arguments for ${toolName}: ${issues}`);
  }
}

export class ToolTimeout extends CoachError {
  readonly code = 'TOOL_TIMEOUT';
  override readonly retryable = true;

  constructor(readonly toolName: string, readonly timeoutMs: number) {
    super(`Tool ${toolName} timed out after ${timeoutMs}ms`);
  }
}

export class ToolExecutionError extends CoachError {
  readonly code = 'TOOL_EXECUTION_ERROR';

  constructor(readonly toolName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

// Resume-path misuse, surfaced to the caller as a client error.

export class UnknownRun extends CoachError {
  readonly code = 'UNKNOWN_RUN';

  constructor(readonly runId: string) {
    super(`No suspended run with id ${runId}`);
  }
}

export class RunAlreadyResolved extends CoachError {
  readonly code = 'RUN_ALREADY_RESOLVED';

  constructor(readonly runId: string) {
    super(`Run ${runId} has already been resolved`);
  }
}

export class SessionAwaitingApproval extends CoachError {
  readonly code = 'SESSION_AWAITING_APPROVAL';

  constructor(readonly runId: string) {
    super(`Session has a run waiting for approval (${runId}); decide on it first`);
  }
}

export class CheckpointCorrupt extends CoachError {
  readonly code = 'CHECKPOINT_CORRUPT';

  constructor(readonly runId: string, detail: string) {
    super(`Checkpoint for run ${runId} is unreadable: ${detail}`);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : JSON.stringify(err);
}
