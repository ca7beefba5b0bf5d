export type ErrorCode =
  | 'MISSING_INPUT'
  | 'LAYOUT_CONFLICT'
  | 'TOOL_UNAVAILABLE'
  | 'COMPOSE_FAILED'
  | 'PORT_UNAVAILABLE'
  | 'CHANNEL_ERROR';

export class FirmwareError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// errors raised by the image merger, every one of them aborts before the output is written
export class MergeError extends FirmwareError {}

export interface MissingFile {
  name: string;
  path: string;
}

export class MissingInputError extends MergeError {
  readonly missing: MissingFile[];

  constructor(missing: MissingFile[]) {
    super('MISSING_INPUT', [
      `Missing ${missing.length === 1 ? 'segment file' : 'segment files'}:`,
      ...missing.map((file) => `  - ${file.name}: ${file.path}`),
    ].join('\n'));
    this.missing = missing;
  }
}

export type LayoutConflictReason = 'empty' | 'overlap' | 'unordered' | 'out-of-bounds' | 'invalid-offset';

export class LayoutConflictError extends MergeError {
  readonly reason: LayoutConflictReason;

  constructor(reason: LayoutConflictReason, message: string) {
    super('LAYOUT_CONFLICT', message);
    this.reason = reason;
  }
}

export class ToolUnavailableError extends MergeError {
  readonly tool: string;
  readonly tried: string[];

  constructor(tool: string, tried: string[]) {
    super('TOOL_UNAVAILABLE', [
      `${tool} not found. Locations tried:`,
      ...tried.map((location) => `  - ${location}`),
    ].join('\n'));
    this.tool = tool;
    this.tried = tried;
  }
}

export class ComposeFailedError extends MergeError {
  readonly diagnostics: string;
  readonly exitCode: number | null;

  constructor(diagnostics: string, exitCode: number | null = null) {
    super('COMPOSE_FAILED', `Image compose failed${
      exitCode === null ? '' : ` (exit code ${exitCode})`
    }: ${diagnostics}`);
    this.diagnostics = diagnostics;
    this.exitCode = exitCode;
  }
}

export class PortUnavailableError extends FirmwareError {
  readonly port: string;

  constructor(port: string, cause: unknown) {
    super('PORT_UNAVAILABLE', `Could not open serial port ${port}: ${
      cause instanceof Error ? cause.message : String(cause)
    }`, { cause });
    this.port = port;
  }
}

export class ChannelError extends FirmwareError {
  constructor(message: string, cause?: unknown) {
    super('CHANNEL_ERROR', message, { cause });
  }
}

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));
