export class ShelfError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ShelfError';
  }
}

export class ConfigError extends ShelfError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ProfileNotFoundError extends ShelfError {
  constructor(public readonly profile: string) {
    super(`Profile '${profile}' was not found`, 'PROFILE_NOT_FOUND');
    this.name = 'ProfileNotFoundError';
  }
}

// ─── Library ──────────────────────────────────────────

export type LibraryErrorCode =
  | 'ALREADY_EXISTS'
  | 'PROJECT_NOT_FOUND'
  | 'INVALID_PATH'
  | 'INVALID_PROJECT_NAME'
  | 'IO_ERROR'
  | 'CLONE_FAILED';

export type LibraryOperation = 'scan' | 'create' | 'delete' | 'rename' | 'inspect' | 'clone';

export type IoErrorKind = 'not-found' | 'permission-denied' | 'not-a-directory' | 'already-exists' | 'other';

export type InvalidNameReason =
  | 'empty'
  | 'invalid-characters'
  | 'relative-path'
  | 'system-reserved'
  | 'windows-reserved';

export interface LibraryErrorDetails {
  operation: LibraryOperation;
  /** Project name or root path the operation targeted */
  target: string;
  ioKind?: IoErrorKind;
  reason?: InvalidNameReason;
}

const NAME_REASONS: Record<InvalidNameReason, string> = {
  'empty': 'name cannot be empty',
  'invalid-characters': 'name contains invalid characters',
  'relative-path': "name cannot be '.' or '..'",
  'system-reserved': 'name is reserved by the system',
  'windows-reserved': 'name is a reserved device name on Windows',
};

const IO_KINDS: Record<IoErrorKind, string> = {
  'not-found': 'not found',
  'permission-denied': 'permission denied',
  'not-a-directory': 'not a directory',
  'already-exists': 'already exists',
  'other': 'I/O error',
};

function describeLibraryError(code: LibraryErrorCode, details: LibraryErrorDetails, cause?: Error): string {
  const { operation, target } = details;
  switch (code) {
    case 'ALREADY_EXISTS':
      return `Name '${target}' is already taken`;
    case 'PROJECT_NOT_FOUND':
      return `Project '${target}' not found`;
    case 'INVALID_PATH':
      return `Projects directory '${target}' does not exist or is not a directory`;
    case 'INVALID_PROJECT_NAME':
      return `Invalid project name '${target}': ${NAME_REASONS[details.reason ?? 'invalid-characters']}`;
    case 'CLONE_FAILED':
      return `Failed to clone '${target}'${cause ? `: ${cause.message}` : ''}`;
    case 'IO_ERROR':
      return `Failed to ${operation} '${target}': ${IO_KINDS[details.ioKind ?? 'other']}${cause ? ` (${cause.message})` : ''}`;
  }
}

export class LibraryError extends ShelfError {
  declare readonly code: LibraryErrorCode;

  constructor(
    code: LibraryErrorCode,
    public readonly details: LibraryErrorDetails,
    cause?: Error,
  ) {
    super(describeLibraryError(code, details, cause), code, cause);
    this.name = 'LibraryError';
  }

  static alreadyExists(operation: LibraryOperation, name: string): LibraryError {
    return new LibraryError('ALREADY_EXISTS', { operation, target: name, ioKind: 'already-exists' });
  }

  static notFound(operation: LibraryOperation, name: string): LibraryError {
    return new LibraryError('PROJECT_NOT_FOUND', { operation, target: name });
  }

  static invalidPath(path: string): LibraryError {
    return new LibraryError('INVALID_PATH', { operation: 'scan', target: path });
  }

  static invalidName(operation: LibraryOperation, name: string, reason: InvalidNameReason): LibraryError {
    return new LibraryError('INVALID_PROJECT_NAME', { operation, target: name, reason });
  }

  static io(operation: LibraryOperation, target: string, err: unknown): LibraryError {
    const cause = err instanceof Error ? err : new Error(String(err));
    return new LibraryError('IO_ERROR', { operation, target, ioKind: classifyIoError(err) }, cause);
  }
}

/**
 * Map a Node.js system error onto the small set of kinds callers act on.
 */
export function classifyIoError(err: unknown): IoErrorKind {
  const code = errnoCode(err);
  switch (code) {
    case 'ENOENT':
      return 'not-found';
    case 'EACCES':
    case 'EPERM':
      return 'permission-denied';
    case 'ENOTDIR':
      return 'not-a-directory';
    case 'EEXIST':
    case 'ENOTEMPTY':
      return 'already-exists';
    default:
      return 'other';
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

// ─── Process ──────────────────────────────────────────

export type ProgramErrorCode =
  | 'PROGRAM_NOT_FOUND'
  | 'NO_PERMISSION'
  | 'PROCESS_INTERRUPTED'
  | 'NON_ZERO_EXIT_CODE'
  | 'UNEXPECTED_ERROR';

function describeProgramError(code: ProgramErrorCode, program: string, exitCode?: number, cause?: Error): string {
  switch (code) {
    case 'PROGRAM_NOT_FOUND':
      return `Failed to launch program '${program}': not found`;
    case 'NO_PERMISSION':
      return `No permission to execute '${program}'`;
    case 'PROCESS_INTERRUPTED':
      return `Process '${program}' was interrupted`;
    case 'NON_ZERO_EXIT_CODE':
      return `Program '${program}' exited with non-zero status: ${exitCode}`;
    case 'UNEXPECTED_ERROR':
      return `Unexpected error running '${program}'${cause ? `: ${cause.message}` : ''}`;
  }
}

export class ProgramError extends ShelfError {
  declare readonly code: ProgramErrorCode;

  constructor(
    code: ProgramErrorCode,
    public readonly program: string,
    public readonly exitCode?: number,
    cause?: Error,
  ) {
    super(describeProgramError(code, program, exitCode, cause), code, cause);
    this.name = 'ProgramError';
  }

  /** Classify an error raised while spawning or waiting for a child */
  static fromSpawnError(program: string, err: Error): ProgramError {
    switch (errnoCode(err)) {
      case 'ENOENT':
        return new ProgramError('PROGRAM_NOT_FOUND', program, undefined, err);
      case 'EACCES':
      case 'EPERM':
        return new ProgramError('NO_PERMISSION', program, undefined, err);
      case 'EINTR':
        return new ProgramError('PROCESS_INTERRUPTED', program, undefined, err);
      default:
        return new ProgramError('UNEXPECTED_ERROR', program, undefined, err);
    }
  }
}

// ─── Templates ────────────────────────────────────────

export type TemplateErrorCode =
  | 'TEMPLATE_NOT_FOUND'
  | 'TEMPLATE_EXISTS'
  | 'EMPTY_TEMPLATE'
  | 'SHELL_NOT_CONFIGURED'
  | 'STORE_ERROR';

function describeTemplateError(code: TemplateErrorCode, template: string): string {
  switch (code) {
    case 'TEMPLATE_NOT_FOUND':
      return `Template '${template}' not found`;
    case 'TEMPLATE_EXISTS':
      return `Template '${template}' already exists`;
    case 'EMPTY_TEMPLATE':
      return `Template '${template}' has no commands`;
    case 'SHELL_NOT_CONFIGURED':
      return 'Shell is not configured in the current profile';
    case 'STORE_ERROR':
      return `Failed to access templates file '${template}'`;
  }
}

export class TemplateError extends ShelfError {
  declare readonly code: TemplateErrorCode;

  constructor(
    code: TemplateErrorCode,
    public readonly template: string,
    cause?: Error,
  ) {
    const base = describeTemplateError(code, template);
    super(cause ? `${base}: ${cause.message}` : base, code, cause);
    this.name = 'TemplateError';
  }
}

/**
 * Raised when a template command fails. The project directory has been
 * rolled back, or `cleanupError` says why it could not be.
 */
export class ProvisionError extends ShelfError {
  constructor(
    public readonly project: string,
    public readonly command: string,
    public readonly step: number,
    cause: ProgramError,
    public readonly cleanupError?: ShelfError,
  ) {
    let message = `Template command '${command}' (step ${step}) failed: ${cause.message}`;
    if (cleanupError) {
      message += `; additionally, cleanup of '${project}' failed: ${cleanupError.message}`;
    }
    super(message, 'COMMAND_FAILED', cause);
    this.name = 'ProvisionError';
  }
}

// ─── Backup ───────────────────────────────────────────

export type BackupErrorCode = 'READ_FAILED' | 'WRITE_FAILED' | 'BAD_BACKUP';

export class BackupError extends ShelfError {
  declare readonly code: BackupErrorCode;

  constructor(code: BackupErrorCode, public readonly path: string, cause?: Error) {
    const base =
      code === 'READ_FAILED' ? `Cannot read backup file '${path}'`
        : code === 'WRITE_FAILED' ? `Failed to write backup file '${path}'`
          : `Error parsing backup file '${path}'`;
    super(cause ? `${base}: ${cause.message}` : base, code, cause);
    this.name = 'BackupError';
  }
}
