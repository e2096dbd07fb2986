/**
 * Exit codes are part of the scripting contract and must not change.
 */
export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  USAGE = 2,
  NOT_GIT_REPO = 10,
  CONTROL_ROOT_INVALID = 11,
  ISSUE_NOT_FOUND = 12,
  AMBIGUOUS_ID = 13,
  CLAIM_CONFLICT = 14,
  INVALID_GRAPH = 15,
  PARSE_ERROR = 16,
}

export type ErrorKind =
  | 'not_git_repo'
  | 'control_root_invalid'
  | 'issue_not_found'
  | 'ambiguous_id'
  | 'claim_conflict'
  | 'invalid_graph'
  | 'parse_error'
  | 'io_error'
  | 'usage_error'
  | 'error';

const EXIT_CODES: Record<ErrorKind, ExitCode> = {
  not_git_repo: ExitCode.NOT_GIT_REPO,
  control_root_invalid: ExitCode.CONTROL_ROOT_INVALID,
  issue_not_found: ExitCode.ISSUE_NOT_FOUND,
  ambiguous_id: ExitCode.AMBIGUOUS_ID,
  claim_conflict: ExitCode.CLAIM_CONFLICT,
  invalid_graph: ExitCode.INVALID_GRAPH,
  parse_error: ExitCode.PARSE_ERROR,
  io_error: ExitCode.FAILURE,
  usage_error: ExitCode.USAGE,
  error: ExitCode.FAILURE,
};

export interface ErrorDetails {
  candidates?: string[];
  cycle?: string[];
  file?: string;
}

export interface ErrorJson extends ErrorDetails {
  ok: false;
  code: ErrorKind;
  message: string;
  exit: number;
}

export class BrdError extends Error {
  readonly kind: ErrorKind;
  readonly details: ErrorDetails;

  constructor(kind: ErrorKind, message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BrdError';
    this.kind = kind;
    this.details = details;
  }

  get code(): ErrorKind {
    return this.kind;
  }

  get exitCode(): ExitCode {
    return EXIT_CODES[this.kind];
  }

  toJSON(): ErrorJson {
    return {
      ok: false,
      code: this.kind,
      message: this.message,
      exit: this.exitCode,
      ...this.details,
    };
  }

  static notGitRepo(dir: string, cause?: unknown): BrdError {
    return new BrdError('not_git_repo', `not a git repository: ${dir}`, {}, { cause });
  }

  static notInitialized(): BrdError {
    return new BrdError('control_root_invalid', 'braid not initialized in this repository (run `brd init`)');
  }

  static controlRoot(message: string): BrdError {
    return new BrdError('control_root_invalid', message);
  }

  static notFound(id: string): BrdError {
    return new BrdError('issue_not_found', `issue not found: ${id}`);
  }

  static ambiguous(input: string, candidates: string[]): BrdError {
    return new BrdError('ambiguous_id', `ambiguous issue id '${input}' matches: ${candidates.join(', ')}`, { candidates });
  }

  static claimConflict(message: string): BrdError {
    return new BrdError('claim_conflict', message);
  }

  static cycle(cycle: string[]): BrdError {
    return new BrdError('invalid_graph', `cannot add dependency: would create cycle: ${cycle.join(' -> ')}`, { cycle });
  }

  static parse(file: string, message: string): BrdError {
    return new BrdError('parse_error', `failed to parse ${file}: ${message}`, { file });
  }

  static io(message: string, cause?: unknown): BrdError {
    return new BrdError('io_error', message, {}, { cause });
  }

  static usage(message: string): BrdError {
    return new BrdError('usage_error', message);
  }

  static other(message: string): BrdError {
    return new BrdError('error', message);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'syscall' in error && typeof error.syscall === 'string';
}

/**
 * Normalises anything thrown into a BrdError so the CLI has one shape to report.
 */
export function toBrdError(error: unknown): BrdError {
  if (error instanceof BrdError) {
    return error;
  }
  if (isErrnoException(error)) {
    return BrdError.io(error.message, error);
  }
  if (error instanceof Error) {
    return new BrdError('error', error.message, {}, { cause: error });
  }
  return new BrdError('error', String(error));
}
