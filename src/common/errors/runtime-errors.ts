import { StackError } from '../utils/errors';

export class PrerequisiteError extends StackError {
  constructor(message: string) {
    super();
    this.name = 'prerequisite_missing';
    this.message = message;
  }
}

export class RuntimeUnavailableError extends StackError {
  cause?: unknown;

  constructor(detail?: string, cause?: unknown) {
    super();
    this.name = 'runtime_unavailable';
    this.message = `The container runtime is not reachable${detail ? `: ${detail}` : ''}`;
    this.cause = cause;
  }
}
