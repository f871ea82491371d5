export class StackError extends Error { }

export class ValidationError {
  path: string;
  message: string;
  value?: unknown;

  constructor(data: { path: string; message: string; value?: unknown }) {
    this.path = data.path;
    this.message = data.message;
    this.value = data.value;
  }

  toString(): string {
    return `${this.path}: ${this.message}`;
  }
}

export class ValidationErrors extends StackError {
  errors: ValidationError[];
  file?: string;

  constructor(errors: ValidationError[], file?: string) {
    super();

    this.name = 'ValidationErrors';
    if (file) {
      this.name += `\nfile: ${file}`;
    }
    this.errors = errors;
    this.file = file;
    this.message = errors.map(error => error.toString()).join('\n');
  }
}
