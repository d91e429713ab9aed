import type { Failure } from './types';

export type CopyrightErrorKind = 'ProjectDescriptor' | 'OutputWrite' | 'Usage';

export class CopyrightError extends Error {
  readonly kind: CopyrightErrorKind;

  constructor(kind: CopyrightErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CopyrightError';
    this.kind = kind;
  }
}

export class ProjectDescriptorError extends CopyrightError {
  readonly file: string;
  readonly field?: string;

  constructor(file: string, message: string, field?: string, options?: { cause?: unknown }) {
    super('ProjectDescriptor', message, options);
    this.name = 'ProjectDescriptorError';
    this.file = file;
    this.field = field;
  }
}

export class OutputWriteError extends CopyrightError {
  readonly file: string;

  constructor(file: string, cause: unknown) {
    super('OutputWrite', `Could not write '${file}': ${errorMessage(cause)}`, { cause });
    this.name = 'OutputWriteError';
    this.file = file;
  }
}

export class UsageError extends CopyrightError {
  constructor(message: string) {
    super('Usage', message);
    this.name = 'UsageError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function describeFailure(failure: Failure): string {
  switch (failure.kind) {
    case 'MissingRequiredField':
      return `'${failure.file}' is missing required field '${failure.field}', skipping it.`;
    case 'UnreadableDescriptor':
      return `Could not read '${failure.file}': ${failure.message}`;
    case 'AdapterUnavailable':
      return `${failure.ecosystem} license discovery unavailable: ${failure.message}`;
  }
}

/**
 * Descriptor failures mean the output is missing stanzas, so the run fails.
 * Adapter failures only degrade discovery.
 */
export function isFatalToRun(failure: Failure): boolean {
  return failure.kind !== 'AdapterUnavailable';
}
