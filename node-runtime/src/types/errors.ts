export class ValidationError extends Error {
  override readonly name = 'ValidationError';

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`);
  }
}

/** Input capture (recording) is not available on this machine. */
export class CapabilityUnavailableError extends Error {
  override readonly name = 'CapabilityUnavailableError';
}

export class TargetNotFoundError extends Error {
  override readonly name = 'TargetNotFoundError';
}

/** The OS input or image-matching backend failed or is missing. */
export class AutomationCapabilityError extends Error {
  override readonly name = 'AutomationCapabilityError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class AlreadyRunningError extends Error {
  override readonly name = 'AlreadyRunningError';

  constructor() {
    super('A workflow is already running');
  }
}

export class WorkflowLockedError extends Error {
  override readonly name = 'WorkflowLockedError';

  constructor() {
    super('Workflow cannot be edited while it is running');
  }
}

export class WorkflowFormatError extends Error {
  override readonly name = 'WorkflowFormatError';

  constructor(
    message: string,
    readonly issues: string[],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

/** A capture file line is not a raw input event. */
export class CaptureFormatError extends Error {
  override readonly name = 'CaptureFormatError';

  constructor(
    readonly line: number,
    message: string,
  ) {
    super(`line ${line}: ${message}`);
  }
}
