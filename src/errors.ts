export interface ConfigValidationError {
  field: string;
  message: string;
}

export class ConfigError extends Error {
  readonly issues: ConfigValidationError[];

  constructor(message: string, issues: ConfigValidationError[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class SlotFetchError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SlotFetchError';
    this.status = status;
  }
}

export class SlotPageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SlotPageError';
  }
}

export class BookingLayoutError extends Error {
  readonly missing: string[];

  constructor(missing: string[], options?: ErrorOptions) {
    super(`Booking form is missing expected elements: ${missing.join(', ')}`, options);
    this.name = 'BookingLayoutError';
    this.missing = missing;
  }
}

export class BookingCancelledError extends Error {
  constructor(message = 'Booking cancelled: browser was closed during review.') {
    super(message);
    this.name = 'BookingCancelledError';
  }
}

export class FlowStepError extends Error {
  readonly flow: string;
  readonly step: string;

  constructor(flow: string, step: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Step "${step}" of flow "${flow}" failed: ${reason}`, { cause });
    this.name = 'FlowStepError';
    this.flow = flow;
    this.step = step;
  }
}

export function rootCause(error: unknown): unknown {
  let current = error;
  while (current instanceof FlowStepError) {
    current = current.cause;
  }
  return current;
}
