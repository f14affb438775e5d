import type { VisibilityErrorInfo, VisibilityErrorKind } from '@skywindow/shared';

interface ErrorContext {
  stationId?: string;
  sourceId?: string;
}

/**
 * Recoverable failure raised by the visibility engine. Every kind is a
 * deterministic input problem, so callers report it rather than retry.
 */
export class VisibilityError extends Error {
  readonly kind: VisibilityErrorKind;
  readonly parameter: string;
  readonly stationId?: string;
  readonly sourceId?: string;

  constructor(kind: VisibilityErrorKind, parameter: string, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'VisibilityError';
    this.kind = kind;
    this.parameter = parameter;
    this.stationId = context.stationId;
    this.sourceId = context.sourceId;
  }

  /** Copy of this error tagged with the pair it occurred in. */
  withContext(context: ErrorContext): VisibilityError {
    return new VisibilityError(this.kind, this.parameter, this.message, {
      stationId: context.stationId ?? this.stationId,
      sourceId: context.sourceId ?? this.sourceId,
    });
  }

  describe(): VisibilityErrorInfo {
    const info: VisibilityErrorInfo = { kind: this.kind, message: this.message, parameter: this.parameter };
    if (this.stationId !== undefined) info.stationId = this.stationId;
    if (this.sourceId !== undefined) info.sourceId = this.sourceId;
    return info;
  }
}

export function isVisibilityError(err: unknown): err is VisibilityError {
  return err instanceof VisibilityError;
}
