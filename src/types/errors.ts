import type { ValidationError } from './index';

export enum ScheduleErrorCode {
  InvalidTimeFormat = 'InvalidTimeFormat',
  MissingField = 'MissingField',
  StartNotBeforeEnd = 'StartNotBeforeEnd',
  NoDaysSelected = 'NoDaysSelected',
  NoEventsToExport = 'NoEventsToExport',
  IndexOutOfRange = 'IndexOutOfRange',
  InvalidColorFormat = 'InvalidColorFormat',
  InvalidDay = 'InvalidDay',
  InvalidConfig = 'InvalidConfig',
  RenderFailed = 'RenderFailed'
}

/**
 * User-facing validation failure. Every code is recoverable.
 */
export class ScheduleError extends Error {
  readonly code: ScheduleErrorCode;
  readonly details: ValidationError[];

  constructor(code: ScheduleErrorCode, message: string, details: ValidationError[] = []) {
    super(message);
    this.name = 'ScheduleError';
    this.code = code;
    this.details = details;
  }
}

export function isScheduleError(value: unknown): value is ScheduleError {
  return value instanceof ScheduleError;
}
