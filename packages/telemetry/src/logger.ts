/**
 * Context-bound logger handles.
 */

import type { LogLevel } from "./levels.js";
import { createLogRecord } from "./record.js";
import { activeTraceIds } from "./scope.js";
import type { Fields, LogRecord, TraceIds } from "./types.js";

/**
 * Where a handle sends its records. Implemented by a pipeline, and by the
 * process-wide proxy that forwards to whichever pipeline is active.
 */
export interface EmitTarget {
  /** Threshold check made before any record is built */
  isEnabled(level: LogLevel): boolean;
  /** Fields bound by the innermost active context scope */
  scopedFields(): Fields | undefined;
  /** Fire-and-forget hand-off; never throws */
  submit(record: LogRecord): void;
}

const NO_FIELDS: Fields = Object.freeze({});

/**
 * An immutable logger bound to a component name and a set of fields.
 *
 * `bind` and `withTrace` return new handles; the receiver never changes, so
 * a handle can be shared freely across concurrent tasks.
 *
 * Field precedence on emit, lowest to highest: bound fields, scoped
 * context fields, call-site fields.
 */
export class LoggerHandle {
  readonly component: string;
  readonly fields: Fields;
  readonly trace: TraceIds | undefined;

  private readonly target: EmitTarget;

  constructor(target: EmitTarget, component: string, fields: Fields = NO_FIELDS, trace?: TraceIds) {
    this.target = target;
    this.component = component;
    this.fields = Object.isFrozen(fields) ? fields : Object.freeze({ ...fields });
    this.trace = trace;
  }

  bind(fields: Fields): LoggerHandle {
    return new LoggerHandle(
      this.target,
      this.component,
      Object.freeze({ ...this.fields, ...fields }),
      this.trace,
    );
  }

  /**
   * Pins trace correlation ids. Without this, ids come from the active
   * OpenTelemetry span at emit time, if any.
   */
  withTrace(trace: TraceIds): LoggerHandle {
    return new LoggerHandle(this.target, this.component, this.fields, trace);
  }

  isEnabledFor(level: LogLevel): boolean {
    return this.target.isEnabled(level);
  }

  emit(level: LogLevel, message: string, fields?: Fields): void {
    if (!this.target.isEnabled(level)) {
      return;
    }

    const trace = this.trace ?? activeTraceIds();
    const record = createLogRecord({
      level,
      message,
      component: this.component,
      fields: { ...this.fields, ...this.target.scopedFields(), ...fields },
      traceId: trace?.traceId,
      spanId: trace?.spanId,
    });
    this.target.submit(record);
  }

  debug(message: string, fields?: Fields): void {
    this.emit("DEBUG", message, fields);
  }

  info(message: string, fields?: Fields): void {
    this.emit("INFO", message, fields);
  }

  warning(message: string, fields?: Fields): void {
    this.emit("WARNING", message, fields);
  }

  error(message: string, fields?: Fields): void {
    this.emit("ERROR", message, fields);
  }

  critical(message: string, fields?: Fields): void {
    this.emit("CRITICAL", message, fields);
  }
}
