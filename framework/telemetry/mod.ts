/**
 * Telemetry & Observability
 *
 * Structured logging and tracing spans.
 */

export {
  Logger,
  getLogger,
  setLogger,
  createLogger,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './logger.ts';

export {
  isOTELEnabled,
  getOTELTracer,
  withSpan,
  SpanKind,
  SpanStatusCode,
  type CreateSpanOptions,
  type Span as OTELSpan,
  type Attributes as OTELAttributes,
} from './otel.ts';
