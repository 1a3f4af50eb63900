// Main entry point
export { Reader } from './Reader.js';
export type { ReaderOptions, ReaderStats, ReadMode } from './Reader.js';

// Domain model
export { FieldType, FieldKind, kindOf } from './domain/model/FieldType.js';
export type { FieldTypeOptions } from './domain/model/FieldType.js';
export { Field, trimBlanks } from './domain/model/Field.js';
export type { ConvertedValue } from './domain/model/Field.js';
export { decodeOverpunch, isOverpunched } from './domain/model/Overpunch.js';
export type { OverpunchResult, Sign } from './domain/model/Overpunch.js';
export { Record } from './domain/model/Record.js';
export type {
  FieldAttribute,
  FieldSnapshot,
  RecordSnapshot,
  RecordObjectValue,
  ToObjectOptions,
} from './domain/model/Record.js';
export { Layout } from './domain/model/Layout.js';
export type {
  LayoutDefinition,
  RecordDefinition,
  FieldDefinition,
  FieldTypeDefinition,
} from './domain/model/LayoutDefinition.js';
export { ReaderState } from './domain/model/ReaderState.js';
export { RecordFileError, isRecordFileError } from './domain/model/RecordFileError.js';
export type { RecordFileErrorCode, ErrorCategory, RecordFileErrorOptions } from './domain/model/RecordFileError.js';

// Domain services
export { FieldFilter } from './domain/services/FieldFilter.js';
export type { FieldFilterOperator } from './domain/services/FieldFilter.js';
export { RecordFilter } from './domain/services/RecordFilter.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { LineClassifier } from './domain/ports/LineClassifier.js';
export { byPrefix } from './domain/ports/LineClassifier.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ReaderOpenedEvent,
  LineSkippedEvent,
  RecordDecodedEvent,
  RecordFilteredEvent,
  ReaderExhaustedEvent,
  ReaderFailedEvent,
  ReaderClosedEvent,
} from './domain/events/DomainEvents.js';

// Application internals (for extension packages)
export { EventBus } from './application/EventBus.js';
export { splitLines } from './application/LineSplitter.js';

// Infrastructure adapters
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { createLogger, logger, isLogLevel } from './infrastructure/logging/logger.js';
export type { Logger, LoggerOptions, LogLevel } from './infrastructure/logging/logger.js';
export { loadConfig, parseConfig, defaultConfig, readerOptionsFrom, CONFIG_ENV, DEFAULT_CONFIG_FILE } from './infrastructure/config/Config.js';
export type { FixedrecConfig } from './infrastructure/config/Config.js';
