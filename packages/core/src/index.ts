// Main entry point
export { TransferOrchestrator } from './TransferOrchestrator.js';
export type { TransferResult } from './TransferOrchestrator.js';
export { resolveTransferConfig, MAX_COLUMNS } from './TransferConfig.js';
export type { TransferConfig, ResolvedTransferConfig } from './TransferConfig.js';

// Domain model
export { AlignmentClass } from './domain/model/Column.js';
export type { ColumnDescriptor } from './domain/model/Column.js';
export { DisplayMode, isDisplayMode } from './domain/model/DisplayMode.js';
export type { FieldMetrics, AuxCounts } from './domain/model/FieldMetrics.js';
export { EncodedRow } from './domain/model/Row.js';
export { RowBucketStore, ROW_BUCKET_CAPACITY } from './domain/model/RowBucketStore.js';
export type { RowHandle, AppendResult, RowBucket, RowBucketView } from './domain/model/RowBucketStore.js';
export { PrintDataDescriptor } from './domain/model/PrintDataDescriptor.js';
export type { ColumnLayout } from './domain/model/PrintDataDescriptor.js';
export { TransferState, canTransition } from './domain/model/TransferState.js';
export type { TransferError, TransferErrorCode } from './domain/model/TransferError.js';
export {
  OutOfMemoryError,
  COLUMN_LIMIT_MESSAGE,
  INTEGRATION_UNAVAILABLE_MESSAGE,
  OUT_OF_MEMORY_MESSAGE,
} from './domain/model/TransferError.js';

// Domain services
export { classifyColumn } from './domain/services/ColumnClassifier.js';
export { codePointWidth, measureDisplay } from './domain/services/DisplayWidth.js';
export type { DisplayMeasurement } from './domain/services/DisplayWidth.js';
export {
  measureField,
  measureRaw,
  measureDisplayField,
  createFieldMeasurer,
} from './domain/services/FieldMetricsCalculator.js';
export type { FieldMeasurer } from './domain/services/FieldMetricsCalculator.js';
export { encodeRow } from './domain/services/RowEncoder.js';

// Application internals
export { EventBus } from './application/EventBus.js';

// Ports (for custom implementations)
export type { QuerySource, QueryResult, TabularResult, CommandResult } from './domain/ports/QuerySource.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  TransferStartedEvent,
  TransferStateChangedEvent,
  HeaderStoredEvent,
  TransferProgressEvent,
  TransferCompletedEvent,
  TransferFailedEvent,
  CleanupFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { InMemoryQuerySource } from './infrastructure/sources/InMemoryQuerySource.js';
export type { InMemoryQuerySourceOptions } from './infrastructure/sources/InMemoryQuerySource.js';
