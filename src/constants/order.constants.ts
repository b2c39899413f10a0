
/**
 * Processing Status Constants
 * Statuses written by the QC and outbound subsystems (qc process, qc complete,
 * completed) are listed here so guards can refer to them; the order machine
 * itself never originates them.
 */
export const PROCESSING_STATUS = {
  READY_TO_PICK: 'ready to pick',
  PICKING_PROCESS: 'picking process',
  PENDING_PICKING: 'pending picking',
  PICKING_COMPLETE: 'picking complete',
  QC_PROCESS: 'qc process',
  QC_COMPLETE: 'qc complete',
  COMPLETED: 'completed',
} as const;

export type KnownProcessingStatus = typeof PROCESSING_STATUS[keyof typeof PROCESSING_STATUS];

// Stored as free text: other subsystems may write values outside the known set.
export type ProcessingStatus = KnownProcessingStatus | (string & {});

/**
 * Event Status Constants
 * Orthogonal to processing_status, audit annotation only.
 */
export const EVENT_STATUS = {
  CHANGED: 'changed',
  DUPLICATED: 'duplicated',
  CANCELLED: 'cancelled',
} as const;

export type EventStatus = typeof EVENT_STATUS[keyof typeof EVENT_STATUS];

/**
 * Statuses in which an order may not be assigned to a picker
 */
export const ASSIGN_BLOCKED_STATUSES: readonly string[] = [
  PROCESSING_STATUS.PICKING_PROCESS,
  PROCESSING_STATUS.QC_PROCESS,
  PROCESSING_STATUS.COMPLETED,
];

/**
 * Statuses in which header/detail edits, cancellation and duplication are refused
 */
export const MODIFY_BLOCKED_STATUSES: readonly string[] = [
  PROCESSING_STATUS.PICKING_PROCESS,
  PROCESSING_STATUS.QC_PROCESS,
];

/**
 * Statuses a picker can take an order from (self-service pick)
 */
export const PICKABLE_STATUSES: readonly string[] = [
  PROCESSING_STATUS.READY_TO_PICK,
  PROCESSING_STATUS.PENDING_PICKING,
];

/**
 * Identifier rewrite applied to the source order on duplication
 */
export const DUPLICATE_ID_SUFFIX = '-X2';
export const DUPLICATE_TRACKING_PREFIX = 'X-';
