/**
 * Base interface for all pipeline events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the scan run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * States of a single scan run.
 * `DONE` and `FAILED` are terminal.
 */
export type PipelineState =
  | 'MIRRORING'
  | 'CHECKPOINT_READ'
  | 'HARVESTING'
  | 'NO_CHANGE'
  | 'PROMPTING'
  | 'DISPATCHING'
  | 'NOTIFYING'
  | 'CHECKPOINT_ADVANCE'
  | 'DONE'
  | 'FAILED';

/** Emitted when a scan run starts. */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    /** Repository remote as configured */
    url: string;
    branch: string;
    dryRun: boolean;
  };
}

/** Emitted on every state transition */
export interface StateChanged extends BaseEvent {
  type: 'StateChanged';
  payload: {
    from: PipelineState | null;
    to: PipelineState;
  };
}

/** Emitted once the local mirror is usable */
export interface MirrorReady extends BaseEvent {
  type: 'MirrorReady';
  payload: {
    fresh: boolean;
    path: string;
  };
}

/** Emitted when an existing mirror could not be updated and the stale copy is used */
export interface MirrorUpdateFailed extends BaseEvent {
  type: 'MirrorUpdateFailed';
  payload: {
    error: string;
  };
}

/** Emitted after the checkpoint has been read */
export interface CheckpointRead extends BaseEvent {
  type: 'CheckpointRead';
  payload: {
    since: string;
    fresh: boolean;
  };
}

/** Emitted once the commit range has been harvested */
export interface ChangesHarvested extends BaseEvent {
  type: 'ChangesHarvested';
  payload: {
    commitCount: number;
    fileCount: number;
    digestChars: number;
  };
}

/** Emitted when the analysis prompt has been composed */
export interface PromptBuilt extends BaseEvent {
  type: 'PromptBuilt';
  payload: {
    promptChars: number;
  };
}

/** Emitted when the analysis service returned a verdict */
export interface AnalysisCompleted extends BaseEvent {
  type: 'AnalysisCompleted';
  payload: {
    model: string;
    resultChars: number;
    durationMs: number;
  };
}

/** Emitted when the notification email was accepted by the SMTP server */
export interface NotificationSent extends BaseEvent {
  type: 'NotificationSent';
  payload: {
    recipient: string;
    subject: string;
    renderedFromMarkdown: boolean;
  };
}

/** Emitted when a new checkpoint row has been appended */
export interface CheckpointAdvanced extends BaseEvent {
  type: 'CheckpointAdvanced';
  payload: {
    checkpoint: string;
  };
}

/** Emitted when a run reaches DONE */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    outcome: 'notified' | 'no-changes' | 'dry-run';
    durationMs: number;
  };
}

/** Emitted when a run reaches FAILED */
export interface RunFailed extends BaseEvent {
  type: 'RunFailed';
  payload: {
    state: PipelineState;
    code: string;
    error: string;
  };
}

export type PipelineEvent =
  | RunStarted
  | StateChanged
  | MirrorReady
  | MirrorUpdateFailed
  | CheckpointRead
  | ChangesHarvested
  | PromptBuilt
  | AnalysisCompleted
  | NotificationSent
  | CheckpointAdvanced
  | RunFinished
  | RunFailed;

/** Distributes `Omit` over the event union so each member keeps its own payload. */
type OmitEnvelope<E> = E extends BaseEvent ? Omit<E, 'schemaVersion' | 'timestamp' | 'runId'> : never;

/**
 * An event without the envelope fields that the emitter fills in.
 */
export type PipelineEventInput = OmitEnvelope<PipelineEvent>;
