export interface EventMetadata {
  eventId: string;
  aggregateId: string;
  version: number;
  ts: string;
  schemaVersion: number;
  commandId: string | null;
}

export interface DomainEvent<
  TType extends string = string,
  TPayload extends Record<string, unknown> = Record<string, unknown>
> {
  type: TType;
  payload: TPayload;
  metadata: EventMetadata;
}

export interface StoredEvent extends DomainEvent {
  offset: number;
}

/** An event before the log has assigned its id, version, timestamp and offset. */
export interface EventDraft<
  TType extends string = string,
  TPayload extends Record<string, unknown> = Record<string, unknown>
> {
  type: TType;
  payload: TPayload;
  schemaVersion?: number;
}

export const CURRENT_SCHEMA_VERSION = 1;
