export type PbsCacheErrorCode = 'ingestion_failed' | 'topology_mismatch' | 'publication_failed' | 'stale_data';

export class PbsCacheError extends Error {
  readonly code: PbsCacheErrorCode;

  constructor(code: PbsCacheErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PbsCacheError';
    this.code = code;
  }
}

/** A scheduler query failed or its output could not be repaired into JSON. */
export class IngestionError extends PbsCacheError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('ingestion_failed', `${source}: ${message}`, options);
    this.name = 'IngestionError';
    this.source = source;
  }
}

export type TopologySubject = 'node' | 'job';

/** A node or job references a queue that is not in the queue catalogue. */
export class TopologyError extends PbsCacheError {
  readonly subject: TopologySubject;
  readonly recordId: string;
  readonly queue: string;

  constructor(subject: TopologySubject, recordId: string, queue: string) {
    super('topology_mismatch', `${subject} ${recordId} references undeclared queue ${queue}`);
    this.name = 'TopologyError';
    this.subject = subject;
    this.recordId = recordId;
    this.queue = queue;
  }
}

export type DestinationFailure = {
  destination: string;
  message: string;
};

export class PublicationError extends PbsCacheError {
  readonly failures: DestinationFailure[];

  constructor(message: string, failures: DestinationFailure[]) {
    super('publication_failed', message);
    this.name = 'PublicationError';
    this.failures = failures;
  }
}

export class StaleDataError extends PbsCacheError {
  readonly ageSeconds: number | null;

  constructor(message: string, ageSeconds: number | null) {
    super('stale_data', message);
    this.name = 'StaleDataError';
    this.ageSeconds = ageSeconds;
  }
}
