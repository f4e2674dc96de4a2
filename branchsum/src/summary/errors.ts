export type InvalidRecordDetails = {
  /** Position of the offending record in the input sequence. */
  index?: number;
  field?: string;
  /** File the record was read from. */
  source?: string;
};

/**
 * Raised on malformed input data. Aggregation never skips a bad record:
 * the first one found aborts the whole operation.
 */
export class InvalidRecordError extends Error {
  readonly code = "INVALID_RECORD";
  readonly index?: number;
  readonly field?: string;
  readonly source?: string;

  constructor(message: string, details: InvalidRecordDetails = {}) {
    super(message);
    this.name = "InvalidRecordError";
    this.index = details.index;
    this.field = details.field;
    this.source = details.source;
  }
}

export function isInvalidRecordError(err: unknown): err is InvalidRecordError {
  return err instanceof InvalidRecordError;
}
