/**
 * @file error.ts
 * @description Error classes shared by every module.
 *
 * Failed lookups and address collisions are ordinary outcomes and are reported
 * as `false`; only defects in producer data or configuration are thrown.
 */

/** Base class for everything the library throws. */
export class LowlevelError extends Error {
  explain: string;
  constructor(message: string) {
    super(message);
    this.name = 'LowlevelError';
    this.explain = message;
  }
}

/**
 * Producer data violates a structural invariant (malformed ingestion row,
 * argument count that disagrees with the argument list, ...).  The run must
 * stop instead of producing a wrong correspondence.
 */
export class InconsistentInputError extends LowlevelError {
  /** Which producer input was being read when the violation was found. */
  source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = 'InconsistentInputError';
    this.source = source;
  }
}

/** The process environment holds a value the configuration schema rejects. */
export class ConfigError extends LowlevelError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
