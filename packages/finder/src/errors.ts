/**
 * Error taxonomy for the POI finder.
 *
 * Every failure is fatal: errors propagate untouched to the entry point,
 * which reports the message and exits. Nothing is retried or skipped.
 */

/** Base class for all finder failures */
export class PoiFinderError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed route input (no points, empty chunk, bad GPX) */
export class RouteInputError extends PoiFinderError {}

/** A rule or condition that cannot be compiled */
export class ConditionValidationError extends PoiFinderError {}

/** The Overpass API could not be reached or answered with an error */
export class OverpassRequestError extends PoiFinderError {
  constructor(
    message: string,
    readonly query: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/** A response body that is not a well-formed Overpass JSON document */
export class ResponseDecodeError extends PoiFinderError {}

/** A response whose ways and nodes do not agree with each other */
export class ResponseConsistencyError extends PoiFinderError {}

/** Tags that give no usable display name */
export class ClassificationError extends PoiFinderError {}

/** A configuration file that is missing or malformed */
export class ConfigError extends PoiFinderError {}
