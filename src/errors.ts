/**
 * Error types surfaced to callers of the converter.
 * Each carries the HTTP status the web layer answers with.
 */

export abstract class BridgeError extends Error {
    abstract readonly status: number;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Caller supplied a missing or malformed parameter (station id, time range, property)
 */
export class InvalidParameterError extends BridgeError {
    readonly status = 400;

    constructor(readonly parameter: string, message: string) {
        super(message);
    }
}

export class UnknownStationError extends BridgeError {
    readonly status = 404;

    constructor(readonly stationId: string) {
        super(`Unknown station: ${stationId}`);
    }
}

/**
 * Upstream payload is missing a required field or has it with the wrong type.
 * `path` points at the offending field, e.g. `features[3].geometry.coordinates`.
 */
export class MalformedPayloadError extends BridgeError {
    readonly status = 502;

    constructor(readonly path: string, reason: string) {
        super(`Malformed upstream payload at ${path}: ${reason}`);
    }
}

/**
 * Upstream request failed: network error, timeout or non-success status
 */
export class UpstreamError extends BridgeError {
    readonly status = 502;

    constructor(message: string, readonly upstreamStatus?: number) {
        super(message);
    }
}

export function isBridgeError(error: unknown): error is BridgeError {
    return error instanceof BridgeError;
}
