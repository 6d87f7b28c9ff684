/**
 * Validation of raw upstream JSON into typed readings.
 * Any missing or ill-typed required field throws MalformedPayloadError; nothing is skipped.
 */

import { MalformedPayloadError } from '../errors.js';
import { parseIsoTimestamp } from './time.js';
import { Coordinates, StationReading, TimeseriesReading } from './types.js';

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, path: string): JsonObject {
    if (!isRecord(value)) {
        throw new MalformedPayloadError(path, 'expected an object');
    }
    return value;
}

function requireArray(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) {
        throw new MalformedPayloadError(path, 'expected an array');
    }
    return value;
}

function requireNumber(obj: JsonObject, key: string, path: string): number {
    const value = obj[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new MalformedPayloadError(`${path}.${key}`, value === undefined ? 'missing' : 'expected a finite number');
    }
    return value;
}

/**
 * Returns undefined for an absent or null value, throws for anything else that is not a number
 */
function optionalNumber(obj: JsonObject, key: string, path: string): number | undefined {
    const value = obj[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new MalformedPayloadError(`${path}.${key}`, 'expected a finite number');
    }
    return value;
}

function optionalBoolean(obj: JsonObject, key: string, path: string): boolean | undefined {
    const value = obj[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'boolean') {
        throw new MalformedPayloadError(`${path}.${key}`, 'expected a boolean');
    }
    return value;
}

function requireStationId(obj: JsonObject, path: string): string {
    const value = obj.stationId;
    if (typeof value === 'string' && value.trim().length > 0) {
        return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
        return String(value);
    }
    throw new MalformedPayloadError(`${path}.stationId`, value === undefined ? 'missing' : 'expected a non-empty string or number');
}

/**
 * Parse an ISO 8601 timestamp and normalize it to UTC (`2024-11-01T10:00:00.000Z`).
 * A timestamp without offset is taken as UTC.
 */
export function normalizeTimestamp(value: unknown, path: string): string {
    if (typeof value !== 'string' || value.trim().length === 0) {
        throw new MalformedPayloadError(path, value === undefined ? 'missing' : 'expected an ISO 8601 string');
    }
    const parsed = parseIsoTimestamp(value);
    if (!parsed) {
        throw new MalformedPayloadError(path, `"${value}" is not a valid ISO 8601 timestamp`);
    }
    return parsed.toISOString();
}

/**
 * GeoJSON Point geometry -> coordinates. GeoJSON orders positions as [lon, lat].
 */
function readPointGeometry(value: unknown, path: string): Coordinates {
    const geometry = requireRecord(value, path);
    if (geometry.type !== 'Point') {
        throw new MalformedPayloadError(`${path}.type`, `expected "Point", got ${JSON.stringify(geometry.type)}`);
    }
    const position = requireArray(geometry.coordinates, `${path}.coordinates`);
    const [lon, lat] = position;
    if (typeof lon !== 'number' || typeof lat !== 'number' || !Number.isFinite(lon) || !Number.isFinite(lat)) {
        throw new MalformedPayloadError(`${path}.coordinates`, 'expected [lon, lat] numbers');
    }
    return { lat, lon };
}

function readHumidity(obj: JsonObject, path: string): number | undefined {
    return optionalNumber(obj, 'relativeHumidity', path) ?? optionalNumber(obj, 'humidity', path);
}

/**
 * Normalize a flat station record such as
 * `{"stationId":"11117","dateObserved":"2024-11-01T10:00:00Z","temperature":21.3,"humidity":55}`.
 * Coordinates are read from a GeoJSON `geometry` when present.
 */
export function normalizeReading(raw: unknown, path: string): StationReading {
    const record = requireRecord(raw, path);

    const humidity = readHumidity(record, path);
    if (humidity === undefined) {
        throw new MalformedPayloadError(`${path}.relativeHumidity`, 'missing');
    }

    const dateObserved = normalizeTimestamp(record.dateObserved, `${path}.dateObserved`);

    let name = '';
    if (typeof record.name === 'string') {
        name = record.name;
    } else if (record.name !== undefined && record.name !== null) {
        throw new MalformedPayloadError(`${path}.name`, 'expected a string');
    }

    return {
        stationId: requireStationId(record, path),
        name,
        coordinates: record.geometry === undefined ? undefined : readPointGeometry(record.geometry, `${path}.geometry`),
        dateObserved,
        temperature: requireNumber(record, 'temperature', path),
        relativeHumidity: humidity,
        outdated: optionalBoolean(record, 'outdated', path),
        measurementsPlausible: optionalBoolean(record, 'measurementsPlausible', path),
    };
}

/**
 * Parse the /latest GeoJSON FeatureCollection. Every feature must carry a Point geometry.
 */
export function parseLatestCollection(raw: unknown): StationReading[] {
    const collection = requireRecord(raw, '$');
    if (collection.type !== undefined && collection.type !== 'FeatureCollection') {
        throw new MalformedPayloadError('$.type', `expected "FeatureCollection", got ${JSON.stringify(collection.type)}`);
    }
    const features = requireArray(collection.features, '$.features');

    return features.map((item, index) => {
        const path = `$.features[${index}]`;
        const feature = requireRecord(item, path);
        const properties = requireRecord(feature.properties, `${path}.properties`);
        const reading = normalizeReading(properties, `${path}.properties`);
        return {
            ...reading,
            coordinates: readPointGeometry(feature.geometry, `${path}.geometry`),
        };
    });
}

/**
 * Parse the /timeseries body: a bare array of readings or `{ values: [...] }`
 */
export function parseTimeseries(raw: unknown): TimeseriesReading[] {
    let values: unknown[];
    if (Array.isArray(raw)) {
        values = raw;
    } else if (isRecord(raw)) {
        values = raw.values === undefined ? [] : requireArray(raw.values, '$.values');
    } else {
        throw new MalformedPayloadError('$', 'expected an array or an object with "values"');
    }

    return values.map((item, index) => {
        const path = `$[${index}]`;
        const entry = requireRecord(item, path);
        return {
            dateObserved: normalizeTimestamp(entry.dateObserved, `${path}.dateObserved`),
            temperature: optionalNumber(entry, 'temperature', path),
            relativeHumidity: readHumidity(entry, path),
        };
    });
}
