/**
 * SensorThings Converter
 * Fetches from the heat map API, validates the payload and maps it to SensorThings documents.
 */

import { logger } from '../logger.js';
import { InvalidParameterError } from '../errors.js';
import { HeatMapClient, HeatMapSource } from '../heatmap/client.js';
import { parseLatestCollection, parseTimeseries } from '../heatmap/payload.js';
import { parseIsoTimestamp } from '../heatmap/time.js';
import { TimeseriesQuery } from '../heatmap/types.js';
import { isObservedProperty, mapLatest, mapTimeseries, OBSERVED_PROPERTIES } from './mapper.js';
import { ObservedPropertyKey, SensorThingsDocument, TimeseriesDocument } from './types.js';

/**
 * Caller-facing timeseries parameters, as they arrive from a query string or the command line
 */
export interface TimeseriesRequest {
    stationId?: string;
    timeFrom?: string;
    timeTo?: string;
    observedProperty?: string;
}

export interface ValidatedTimeseriesRequest {
    query: TimeseriesQuery;
    property: ObservedPropertyKey;
}

/**
 * Operations the HTTP layer and the CLI depend on
 */
export interface SensorThingsService {
    convertLatest(): Promise<SensorThingsDocument>;
    convertTimeseries(request: TimeseriesRequest): Promise<TimeseriesDocument>;
}

function checkTime(value: string | undefined, parameter: string): Date | undefined {
    if (value === undefined || value === '') return undefined;
    const parsed = parseIsoTimestamp(value);
    if (!parsed) {
        throw new InvalidParameterError(parameter, `${parameter} must be an ISO 8601 timestamp, got "${value}"`);
    }
    return parsed;
}

/**
 * Check caller parameters before any upstream request is made
 */
export function validateTimeseriesRequest(request: TimeseriesRequest): ValidatedTimeseriesRequest {
    const stationId = request.stationId?.trim();
    if (!stationId) {
        throw new InvalidParameterError('stationId', 'stationId is required');
    }

    const from = checkTime(request.timeFrom, 'timeFrom');
    const to = checkTime(request.timeTo, 'timeTo');
    if (from && to && from.getTime() > to.getTime()) {
        throw new InvalidParameterError('timeFrom', 'timeFrom must not be after timeTo');
    }

    const property = request.observedProperty || 'temperature';
    if (!isObservedProperty(property)) {
        const allowed = Object.keys(OBSERVED_PROPERTIES).join(', ');
        throw new InvalidParameterError('observedProperty', `observedProperty must be one of ${allowed}, got "${property}"`);
    }

    return {
        query: {
            stationId,
            timeFrom: request.timeFrom || undefined,
            timeTo: request.timeTo || undefined,
        },
        property,
    };
}

export class SensorThingsConverter implements SensorThingsService {
    private source: HeatMapSource;

    constructor(source: HeatMapSource = new HeatMapClient()) {
        this.source = source;
    }

    async convertLatest(): Promise<SensorThingsDocument> {
        const raw = await this.source.fetchLatest();
        const stations = parseLatestCollection(raw);
        const document = mapLatest(stations);

        logger.info(`Converted latest readings of ${stations.length} stations`, {
            things: document.Things['@iot.count'],
            observations: document.Observations['@iot.count'],
        });
        return document;
    }

    async convertTimeseries(request: TimeseriesRequest): Promise<TimeseriesDocument> {
        const { query, property } = validateTimeseriesRequest(request);

        const raw = await this.source.fetchTimeseries(query);
        const readings = parseTimeseries(raw);
        const document = mapTimeseries(query.stationId, readings, property);

        logger.info(`Converted ${readings.length} ${property} readings for station ${query.stationId}`, {
            timeFrom: query.timeFrom,
            timeTo: query.timeTo,
        });
        return document;
    }
}
