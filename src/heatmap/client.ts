/**
 * Smart Urban Heat Map API Client
 * Free, no API key required - temperature and humidity from a low-cost sensor network
 * https://smart-urban-heat-map.ch/api/v2
 *
 * One GET per call. No retry, no caching.
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { UnknownStationError, UpstreamError } from '../errors.js';
import { TimeseriesQuery } from './types.js';

export interface HeatMapClientOptions {
    baseUrl?: string;
    timeoutMs?: number;
    /** Preconfigured axios instance; baseUrl and timeoutMs are ignored when given */
    http?: AxiosInstance;
}

/**
 * Source of raw upstream payloads, validated later by the payload parsers
 */
export interface HeatMapSource {
    fetchLatest(): Promise<unknown>;
    fetchTimeseries(query: TimeseriesQuery): Promise<unknown>;
}

export class HeatMapClient implements HeatMapSource {
    private client: AxiosInstance;

    constructor(options: HeatMapClientOptions = {}) {
        this.client = options.http ?? axios.create({
            baseURL: options.baseUrl ?? config.sensorApiBaseUrl,
            headers: {
                'Accept': 'application/json, application/geo+json',
            },
            timeout: options.timeoutMs ?? config.httpTimeoutMs,
        });
    }

    /**
     * Fetch the most recent reading of every station as a GeoJSON FeatureCollection
     */
    async fetchLatest(): Promise<unknown> {
        const response = await this.get('/latest', {});
        this.ensureSuccess(response, '/latest');
        return response.data;
    }

    /**
     * Fetch readings for one station. timeFrom/timeTo are forwarded only when given.
     * 204 or an empty body yields an empty list.
     */
    async fetchTimeseries(query: TimeseriesQuery): Promise<unknown> {
        const params: Record<string, string> = { stationId: query.stationId };
        if (query.timeFrom) params.timeFrom = query.timeFrom;
        if (query.timeTo) params.timeTo = query.timeTo;

        const response = await this.get('/timeseries', params);

        if (response.status === 404) {
            throw new UnknownStationError(query.stationId);
        }
        this.ensureSuccess(response, '/timeseries');

        if (response.status === 204 || this.isEmptyBody(response.data)) {
            logger.info(`No timeseries data for station ${query.stationId}`);
            return [];
        }
        return response.data;
    }

    private async get(url: string, params: Record<string, string>): Promise<AxiosResponse<unknown>> {
        const startTime = Date.now();
        try {
            // every status resolves; mapping to errors happens in ensureSuccess
            const response = await this.client.get<unknown>(url, {
                params,
                validateStatus: () => true,
            });
            logger.debug(`GET ${url} -> ${response.status}`, { params, latencyMs: Date.now() - startTime });
            return response;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error('Sensor API request failed', { url, params, error: message });
            throw new UpstreamError(`Request to ${url} failed: ${message}`);
        }
    }

    private ensureSuccess(response: AxiosResponse<unknown>, url: string): void {
        if (response.status < 200 || response.status >= 300) {
            logger.warn(`Sensor API returned ${response.status} for ${url}`);
            throw new UpstreamError(`Request to ${url} failed with status code ${response.status}`, response.status);
        }
    }

    private isEmptyBody(data: unknown): boolean {
        return data === undefined || data === null || (typeof data === 'string' && data.trim().length === 0);
    }
}
