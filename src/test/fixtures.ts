/**
 * Shared upstream payloads and an in-process axios adapter for tests
 */

import axios, { AxiosInstance, InternalAxiosRequestConfig } from 'axios';

export function stationFeature(
    stationId: string,
    name: string,
    coordinates: [number, number],
    dateObserved: string,
    temperature: number,
    relativeHumidity: number
) {
    return {
        type: 'Feature',
        geometry: { type: 'Point', coordinates },
        properties: {
            stationId,
            name,
            dateObserved,
            temperature,
            relativeHumidity,
            outdated: false,
            measurementsPlausible: true,
        },
    };
}

export function latestCollection() {
    return {
        type: 'FeatureCollection',
        features: [
            stationFeature('11117', 'Bahnhofplatz', [7.4391, 46.9488], '2024-11-01T10:00:00Z', 21.3, 55),
            stationFeature('11118', 'Bundesplatz', [7.4441, 46.9469], '2024-11-01T10:00:00+01:00', 19.8, 61.5),
        ],
    };
}

export function timeseriesValues() {
    return {
        values: [
            { dateObserved: '2024-11-01T00:00:00Z', temperature: 8.1, relativeHumidity: 80 },
            { dateObserved: '2024-11-01T00:10:00Z', temperature: 7.9, relativeHumidity: 81 },
            { dateObserved: '2024-11-01T00:20:00Z', temperature: 7.6, relativeHumidity: 83 },
        ],
    };
}

export interface FakeReply {
    status?: number;
    data?: unknown;
    error?: Error;
}

/**
 * axios instance whose requests never leave the process; each request is recorded
 */
export function fakeHttp(reply: (request: InternalAxiosRequestConfig) => FakeReply): {
    http: AxiosInstance;
    requests: InternalAxiosRequestConfig[];
} {
    const requests: InternalAxiosRequestConfig[] = [];
    const http = axios.create({
        baseURL: 'http://sensors.test/api/v2',
        adapter: async (request: InternalAxiosRequestConfig) => {
            requests.push(request);
            const result = reply(request);
            if (result.error) {
                throw result.error;
            }
            return {
                data: result.data,
                status: result.status ?? 200,
                statusText: '',
                headers: {},
                config: request,
            };
        },
    });
    return { http, requests };
}
