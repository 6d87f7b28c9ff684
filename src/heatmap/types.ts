/**
 * Smart Urban Heat Map source types - readings after payload validation
 */

export interface Coordinates {
    lat: number;
    lon: number;
}

/**
 * One station row from the /latest FeatureCollection
 */
export interface StationReading {
    stationId: string;
    name: string;
    coordinates?: Coordinates;
    dateObserved: string;
    temperature: number;
    relativeHumidity: number;
    outdated?: boolean;
    measurementsPlausible?: boolean;
}

/**
 * One time-indexed reading from /timeseries. Either value may be absent upstream.
 */
export interface TimeseriesReading {
    dateObserved: string;
    temperature?: number;
    relativeHumidity?: number;
}

export interface TimeseriesQuery {
    stationId: string;
    timeFrom?: string;
    timeTo?: string;
}
