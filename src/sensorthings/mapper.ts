/**
 * Station readings -> SensorThings entities
 *
 * Field renames only: values and units pass through unchanged.
 * Every returned document is deep-frozen.
 */

import { MalformedPayloadError } from '../errors.js';
import { StationReading, TimeseriesReading } from '../heatmap/types.js';
import {
    Datastream,
    EntityCollection,
    Location,
    Observation,
    ObservedPropertyKey,
    SensorThingsDocument,
    Thing,
    TimeseriesDocument,
    UnitOfMeasurement,
} from './types.js';

const OM_MEASUREMENT = 'http://www.opengis.net/def/observationType/OGC-OM/2.0/OM_Measurement';

interface ObservedPropertyDefinition {
    label: string;
    description: string;
    unit: UnitOfMeasurement;
    definition: string;
    sensor: { name: string; description: string };
}

export const OBSERVED_PROPERTIES: Record<ObservedPropertyKey, ObservedPropertyDefinition> = {
    temperature: {
        label: 'Temperature',
        description: 'Temperature measurements',
        unit: { symbol: '°C', name: 'Degree Celsius', definition: 'http://unitsofmeasure.org/ucum.html#para-30' },
        definition: 'http://sensorthings.org/Temperature',
        sensor: { name: 'Temperature Sensor', description: 'Measures air temperature' },
    },
    humidity: {
        label: 'Humidity',
        description: 'Humidity measurements',
        unit: { symbol: '%', name: 'Percentage', definition: 'http://unitsofmeasure.org/ucum.html#para-30' },
        definition: 'http://sensorthings.org/Humidity',
        sensor: { name: 'Humidity Sensor', description: 'Measures relative humidity' },
    },
};

const PROPERTY_ORDER: readonly ObservedPropertyKey[] = ['temperature', 'humidity'];

export function isObservedProperty(value: string): value is ObservedPropertyKey {
    return Object.prototype.hasOwnProperty.call(OBSERVED_PROPERTIES, value);
}

export function datastreamId(stationId: string, property: ObservedPropertyKey): string {
    return `${stationId}-${property}`;
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

function collection<T>(value: T[]): EntityCollection<T> {
    return { '@iot.count': value.length, value };
}

export function buildThing(station: StationReading): Thing {
    return {
        '@iot.id': station.stationId,
        name: station.name,
        description: 'Sensor station measuring temperature and humidity',
        properties: {
            outdated: station.outdated ?? null,
            measurementsPlausible: station.measurementsPlausible ?? null,
        },
    };
}

/**
 * @throws MalformedPayloadError when the station has no coordinates
 */
export function buildLocation(station: StationReading, path = '$'): Location {
    if (!station.coordinates) {
        throw new MalformedPayloadError(`${path}.coordinates`, `station ${station.stationId} has no coordinates`);
    }
    return {
        '@iot.id': station.stationId,
        name: station.name,
        description: 'Geographic location of the sensor',
        encodingType: 'application/vnd.geo+json',
        location: {
            type: 'Point',
            coordinates: [station.coordinates.lon, station.coordinates.lat],
        },
        Things: [{ '@iot.id': station.stationId }],
    };
}

export function buildDatastream(stationId: string, stationName: string, property: ObservedPropertyKey): Datastream {
    const def = OBSERVED_PROPERTIES[property];
    return {
        '@iot.id': datastreamId(stationId, property),
        name: `${def.label} Datastream for ${stationName || `station ${stationId}`}`,
        description: def.description,
        unitOfMeasurement: { ...def.unit },
        observationType: OM_MEASUREMENT,
        Thing: { '@iot.id': stationId },
        ObservedProperty: { name: def.label, definition: def.definition },
        Sensor: { ...def.sensor },
    };
}

export function buildObservation(datastream: string, time: string, result: number): Observation {
    return {
        phenomenonTime: time,
        resultTime: time,
        result,
        Datastream: { '@iot.id': datastream },
    };
}

function stationValue(station: StationReading, property: ObservedPropertyKey): number {
    return property === 'temperature' ? station.temperature : station.relativeHumidity;
}

/**
 * Datastreams of one station with their latest Observation, temperature first
 */
export function mapStationStreams(station: StationReading): Array<{ datastream: Datastream; observation: Observation }> {
    return PROPERTY_ORDER.map(property => {
        const datastream = buildDatastream(station.stationId, station.name, property);
        return {
            datastream,
            observation: buildObservation(datastream['@iot.id'], station.dateObserved, stationValue(station, property)),
        };
    });
}

/**
 * One Thing, one Location, one Datastream and one Observation per observed property for each station
 */
export function mapLatest(stations: readonly StationReading[]): SensorThingsDocument {
    const things: Thing[] = [];
    const locations: Location[] = [];
    const datastreams: Datastream[] = [];
    const observations: Observation[] = [];

    stations.forEach((station, index) => {
        things.push(buildThing(station));
        locations.push(buildLocation(station, `$[${index}]`));

        for (const { datastream, observation } of mapStationStreams(station)) {
            datastreams.push(datastream);
            observations.push(observation);
        }
    });

    return deepFreeze({
        Things: collection(things),
        Locations: collection(locations),
        Datastreams: collection(datastreams),
        Observations: collection(observations),
    });
}

/**
 * One Observation per reading, in input order, all under the station's Datastream for `property`
 *
 * @throws MalformedPayloadError when a reading lacks a value for `property`
 */
export function mapTimeseries(
    stationId: string,
    readings: readonly TimeseriesReading[],
    property: ObservedPropertyKey
): TimeseriesDocument {
    const stream = buildDatastream(stationId, '', property);
    const sourceField = property === 'temperature' ? 'temperature' : 'relativeHumidity';

    const observations = readings.map((reading, index) => {
        const value = reading[sourceField];
        if (value === undefined) {
            throw new MalformedPayloadError(`$[${index}].${sourceField}`, 'missing');
        }
        return buildObservation(stream['@iot.id'], reading.dateObserved, value);
    });

    return deepFreeze({
        Datastreams: collection([stream]),
        Observations: collection(observations),
    });
}
