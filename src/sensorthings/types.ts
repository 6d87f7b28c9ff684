/**
 * OGC SensorThings entity types
 */

export interface EntityRef {
    readonly '@iot.id': string;
}

export type ObservedPropertyKey = 'temperature' | 'humidity';

export interface UnitOfMeasurement {
    readonly symbol: string;
    readonly name: string;
    readonly definition: string;
}

export interface Thing {
    readonly '@iot.id': string;
    readonly name: string;
    readonly description: string;
    readonly properties: {
        readonly outdated: boolean | null;
        readonly measurementsPlausible: boolean | null;
    };
}

export interface Location {
    readonly '@iot.id': string;
    readonly name: string;
    readonly description: string;
    readonly encodingType: 'application/vnd.geo+json';
    readonly location: {
        readonly type: 'Point';
        /** [lon, lat] */
        readonly coordinates: readonly [number, number];
    };
    readonly Things: readonly EntityRef[];
}

export interface Datastream {
    readonly '@iot.id': string;
    readonly name: string;
    readonly description: string;
    readonly unitOfMeasurement: UnitOfMeasurement;
    readonly observationType: string;
    readonly Thing: EntityRef;
    readonly ObservedProperty: {
        readonly name: string;
        readonly definition: string;
    };
    readonly Sensor: {
        readonly name: string;
        readonly description: string;
    };
}

export interface Observation {
    readonly phenomenonTime: string;
    readonly resultTime: string;
    readonly result: number;
    readonly Datastream: EntityRef;
}

export interface EntityCollection<T> {
    readonly '@iot.count': number;
    readonly value: readonly T[];
}

export interface SensorThingsDocument {
    readonly Things: EntityCollection<Thing>;
    readonly Locations: EntityCollection<Location>;
    readonly Datastreams: EntityCollection<Datastream>;
    readonly Observations: EntityCollection<Observation>;
}

export interface TimeseriesDocument {
    readonly Datastreams: EntityCollection<Datastream>;
    readonly Observations: EntityCollection<Observation>;
}
