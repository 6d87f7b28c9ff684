#!/usr/bin/env node
/**
 * SensorThings Bridge
 * Entry point
 *
 *   latest     [--out file]
 *   timeseries --stationId id [--timeFrom iso] [--timeTo iso] [--observedProperty temperature|humidity] [--out file]
 *   serve      [--port n]
 */

import { parseArgs } from 'util';
import { config, validateConfig } from './config.js';
import { logger } from './logger.js';
import { SensorThingsConverter, SensorThingsService } from './sensorthings/converter.js';
import { LATEST_OUTPUT_FILE, resolveOutputPath, timeseriesOutputFile, writeJsonFile } from './output/json-file.js';
import { startServer } from './web/server.js';

export const USAGE = `Usage:
  sensorthings-bridge latest [--out file]
  sensorthings-bridge timeseries --stationId <id> [--timeFrom <ISO8601>] [--timeTo <ISO8601>] [--observedProperty <temperature|humidity>] [--out file]
  sensorthings-bridge serve [--port <n>]`;

export interface CliOptions {
    service?: SensorThingsService;
    outputDir?: string;
}

function parsePort(value: string | undefined): number {
    if (value === undefined) return config.port;
    const port = Number(value);
    validateConfig({ ...config, port });
    return port;
}

/**
 * Run one command. Resolves to the process exit code; failures are logged, never thrown.
 */
export async function run(argv: string[], options: CliOptions = {}): Promise<number> {
    try {
        const { positionals, values } = parseArgs({
            args: argv,
            allowPositionals: true,
            options: {
                out: { type: 'string' },
                stationId: { type: 'string' },
                timeFrom: { type: 'string' },
                timeTo: { type: 'string' },
                observedProperty: { type: 'string' },
                port: { type: 'string' },
                help: { type: 'boolean', short: 'h' },
            },
        });

        const command = positionals[0];
        if (values.help || !command) {
            console.log(USAGE);
            return 0;
        }

        validateConfig();
        const service = options.service ?? new SensorThingsConverter();
        const outputDir = options.outputDir ?? config.outputDir;

        switch (command) {
            case 'latest': {
                const document = await service.convertLatest();
                await writeJsonFile(resolveOutputPath(values.out ?? LATEST_OUTPUT_FILE, outputDir), document);
                return 0;
            }
            case 'timeseries': {
                const document = await service.convertTimeseries({
                    stationId: values.stationId,
                    timeFrom: values.timeFrom,
                    timeTo: values.timeTo,
                    observedProperty: values.observedProperty,
                });
                const filename = values.out ?? timeseriesOutputFile(values.stationId ?? '');
                await writeJsonFile(resolveOutputPath(filename, outputDir), document);
                return 0;
            }
            case 'serve':
                startServer(service, parsePort(values.port));
                return 0;
            default:
                throw new Error(`Unknown command "${command}"\n${USAGE}`);
        }
    } catch (error) {
        logger.error('Fatal error', {
            error: error instanceof Error ? error.message : String(error),
        });
        return 1;
    }
}

if (require.main === module) {
    process.on('unhandledRejection', (reason: unknown) => {
        logger.error('Unhandled Promise Rejection', {
            reason: reason instanceof Error ? reason.message : String(reason),
            stack: reason instanceof Error ? reason.stack : undefined,
        });
    });

    run(process.argv.slice(2)).then(code => {
        process.exitCode = code;
    });
}
