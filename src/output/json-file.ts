import { promises as fs } from 'fs';
import path from 'path';
import { config } from '../config.js';
import { logger } from '../logger.js';

export const LATEST_OUTPUT_FILE = 'sensor_things_output.json';

export function timeseriesOutputFile(stationId: string): string {
    return `timeseries_${stationId.replace(/[^A-Za-z0-9_-]/g, '_')}.json`;
}

/**
 * Resolve a bare filename against OUTPUT_DIR; explicit paths are kept
 */
export function resolveOutputPath(filename: string, outputDir: string = config.outputDir): string {
    if (path.isAbsolute(filename) || filename.includes(path.sep) || filename.includes('/')) {
        return path.resolve(filename);
    }
    return path.resolve(outputDir, filename);
}

/**
 * Write a document as UTF-8 JSON with 4-space indentation. Non-ASCII (°C) is written as-is.
 */
export async function writeJsonFile(filePath: string, document: unknown): Promise<string> {
    const target = path.resolve(filePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, JSON.stringify(document, null, 4) + '\n', 'utf-8');
    logger.info(`Data saved to ${target}`);
    return target;
}

export async function readJsonFile(filePath: string): Promise<unknown> {
    const content = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(content);
}
