/**
 * @format
 * Naming Utilities
 *
 * Report file naming derived from the searched instance name.
 */

import { join } from 'path';

import { DEFAULT_OUTPUT_DIR } from '../config/defaults';

/**
 * Make an instance name safe to use as a single path segment.
 * Path separators become underscores.
 */
export function sanitizeFileName(name: string): string {
    return name.replace(/[/\\]/g, '_');
}

/**
 * Default report path: output/{name}_details.json
 */
export function defaultOutputPath(name: string, outputDir: string = DEFAULT_OUTPUT_DIR): string {
    return join(outputDir, `${sanitizeFileName(name)}_details.json`);
}
