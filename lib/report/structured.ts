/**
 * @format
 * Structured Report
 *
 * Assembles the JSON report written in default (non-human) mode.
 * Every Date in the instance tree is normalized to ISO-8601 so repeated
 * runs over the same data serialize byte-for-byte identically.
 */

import type { InstanceRecord } from '../lookup/types';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
    [key: string]: JsonValue;
}

export interface ReportResult {
    readonly search_query: string;
    readonly region: string;
    /** Launch time of the first matched instance */
    readonly timestamp?: string;
    readonly instance_count: number;
    readonly instances: readonly JsonObject[];
}

/**
 * Copy a plain object into JSON-safe form, keeping key order.
 * Undefined entries are dropped.
 */
export function toJsonObject(value: object): JsonObject {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
        const converted = toJsonValue(entry);
        if (converted !== undefined) {
            result[key] = converted;
        }
    }
    return result;
}

/**
 * Convert any SDK-shaped value into a JSON value.
 * Returns undefined for values JSON has no form for.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
    if (value === null) return null;
    if (value instanceof Date) return value.toISOString();

    switch (typeof value) {
        case 'string':
        case 'boolean':
            return value;
        case 'number':
            return Number.isFinite(value) ? value : null;
        case 'bigint':
            return value.toString();
        case 'object':
            if (Array.isArray(value)) {
                return value.map((item) => toJsonValue(item) ?? null);
            }
            return toJsonObject(value);
        default:
            return undefined;
    }
}

/**
 * Build the report for a set of enriched instances.
 */
export function toReportResult(
    name: string,
    region: string,
    instances: readonly InstanceRecord[],
): ReportResult {
    const launchTime = instances[0]?.LaunchTime;

    return {
        search_query: name,
        region,
        ...(launchTime ? { timestamp: launchTime.toISOString() } : {}),
        instance_count: instances.length,
        instances: instances.map((instance) => toJsonObject(instance)),
    };
}

/** Two-space indented JSON, newline-terminated */
export function serializeReport(result: ReportResult): string {
    return `${JSON.stringify(result, null, 2)}\n`;
}
