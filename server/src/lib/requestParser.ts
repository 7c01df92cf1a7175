/**
 * requestParser.ts — Validates POST /api/analyze bodies
 *
 * Builds a fresh object with a fixed key order, so the result doubles as the
 * normalised form used for the cache key.
 */

import type { AnalysisStyle, OutlineEntry, PageMappingEntry } from '../../../src/index.js';
import type { AnalyzeRequest } from '../types.js';
import { HttpError } from './httpError.js';

const STYLES: readonly AnalysisStyle[] = ['prose', 'screenplay', 'poetry'];

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
}

function isStyle(value: unknown): value is AnalysisStyle {
    return STYLES.some(s => s === value);
}

function invalid(message: string): HttpError {
    return new HttpError(400, message);
}

function optionalArray<T>(
    body: JsonObject,
    field: string,
    parseItem: (item: unknown, index: number) => T,
): T[] | undefined {
    const value = body[field];
    if (value === undefined) return undefined;
    if (!Array.isArray(value)) throw invalid(`${field} must be an array`);
    return value.map((item, index) => parseItem(item, index));
}

// ─── Field Parsers ───────────────────────────────────────────

function parseOutlineEntry(item: unknown, index: number): OutlineEntry {
    if (
        !isObject(item) ||
        typeof item.title !== 'string' ||
        !isFiniteNumber(item.level) ||
        !isFiniteNumber(item.rangeStart) ||
        !isFiniteNumber(item.rangeEnd) ||
        item.rangeStart < 0 ||
        item.rangeEnd < item.rangeStart
    ) {
        throw invalid(`outline[${index}] must have a title, a level and a valid range`);
    }
    return { title: item.title, level: item.level, rangeStart: item.rangeStart, rangeEnd: item.rangeEnd };
}

function parsePageMappingEntry(item: unknown, index: number): PageMappingEntry {
    if (!isObject(item) || !isFiniteNumber(item.location) || !isFiniteNumber(item.page) || item.location < 0) {
        throw invalid(`pageMapping[${index}] must have a location and a page`);
    }
    return { location: item.location, page: item.page };
}

function parseCharacter(item: unknown, index: number): { name: string; aliases?: string[] } {
    if (!isObject(item) || typeof item.name !== 'string' || item.name.trim().length === 0) {
        throw invalid(`characters[${index}] must have a name`);
    }
    const { aliases } = item;
    if (aliases === undefined) return { name: item.name };
    const names = Array.isArray(aliases) ? aliases.filter((a): a is string => typeof a === 'string') : [];
    if (!Array.isArray(aliases) || names.length !== aliases.length) {
        throw invalid(`characters[${index}].aliases must be an array of strings`);
    }
    return { name: item.name, aliases: names };
}

function parseName(item: unknown, index: number): string {
    if (typeof item !== 'string') throw invalid(`characterNames[${index}] must be a string`);
    return item;
}

// ─── Request ─────────────────────────────────────────────────

export function parseAnalyzeRequest(body: unknown): AnalyzeRequest {
    if (!isObject(body)) throw invalid('Request body must be a JSON object');

    const { text, style = 'prose', pageCountOverride } = body;
    if (typeof text !== 'string' || text.trim().length === 0) {
        throw invalid('text must be a non-empty string');
    }
    if (!isStyle(style)) {
        throw invalid(`style must be one of ${STYLES.join(', ')}`);
    }
    if (pageCountOverride !== undefined && (!isFiniteNumber(pageCountOverride) || pageCountOverride <= 0)) {
        throw invalid('pageCountOverride must be a positive number');
    }

    const request: AnalyzeRequest = { text, style };
    const outline = optionalArray(body, 'outline', parseOutlineEntry);
    const pageMapping = optionalArray(body, 'pageMapping', parsePageMappingEntry);
    const characters = optionalArray(body, 'characters', parseCharacter);
    const characterNames = optionalArray(body, 'characterNames', parseName);

    if (outline) request.outline = outline;
    if (pageMapping) request.pageMapping = pageMapping;
    if (isFiniteNumber(pageCountOverride)) request.pageCountOverride = pageCountOverride;
    if (characters) request.characters = characters;
    if (characterNames) request.characterNames = characterNames;
    return request;
}
