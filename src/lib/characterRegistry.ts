/**
 * characterRegistry.ts — Canonical character names and alias lookup
 *
 * The engine only analyses names it can vouch for: registry keys, caller
 * candidates when no registry exists, or (opt-in) capitalised words that recur.
 */

import type { CharacterRegistry, CharacterSnapshot } from '../types/analysis';
import { ANALYSIS_CONFIG } from './config';
import { NAME_EXCLUSIONS } from './lexicons';

function uniqueTrimmed(values: Iterable<string>): string[] {
    const out: string[] = [];
    const seen = new Set<string>();
    for (const value of values) {
        const trimmed = value.trim();
        if (trimmed.length === 0 || seen.has(trimmed)) continue;
        seen.add(trimmed);
        out.push(trimmed);
    }
    return out;
}

/** Build a registry from a plain snapshot; later duplicates merge their aliases into the first. */
export function createCharacterRegistry(snapshot: CharacterSnapshot): CharacterRegistry {
    const aliases = new Map<string, string[]>();

    for (const character of snapshot.characters) {
        const key = character.name.trim();
        if (key.length === 0) continue;
        const existing = aliases.get(key) ?? [];
        aliases.set(key, uniqueTrimmed([...existing, ...(character.aliases ?? [])]).filter(a => a !== key));
    }

    return {
        canonicalKeys: () => [...aliases.keys()],
        aliasesFor: (key: string) => [...(aliases.get(key) ?? [])],
    };
}

/** The key itself plus its registry aliases, deduplicated */
export function aliasesForName(name: string, registry?: CharacterRegistry): string[] {
    return uniqueTrimmed([name, ...(registry?.aliasesFor(name) ?? [])]);
}

// ─── Free-text Names ────────────────────────────────────────────────────────

const EDGE_PUNCTUATION = /^\p{P}+|\p{P}+$/gu;

/**
 * Capitalised whitespace tokens that recur at least three times, most frequent
 * first. Only used when the caller explicitly opts out of a registry.
 */
export function extractCandidateNames(text: string): string[] {
    const { extractedNameMinCount, extractedNameLimit } = ANALYSIS_CONFIG.characters;
    const counts = new Map<string, number>();

    for (const token of text.split(/\s+/)) {
        const word = token.replace(EDGE_PUNCTUATION, '');
        if (word.length < 2 || !/^\p{Lu}/u.test(word) || NAME_EXCLUSIONS.has(word)) continue;
        counts.set(word, (counts.get(word) ?? 0) + 1);
    }

    return [...counts.entries()]
        .filter(([, count]) => count >= extractedNameMinCount)
        .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
        .slice(0, extractedNameLimit)
        .map(([name]) => name);
}

// ─── Resolution ─────────────────────────────────────────────────────────────

export interface ResolveCharactersOptions {
    registry?: CharacterRegistry;
    candidates?: readonly string[];
    extractNamesWithoutRegistry?: boolean;
}

/**
 * Names the character analytics will run for.
 * With a populated registry, candidates are matched case-insensitively against
 * keys and aliases and mapped to their canonical key; unmatched ones are dropped.
 */
export function resolveAnalysisCharacters(text: string, options: ResolveCharactersOptions): string[] {
    const { registry, candidates, extractNamesWithoutRegistry = false } = options;
    const keys = registry ? uniqueTrimmed(registry.canonicalKeys()) : [];

    if (keys.length > 0 && registry) {
        if (!candidates || candidates.length === 0) return keys;

        const lookup = new Map<string, string>();
        for (const key of keys) {
            for (const alias of aliasesForName(key, registry)) {
                const normalized = alias.toLowerCase();
                if (!lookup.has(normalized)) lookup.set(normalized, key);
            }
        }
        const resolved: string[] = [];
        for (const candidate of candidates) {
            const key = lookup.get(candidate.trim().toLowerCase());
            if (key !== undefined && !resolved.includes(key)) resolved.push(key);
        }
        return resolved;
    }

    if (candidates && candidates.length > 0) return uniqueTrimmed(candidates);
    return extractNamesWithoutRegistry ? extractCandidateNames(text) : [];
}
