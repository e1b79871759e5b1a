/**
 * Team name normalization across feeds
 */

import { z } from 'zod';
import aliasData from '../data/team-aliases.json';

const aliasSchema = z.record(z.string(), z.array(z.string()));

/** Lowercase, drop dots, turn dashes into spaces and collapse whitespace */
export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/\./g, '').replace(/-/g, ' ').split(/\s+/).filter(Boolean).join(' ');
}

function buildAliasIndex(): Map<string, string> {
  const index = new Map<string, string>();
  for (const [code, aliases] of Object.entries(aliasSchema.parse(aliasData))) {
    index.set(code.toLowerCase(), code);
    for (const alias of aliases) {
      index.set(normalizeName(alias), code);
    }
  }
  return index;
}

const ALIAS_INDEX = buildAliasIndex();

/**
 * Canonical team code, or the upper-cased normalized name when unknown
 */
export function teamKey(name: string): string {
  const normalized = normalizeName(name);
  return ALIAS_INDEX.get(normalized) ?? normalized.toUpperCase();
}

/** Canonical codes for a user-supplied team filter; empty input means no filter */
export function teamFilterSet(names: readonly string[] | undefined): Set<string> | null {
  if (!names || names.length === 0) return null;
  return new Set(names.map(teamKey));
}
