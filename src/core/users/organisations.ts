// src/core/users/organisations.ts

import { z } from 'zod';

export const OrganisationSchema = z
  .object({
    name: z.string().min(1),
    shortname: z.string().min(1).optional(),
    variations: z.array(z.string().min(1)).optional(),
    // Email domains that identify members when the company field is empty
    domains: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type Organisation = z.infer<typeof OrganisationSchema>;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsWord(text: string, word: string): boolean {
  return new RegExp(`\\b${escapeRegExp(word)}\\b`).test(text);
}

/**
 * Lower-case, `@` to space, collapsed whitespace, accents stripped
 */
export function normalizeOrgName(name: string): string {
  return name
    .toLowerCase()
    .replace(/@/g, ' ')
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

interface Candidate {
  name: string;
  keys: string[];
  variations: string[];
  domains: string[];
}

/**
 * Maps free-text company names onto canonical organisation names. Matching
 * stops at the first tier that finds anything: exact name or shortname,
 * exact variation, whole-word name or shortname, whole-word variation.
 * Names nothing matches come back normalized.
 */
export class OrganisationMapper {
  private candidates: Candidate[];

  constructor(organisations: readonly Organisation[]) {
    this.candidates = organisations.map((org) => ({
      name: org.name,
      keys: [org.name, org.shortname ?? ''].map(normalizeOrgName).filter(Boolean),
      variations: (org.variations ?? []).map(normalizeOrgName).filter(Boolean),
      domains: (org.domains ?? []).map((domain) => domain.toLowerCase()),
    }));
  }

  map(company: string): string[] {
    const normalized = normalizeOrgName(company);
    if (!normalized) return [];

    const tiers: Array<(candidate: Candidate) => boolean> = [
      (candidate) => candidate.keys.includes(normalized),
      (candidate) => candidate.variations.includes(normalized),
      (candidate) => candidate.keys.some((key) => containsWord(normalized, key)),
      (candidate) => candidate.variations.some((variation) => containsWord(normalized, variation)),
    ];

    for (const matches of tiers) {
      const mapped = this.candidates.filter(matches).map((candidate) => candidate.name);
      if (mapped.length > 0) return mapped;
    }
    return [normalized];
  }

  /**
   * Organisation owning an email domain (the domain or a parent of it)
   */
  byDomain(domain: string): string | undefined {
    const host = domain.toLowerCase();
    if (!host) return undefined;
    return this.candidates.find((candidate) =>
      candidate.domains.some((owned) => host === owned || host.endsWith(`.${owned}`))
    )?.name;
  }
}
