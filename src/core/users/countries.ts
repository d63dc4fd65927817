// src/core/users/countries.ts

import { z } from 'zod';

export const CountryTableSchema = z
  .object({
    // Lower-cased place name or abbreviation → country
    aliases: z.record(z.string().min(1), z.string().min(1)).default({}),
    domains: z
      .array(
        z
          .object({
            country: z.string().min(1),
            suffix: z.array(z.string().min(1)).min(1),
          })
          .strict()
      )
      .default([]),
  })
  .strict();

export type CountryTable = z.infer<typeof CountryTableSchema>;

export function blogDomain(blog: string): string {
  if (!blog) return '';
  try {
    const url = new URL(/^[a-z]+:\/\//i.test(blog) ? blog : `https://${blog}`);
    return url.hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return '';
  }
}

/**
 * Country from the location text alone: the whole string, then the part
 * after the last comma.
 */
export function countryFromText(location: string, table: CountryTable): string | undefined {
  const aliases = new Map(Object.entries(table.aliases).map(([alias, country]) => [alias.toLowerCase(), country]));
  const whole = location.trim().toLowerCase();
  if (!whole) return undefined;

  const direct = aliases.get(whole);
  if (direct) return direct;

  const parts = whole.split(',').map((part) => part.trim());
  if (parts.length > 1) {
    return aliases.get(parts[parts.length - 1] ?? '');
  }
  return undefined;
}

function domainCountries(domain: string, table: CountryTable): string[] {
  const host = domain.toLowerCase();
  if (!host) return [];
  const countries = table.domains
    .filter((entry) => entry.suffix.some((suffix) => host.endsWith(suffix.toLowerCase())))
    .map((entry) => entry.country);
  return [...new Set(countries)];
}

/**
 * Narrows candidate sets in priority order. A source with exactly one
 * candidate decides; several candidates are intersected with the next
 * non-empty source. Leftover ties come back comma-joined and sorted.
 */
export function resolveCandidates(sources: readonly string[][]): string | undefined {
  let current = new Set<string>();
  for (const source of sources) {
    const next = new Set(source);
    if (current.size === 0) current = next;
    if (current.size === 1) break;
    if (next.size === 0) continue;
    current = new Set([...current].filter((option) => next.has(option)));
  }
  return current.size > 0 ? [...current].sort().join(',') : undefined;
}

/**
 * Country implied by the email domain, then the blog domain
 */
export function countryFromDomains(emailDomain: string, blog: string, table: CountryTable): string | undefined {
  return resolveCandidates([domainCountries(emailDomain, table), domainCountries(blogDomain(blog), table)]);
}
