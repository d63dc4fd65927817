// src/services/UserClassifier.ts

import { promises as fs } from 'fs';
import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import type { TableStore } from '../core/tables/TableStore';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import { UNCLASSIFIED, type UserDetailRecord } from '../core/users/types';
import { TABLES, USER_DETAIL_COLUMNS } from '../core/tables/codecs';
import { readUserDetails } from '../core/users/ledger';
import { userDetailToRow } from '../core/users/records';
import { ConfigError } from '../utils/errors';
import { blogDomain, CountryTableSchema, type CountryTable } from '../core/users/countries';
import { OrganisationMapper, OrganisationSchema, type Organisation } from '../core/users/organisations';
import type { GeocodingClient } from '../clients/geocoding/GeocodingClient';
import { CountryResolver } from './CountryResolver';

export const RULE_FIELDS = [
  'name',
  'company',
  'blog',
  'blog_domain',
  'location',
  'email_domain',
  'bio',
  'readme',
  'orgs',
  'twitter_username',
  'organisation',
] as const;

export type RuleField = (typeof RULE_FIELDS)[number];

const BaseRuleSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  fields: z.array(z.enum(RULE_FIELDS)).min(1),
});

const RuleSchema = z.union([
  BaseRuleSchema.extend({ pattern: z.string().min(1) }).strict(),
  BaseRuleSchema.extend({ suffix: z.array(z.string().min(1)).min(1) }).strict(),
  BaseRuleSchema.extend({ keywords: z.array(z.string().min(1)).min(1) }).strict(),
  BaseRuleSchema.extend({ present: z.literal(true) }).strict(),
]);

export const RuleFileSchema = z
  .object({
    rules: z.array(RuleSchema),
    organisations: z.array(OrganisationSchema).default([]),
    countries: CountryTableSchema.default({}),
  })
  .superRefine((file, ctx) => {
    const ids = new Set<string>();
    file.rules.forEach((rule, index) => {
      if (ids.has(rule.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['rules', index, 'id'], message: `Duplicate rule id ${rule.id}` });
      }
      ids.add(rule.id);

      if ('pattern' in rule) {
        try {
          new RegExp(rule.pattern, 'i');
        } catch (error: unknown) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['rules', index, 'pattern'],
            message: error instanceof Error ? error.message : 'Invalid pattern',
          });
        }
      }
    });
  });

export type ClassificationRule = z.infer<typeof RuleSchema>;

export interface Classification {
  category: string;
  ruleId: string;
}

export interface ClassificationSummary {
  users: number;
  unclassified: number;
  byCategory: Record<string, number>;
  withCountry: number;
  withOrganisation: number;
}

export interface ClassifierContext {
  organisations?: readonly Organisation[];
  countries?: CountryTable;
}

export interface ClassifyTableOptions {
  signal?: AbortSignal;
  // Without one, locations are only matched against the alias table
  geocoder?: GeocodingClient;
}

interface CompiledRule {
  id: string;
  category: string;
  fields: readonly RuleField[];
  test: (value: string) => boolean;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compile(rule: ClassificationRule): CompiledRule {
  const { id, category, fields } = rule;

  if ('pattern' in rule) {
    const regex = new RegExp(rule.pattern, 'i');
    return { id, category, fields, test: (value) => regex.test(value) };
  }
  if ('suffix' in rule) {
    const suffixes = rule.suffix.map((suffix) => suffix.toLowerCase());
    return { id, category, fields, test: (value) => suffixes.some((suffix) => value.toLowerCase().endsWith(suffix)) };
  }
  if ('keywords' in rule) {
    const regex = new RegExp(`\\b(?:${rule.keywords.map(escapeRegExp).join('|')})\\b`, 'i');
    return { id, category, fields, test: (value) => regex.test(value) };
  }
  return { id, category, fields, test: (value) => value.trim() !== '' };
}

function fieldValue(record: UserDetailRecord, field: RuleField): string {
  if (field === 'blog_domain') return blogDomain(record.profile.blog);
  if (field === 'organisation') return record.organisation;
  return record.profile[field];
}

/**
 * Ordered predicate → category rules. The first rule that matches any of its
 * fields decides; a user no rule matches is `unclassified`. The same file
 * carries the organisation names and country tables used to fill the
 * organisation and country columns.
 */
export class UserClassifier {
  private rules: CompiledRule[];
  private organisations: OrganisationMapper;
  private countries: CountryTable;

  constructor(
    rules: readonly ClassificationRule[],
    private logger: Logger,
    private metrics?: MetricsCollector,
    context: ClassifierContext = {}
  ) {
    this.rules = rules.map(compile);
    this.organisations = new OrganisationMapper(context.organisations ?? []);
    this.countries = context.countries ?? { aliases: {}, domains: [] };
  }

  static async fromFile(file: string, logger: Logger, metrics?: MetricsCollector): Promise<UserClassifier> {
    let document: unknown;
    try {
      document = parseYaml(await fs.readFile(file, 'utf8'));
    } catch (error: unknown) {
      throw new ConfigError(`Cannot read classification rules: ${error instanceof Error ? error.message : String(error)}`, {
        file,
      });
    }

    const result = RuleFileSchema.safeParse(document);
    if (!result.success) {
      throw new ConfigError('Invalid classification rules', {
        file,
        issues: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
      });
    }

    const { rules, organisations, countries } = result.data;
    logger.debug('Classification rules loaded', {
      file,
      rules: rules.length,
      organisations: organisations.length,
      countryAliases: Object.keys(countries.aliases).length,
    });
    return new UserClassifier(rules, logger, metrics, { organisations, countries });
  }

  /**
   * Canonical organisation names for the company field, comma-joined. An
   * empty company falls back to the organisation owning the email domain.
   */
  organisationFor(record: UserDetailRecord): string {
    const company = record.profile.company.trim();
    if (company) return this.organisations.map(company).join(',');
    return this.organisations.byDomain(record.profile.email_domain) ?? '';
  }

  classify(record: UserDetailRecord): Classification {
    for (const rule of this.rules) {
      if (rule.fields.some((field) => {
        const value = fieldValue(record, field);
        return value !== '' && rule.test(value);
      })) {
        return { category: rule.category, ruleId: rule.id };
      }
    }
    return { category: UNCLASSIFIED, ruleId: '' };
  }

  /**
   * Rewrite the organisation, country, category and rule_id columns of
   * user_details.csv. Profile columns are written back unchanged.
   */
  async classifyTable(tables: TableStore, options: ClassifyTableOptions = {}): Promise<ClassificationSummary> {
    const records = await readUserDetails(tables);
    const resolver = new CountryResolver(this.countries, tables, this.logger, this.metrics, options.geocoder);
    await resolver.resolveLocations(records.map((record) => record.profile.location), options.signal);

    const byCategory: Record<string, number> = {};
    let unclassified = 0;
    let withCountry = 0;
    let withOrganisation = 0;

    const classified = records.map((record) => {
      const derived = {
        ...record,
        organisation: this.organisationFor(record),
        country: resolver.countryFor(record),
      };
      if (derived.country) withCountry++;
      if (derived.organisation) withOrganisation++;

      const { category, ruleId } = this.classify(derived);
      byCategory[category] = (byCategory[category] ?? 0) + 1;
      this.metrics?.incrementCounter('users_classified', { category });
      if (category === UNCLASSIFIED) {
        unclassified++;
        this.logger.debug('ClassificationMiss', { login: record.login });
      }
      return { ...derived, category, ruleId };
    });

    await tables.write(TABLES.userDetails, USER_DETAIL_COLUMNS, classified.map(userDetailToRow));

    const summary = { users: records.length, unclassified, byCategory, withCountry, withOrganisation };
    this.logger.info('Users classified', { ...summary });
    return summary;
  }
}
