// tests/unit/organisations.test.ts

import { describe, it, expect } from 'vitest';
import { OrganisationMapper, normalizeOrgName } from '../../src/core/users/organisations';

const mapper = new OrganisationMapper([
  {
    name: 'Forschungszentrum Jülich',
    shortname: 'fzj',
    variations: ['fz juelich'],
    domains: ['fz-juelich.de'],
  },
  { name: 'Technical University of Denmark', shortname: 'dtu', domains: ['dtu.dk'] },
  { name: 'TenneT', variations: ['tennet tso'] },
  { name: 'Grid Operators United', variations: ['tennet tso'] },
]);

describe('normalizeOrgName', () => {
  it('should lower-case, drop the at sign, collapse spaces and strip accents', () => {
    expect(normalizeOrgName('  @Forschungszentrum   JÜLICH ')).toBe('forschungszentrum julich');
    expect(normalizeOrgName('Université\tParis-Saclay')).toBe('universite paris-saclay');
  });
});

describe('OrganisationMapper', () => {
  it('should match names and shortnames exactly first', () => {
    expect(mapper.map('@DTU')).toEqual(['Technical University of Denmark']);
    expect(mapper.map('Forschungszentrum Jülich')).toEqual(['Forschungszentrum Jülich']);
  });

  it('should return every organisation sharing a variation', () => {
    expect(mapper.map('TenneT TSO')).toEqual(['TenneT', 'Grid Operators United']);
  });

  it('should fall back to whole-word matches on names, then variations', () => {
    expect(mapper.map('PhD student at DTU Wind')).toEqual(['Technical University of Denmark']);
    expect(mapper.map('IEK-3, FZ Juelich')).toEqual(['Forschungszentrum Jülich']);
    expect(mapper.map('Studtu Consulting')).toEqual(['studtu consulting']);
  });

  it('should keep unknown names normalized and skip blank ones', () => {
    expect(mapper.map('  Acme   Energy ')).toEqual(['acme energy']);
    expect(mapper.map('   ')).toEqual([]);
  });

  it('should find the organisation owning an email domain', () => {
    expect(mapper.byDomain('fz-juelich.de')).toBe('Forschungszentrum Jülich');
    expect(mapper.byDomain('Wind.DTU.dk')).toBe('Technical University of Denmark');
    expect(mapper.byDomain('notdtu.dk')).toBeUndefined();
    expect(mapper.byDomain('')).toBeUndefined();
  });
});
