/**
 * Tests for the enhancement catalog
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { EnhancementCatalog, type Enhancement } from './enhancements.js';
import { ConfigurationError } from './errors.js';

const wardList: Enhancement = {
  operationId: 'api_v1_ward_list',
  title: 'List Wards',
  description: 'Wards of a local body',
  tags: ['geography'],
  examples: ['List wards in Ernakulam'],
};

describe('EnhancementCatalog', () => {
  describe('defaults', () => {
    const catalog = new EnhancementCatalog();

    it('describes facility creation', () => {
      const enhancement = catalog.get('api_v1_facility_create');

      expect(enhancement?.title).toBe('🏥 Create Healthcare Facility');
      expect(enhancement?.description.length).toBeGreaterThan(0);
      expect(enhancement?.tags).toContain('facility');
      expect(enhancement?.examples.length).toBeGreaterThan(0);
    });

    it('covers the key operations', () => {
      for (const id of [
        'api_v1_facility_create',
        'api_v1_facility_list',
        'api_v1_organization_create',
        'api_v1_users_list',
        'api_v1_patient_list',
      ]) {
        expect(catalog.has(id)).toBe(true);
      }
    });

    it('has nothing for unknown operations', () => {
      expect(catalog.get('non_existent_operation')).toBeUndefined();
      expect(catalog.has('non_existent_operation')).toBe(false);
    });
  });

  it('replaces the defaults with caller-supplied entries', () => {
    const catalog = new EnhancementCatalog([wardList]);

    expect(catalog.size).toBe(1);
    expect(catalog.get('api_v1_ward_list')).toEqual(wardList);
    expect(catalog.has('api_v1_facility_create')).toBe(false);
  });

  it('keeps separate catalogs isolated', () => {
    const first = new EnhancementCatalog();
    const second = new EnhancementCatalog();
    first.add(wardList);

    expect(first.has('api_v1_ward_list')).toBe(true);
    expect(second.has('api_v1_ward_list')).toBe(false);
  });

  it('replaces an existing entry on add', () => {
    const catalog = new EnhancementCatalog([wardList]);
    catalog.add({ ...wardList, title: 'Wards' });

    expect(catalog.size).toBe(1);
    expect(catalog.get('api_v1_ward_list')?.title).toBe('Wards');
  });

  describe('YAML import and export', () => {
    it('exports snake_case records', () => {
      const yaml = new EnhancementCatalog([wardList]).exportYaml();

      expect(yaml).toBe(
        'enhancements:\n' +
        '  - operation_id: api_v1_ward_list\n' +
        '    title: List Wards\n' +
        '    description: Wards of a local body\n' +
        '    tags:\n' +
        '      - geography\n' +
        '    examples:\n' +
        '      - List wards in Ernakulam\n'
      );
    });

    it('round-trips the default catalog', () => {
      const original = new EnhancementCatalog();
      const restored = EnhancementCatalog.fromYaml(original.exportYaml());

      expect(restored.list()).toEqual(original.list());
    });

    it('fills optional fields', () => {
      const catalog = EnhancementCatalog.fromYaml('enhancements:\n  - operation_id: api_v1_bed_list\n    title: Beds\n');

      expect(catalog.get('api_v1_bed_list')).toEqual({
        operationId: 'api_v1_bed_list',
        title: 'Beds',
        description: '',
        tags: [],
        examples: [],
      });
    });

    it('rejects records without an operation id', () => {
      expect(() => EnhancementCatalog.fromYaml('enhancements:\n  - title: Beds\n')).toThrow(ConfigurationError);
    });
  });

  describe('file helpers', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'care-enhancements-'));
    });

    afterAll(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('writes and reads an enhancements file', async () => {
      const filePath = path.join(dir, 'enhancements.yaml');
      await new EnhancementCatalog([wardList]).exportToFile(filePath);

      const restored = await EnhancementCatalog.fromFile(filePath);
      expect(restored.list()).toEqual([wardList]);
    });
  });
});
