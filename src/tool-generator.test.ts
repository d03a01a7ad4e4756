/**
 * Tests for the generation driver
 */

import { describe, it, expect } from 'vitest';
import { ToolGenerator } from './tool-generator.js';
import { SchemaParser } from './schema-parser.js';
import { ToolFactory } from './tool-factory.js';
import { Whitelist } from './whitelist.js';
import { EnhancementCatalog } from './enhancements.js';
import { BASE_URL, careSchema, mockFacility } from './testing/fixtures.js';
import {
  FakeApiClient,
  RecordingLogger,
  RecordingSink,
  StaticAuthProvider,
  jsonResponse,
  silentLogger,
} from './testing/mock-utils.js';

function createGenerator(
  whitelist: Whitelist,
  client = new FakeApiClient(() => jsonResponse(mockFacility)),
  logger = silentLogger
): ToolGenerator {
  const parser = new SchemaParser({ logger: silentLogger });
  parser.loadDocument(careSchema);

  const factory = new ToolFactory({
    baseUrl: BASE_URL,
    client,
    auth: new StaticAuthProvider('test-token'),
    catalog: new EnhancementCatalog(),
    logger: silentLogger,
  });

  return new ToolGenerator(parser, whitelist, factory, logger);
}

describe('ToolGenerator', () => {
  it('registers allowed operations in enumeration order', () => {
    const sink = new RecordingSink();
    const count = createGenerator(new Whitelist()).generateAll(sink);

    expect(count).toBe(5);
    expect(sink.names()).toEqual([
      'api_v1_facility_list',
      'api_v1_facility_create',
      'api_v1_facility_retrieve',
      'api_v1_facility_partial_update',
      'api_v1_users_getcurrentuser_retrieve',
    ]);
  });

  it('excludes operations that are not allowed from the count', () => {
    const sink = new RecordingSink();
    const count = createGenerator(new Whitelist(['api_v1_facility_list'])).generateAll(sink);

    expect(count).toBe(1);
    expect(sink.names()).toEqual(['api_v1_facility_list']);
  });

  it('never registers a destroy operation', () => {
    const whitelist = new Whitelist(['api_v1_facility_destroy', 'api_v1_facility_retrieve']);
    const sink = new RecordingSink();

    expect(createGenerator(whitelist).generateAll(sink)).toBe(1);
    expect(sink.names()).toEqual(['api_v1_facility_retrieve']);
  });

  it('logs denied operations at debug and a summary at info', () => {
    const logger = new RecordingLogger();
    createGenerator(new Whitelist(), undefined, logger).generateAll(new RecordingSink());

    expect(logger.messages('debug')).toEqual(['Operation not whitelisted', 'Operation not whitelisted']);
    expect(logger.entries.find(entry => entry.level === 'info')).toEqual({
      level: 'info',
      message: 'Generated tools',
      context: { registered: 5, denied: 2, operations: 7 },
    });
  });

  it('produces tools that call the API', async () => {
    const client = new FakeApiClient(() => jsonResponse(mockFacility));
    const sink = new RecordingSink();
    createGenerator(new Whitelist(['api_v1_facility_retrieve']), client).generateAll(sink);

    const result = await sink.tools[0].invoke({ external_id: 'c7f1' });

    expect(result).toEqual({ success: true, status: 200, data: mockFacility });
    expect(client.requests[0].url).toBe(`${BASE_URL}/api/v1/facility/c7f1/`);
  });

  it('uses catalog text for enhanced operations', () => {
    const sink = new RecordingSink();
    createGenerator(new Whitelist(['api_v1_facility_create'])).generateAll(sink);

    expect(sink.tools[0].description.startsWith('🏥 Create Healthcare Facility\n\n')).toBe(true);
    expect(sink.tools[0].description.endsWith('\n\nAPI: POST /api/v1/facility/')).toBe(true);
  });
});
