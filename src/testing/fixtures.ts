/**
 * Schema and response fixtures modelled on the Care API
 *
 * Operation ids follow the schema generator's prefixed convention
 * (`api_v1_<resource>_<action>`).
 */

import type { SchemaDocument } from '../types/openapi.js';

export const BASE_URL = 'https://care.example.test';

export const careSchema: SchemaDocument = {
  openapi: '3.0.3',
  info: { title: 'Care API', version: '3.0.0' },
  paths: {
    '/api/v1/facility/': {
      get: {
        operationId: 'api_v1_facility_list',
        summary: 'List facilities',
        tags: ['facility'],
        parameters: [
          { name: 'limit', in: 'query', schema: { type: 'integer' }, description: 'Number of results to return per page.' },
          { name: 'search', in: 'query', schema: { type: 'string' } },
        ],
      },
      post: {
        operationId: 'api_v1_facility_create',
        tags: ['facility'],
        requestBody: {
          required: true,
          content: {
            'application/json': { schema: { $ref: '#/components/schemas/FacilityRequest' } },
            'application/x-www-form-urlencoded': { schema: { $ref: '#/components/schemas/FacilityRequest' } },
          },
        },
      },
    },
    '/api/v1/facility/{external_id}/': {
      parameters: [
        { name: 'external_id', in: 'path', required: true, schema: { type: 'string', format: 'uuid' } },
      ],
      get: {
        operationId: 'api_v1_facility_retrieve',
        description: 'Retrieve a single facility',
        tags: ['facility'],
        parameters: [
          { name: 'external_id', in: 'path', required: true, schema: { type: 'string' }, description: 'Facility external id' },
        ],
      },
      patch: {
        operationId: 'api_v1_facility_partial_update',
        tags: ['facility'],
        requestBody: { $ref: '#/components/requestBodies/PatchedFacility' },
      },
      delete: {
        operationId: 'api_v1_facility_destroy',
        tags: ['facility'],
      },
    },
    '/api/v1/facility/{external_id}/cover_image/': {
      post: {
        operationId: 'api_v1_facility_cover_image_create',
        tags: ['facility'],
        parameters: [
          { name: 'external_id', in: 'path', required: true, schema: { type: 'string' } },
          { name: 'X-Request-Id', in: 'header', schema: { type: 'string' } },
          { name: 'sessionid', in: 'cookie', schema: { type: 'string' } },
        ],
        requestBody: {
          content: {
            'multipart/form-data': { schema: { type: 'object', properties: { cover_image: { type: 'string', format: 'binary' } } } },
          },
        },
      },
    },
    '/api/v1/users/getcurrentuser/': {
      get: {
        operationId: 'api_v1_users_getcurrentuser_retrieve',
        summary: 'Current user',
        tags: ['users'],
      },
    },
    '/api/v1/legacy/': {
      get: {
        summary: 'Endpoint without an operation id',
      },
    },
  },
  components: {
    schemas: {
      FacilityRequest: {
        type: 'object',
        properties: {
          name: { type: 'string', maxLength: 1000, description: 'Facility name' },
          facility_type: {
            allOf: [{ $ref: '#/components/schemas/FacilityTypeEnum' }],
            description: 'Type of facility',
          },
          pincode: { type: 'integer' },
          features: { type: 'array', items: { type: 'integer' } },
          ward: { $ref: '#/components/schemas/WardRef' },
        },
        required: ['name', 'facility_type'],
      },
      FacilityTypeEnum: { type: 'integer', enum: [1, 2, 3] },
      WardRef: { type: 'integer', description: 'Ward id' },
      PatchedFacilityRequest: {
        type: 'object',
        properties: {
          name: { type: 'string' },
        },
      },
    },
    requestBodies: {
      PatchedFacility: {
        content: {
          'application/json; charset=utf-8': { schema: { $ref: '#/components/schemas/PatchedFacilityRequest' } },
        },
      },
    },
  },
};

export const mockFacility = {
  id: 'c7f1f1f4-0000-4000-8000-000000000123',
  name: 'District Hospital',
  facility_type: 2,
  pincode: 682001,
};

export const mockFacilityList = {
  count: 1,
  next: null,
  previous: null,
  results: [mockFacility],
};

export const mockLoginResponse = {
  access: 'test-access-token',
  refresh: 'test-refresh-token',
};
