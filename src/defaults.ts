/**
 * Built-in whitelist and enhancement tables
 *
 * Keyed by the schema's prefixed operation ids (`api_v1_<resource>_<action>`).
 * The allow-list focuses on facility setup; nothing destructive is listed.
 */

import type { Enhancement } from './enhancements.js';

export const DEFAULT_ALLOWED_OPERATIONS: readonly string[] = [
  // Facilities
  'api_v1_facility_create',
  'api_v1_facility_list',
  'api_v1_facility_retrieve',
  'api_v1_facility_update',
  'api_v1_facility_partial_update',

  // Organizations
  'api_v1_organization_create',
  'api_v1_organization_list',
  'api_v1_organization_retrieve',
  'api_v1_organization_update',

  // Locations inside a facility
  'api_v1_location_create',
  'api_v1_location_list',
  'api_v1_location_retrieve',
  'api_v1_location_update',
  'api_v1_assetlocation_create',
  'api_v1_assetlocation_list',
  'api_v1_assetlocation_retrieve',

  // Beds
  'api_v1_bed_create',
  'api_v1_bed_list',
  'api_v1_bed_retrieve',
  'api_v1_bed_update',

  // Users
  'api_v1_users_list',
  'api_v1_users_retrieve',
  'api_v1_users_getcurrentuser_retrieve',

  // Patients (read only)
  'api_v1_patient_list',
  'api_v1_patient_retrieve',

  // Geography
  'api_v1_state_list',
  'api_v1_district_list',
  'api_v1_local_body_list',
  'api_v1_ward_list',
];

export const DEFAULT_DENY_PATTERNS: readonly string[] = ['_destroy', '_delete'];

export const DEFAULT_ENHANCEMENTS: readonly Enhancement[] = [
  {
    operationId: 'api_v1_facility_create',
    title: '🏥 Create Healthcare Facility',
    description: [
      'Create a new hospital, clinic, or healthcare facility.',
      '',
      'This is the first step in setting up a new healthcare location. Provide the facility name,',
      'the facility type (hospital, clinic, primary health centre), address, location and contact details.',
    ].join('\n'),
    tags: ['setup', 'hospital', 'onboarding', 'facility'],
    examples: [
      'Create a new district hospital in Kerala',
      'Set up a COVID care center in Mumbai',
      'Register a primary health center',
    ],
  },
  {
    operationId: 'api_v1_facility_list',
    title: '🏥 List Healthcare Facilities',
    description: [
      'List the facilities visible to the current user.',
      '',
      'Supports free-text search and pagination; use it to find the external id of a facility',
      'before retrieving or updating it.',
    ].join('\n'),
    tags: ['facility', 'search'],
    examples: [
      'Find all facilities named "General Hospital"',
      'List the first 20 facilities',
    ],
  },
  {
    operationId: 'api_v1_organization_create',
    title: '🏢 Create Healthcare Organization',
    description: [
      'Create a healthcare organization such as a hospital network, health department or NGO.',
      '',
      'Organizations group facilities and model administrative hierarchies.',
    ].join('\n'),
    tags: ['setup', 'organization', 'onboarding'],
    examples: [
      'Create a state health department organization',
      'Set up a hospital chain network',
      'Register an NGO healthcare organization',
    ],
  },
  {
    operationId: 'api_v1_location_create',
    title: '📍 Create Location Within Facility',
    description: [
      'Create a location inside a facility: a ward, room, department or building.',
      '',
      'Locations are used for patient tracking, bed management and resource allocation.',
    ].join('\n'),
    tags: ['setup', 'location', 'facility-management'],
    examples: [
      'Add ICU ward to a hospital',
      'Create OPD consultation rooms',
      'Set up pharmacy location',
    ],
  },
  {
    operationId: 'api_v1_bed_create',
    title: '🛏️ Create and Register Beds',
    description: [
      'Register beds within a facility for capacity management.',
      '',
      'Beds track availability and occupancy and can be allocated to admitted patients.',
    ].join('\n'),
    tags: ['setup', 'bed-management', 'capacity'],
    examples: [
      'Add 10 ICU beds to the facility',
      'Register 50 general ward beds',
      'Set up 5 isolation beds',
    ],
  },
  {
    operationId: 'api_v1_users_list',
    title: '👥 List Users',
    description: 'List user accounts, optionally filtered by name, type or home facility.',
    tags: ['users', 'search'],
    examples: [
      'List all doctors at a facility',
      'Find a user by username',
    ],
  },
  {
    operationId: 'api_v1_users_getcurrentuser_retrieve',
    title: '🙋 Get Current User',
    description: 'Return the profile of the authenticated user, including home facility and permissions.',
    tags: ['users', 'session'],
    examples: ['Who am I logged in as?'],
  },
  {
    operationId: 'api_v1_patient_list',
    title: '🧑‍⚕️ List Patients',
    description: [
      'List patients registered at the facilities the current user can access.',
      '',
      'Read only; filter by facility, name or phone number.',
    ].join('\n'),
    tags: ['patient', 'search'],
    examples: [
      'List patients admitted to a facility',
      'Search for a patient by phone number',
    ],
  },
];
