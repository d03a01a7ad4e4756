/**
 * Mock Care API served in-process by MSW for integration tests
 */

import { http, HttpResponse } from 'msw';
import { setupServer } from 'msw/node';
import { isRecord } from '../ref-resolver.js';
import * as fixtures from './fixtures.js';

const BASE_URL = fixtures.BASE_URL;

export const VALID_TOKEN = fixtures.mockLoginResponse.access;

const facilities = [
  fixtures.mockFacility,
  { id: 'c7f1f1f4-0000-4000-8000-000000000456', name: 'Primary Health Centre Kakkanad', facility_type: 3, pincode: 682030 },
];

function isAuthorized(request: Request): boolean {
  return request.headers.get('authorization') === `Bearer ${VALID_TOKEN}`;
}

const unauthorized = () =>
  HttpResponse.json({ detail: 'Authentication credentials were not provided.' }, { status: 401 });

const notFound = () => HttpResponse.json({ detail: 'Not found.' }, { status: 404 });

export const handlers = [
  http.get(`${BASE_URL}/api/schema/`, () => HttpResponse.json(fixtures.careSchema)),

  http.post(`${BASE_URL}/api/v1/auth/login`, async ({ request }) => {
    const body: unknown = await request.json();
    if (isRecord(body) && body.username === 'test-user' && body.password === 'test-secret') {
      return HttpResponse.json(fixtures.mockLoginResponse);
    }
    return HttpResponse.json(
      { detail: 'No active account found with the given credentials' },
      { status: 401 }
    );
  }),

  http.post(`${BASE_URL}/api/v1/auth/token/refresh`, () => HttpResponse.json({ access: VALID_TOKEN })),

  http.get(`${BASE_URL}/api/v1/facility/`, ({ request }) => {
    if (!isAuthorized(request)) return unauthorized();

    const url = new URL(request.url);
    const search = url.searchParams.get('search')?.toLowerCase();
    const limit = Number(url.searchParams.get('limit') ?? facilities.length);
    const matching = search
      ? facilities.filter(facility => facility.name.toLowerCase().includes(search))
      : facilities;

    return HttpResponse.json({
      count: matching.length,
      next: null,
      previous: null,
      results: matching.slice(0, limit),
    });
  }),

  http.post(`${BASE_URL}/api/v1/facility/`, async ({ request }) => {
    if (!isAuthorized(request)) return unauthorized();

    const body: unknown = await request.json();
    if (!isRecord(body) || typeof body.name !== 'string') {
      return HttpResponse.json({ name: ['This field is required.'] }, { status: 400 });
    }
    return HttpResponse.json({ id: 'c7f1f1f4-0000-4000-8000-000000000789', ...body }, { status: 201 });
  }),

  http.get(`${BASE_URL}/api/v1/facility/:externalId/`, ({ request, params }) => {
    if (!isAuthorized(request)) return unauthorized();

    const facility = facilities.find(f => f.id === params.externalId);
    return facility ? HttpResponse.json(facility) : notFound();
  }),

  http.patch(`${BASE_URL}/api/v1/facility/:externalId/`, async ({ request, params }) => {
    if (!isAuthorized(request)) return unauthorized();

    const facility = facilities.find(f => f.id === params.externalId);
    const body: unknown = await request.json();
    if (!facility) return notFound();
    return HttpResponse.json({ ...facility, ...(isRecord(body) ? body : {}) });
  }),

  http.delete(`${BASE_URL}/api/v1/facility/:externalId/`, () => new HttpResponse(null, { status: 204 })),

  http.get(`${BASE_URL}/api/v1/users/getcurrentuser/`, ({ request }) => {
    if (!isAuthorized(request)) return unauthorized();
    return HttpResponse.json({ username: 'test-user', user_type: 'StateAdmin' });
  }),
];

export const mockServer = setupServer(...handlers);

export function startMockServer(): void {
  mockServer.listen({ onUnhandledRequest: 'error' });
}

export function resetMockServer(): void {
  mockServer.resetHandlers();
}

export function stopMockServer(): void {
  mockServer.close();
}
