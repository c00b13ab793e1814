import type { Server } from 'node:http';

import { createSampleRepository } from '../../../../tests/helpers/readinessFixture';
import { createApiApp } from '../../../apiApp';
import type { ReadinessRepository } from '../../../readiness/ReadinessRepository';

let repository: ReadinessRepository;
let server: Server;
let baseUrl: string;

const call = async (
  method: string,
  path: string,
  body?: unknown,
): Promise<{ status: number; body: unknown }> => {
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const json: unknown = await res.json();
  return { status: res.status, body: json };
};

beforeEach(async () => {
  repository = createSampleRepository();
  const app = createApiApp({ repository, config: { requestTimeoutMs: 5000 } });
  await new Promise<void>((resolve) => {
    server = app.listen(0, () => resolve());
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('server has no port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  repository.close();
});

describe('readiness API', () => {
  test('GET /health', async () => {
    const res = await call('GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual(expect.objectContaining({ ok: true }));
  });

  test('GET /api/dashboard buckets assessments by TRL', async () => {
    const res = await call('GET', '/api/dashboard');
    expect(res.body).toEqual({
      success: true,
      data: {
        totals: { productFeatures: 1, capabilities: 3, technicalFunctions: 3, assessments: 3 },
        trlBuckets: {
          high: { count: 1, percentage: 33.3 },
          medium: { count: 2, percentage: 66.7 },
          low: { count: 0, percentage: 0 },
        },
        averageTrl: 6,
      },
    });
  });

  test('GET /api/capabilities/:name includes links and TRL stats', async () => {
    const res = await call('GET', `/api/capabilities/${encodeURIComponent('Highway Navigation')}`);
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: true,
      data: expect.objectContaining({
        entityType: 'capability',
        links: { productFeatures: ['Highway Pilot'], technicalFunctions: ['Lane Keeping', 'Object Detection'] },
        assessmentCount: 2,
        averageTrl: 5,
      }),
    });
  });

  test('unknown names are 404', async () => {
    const res = await call('GET', '/api/product_features/Nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual(
      expect.objectContaining({
        success: false,
        errorMessage: "product feature not found: 'Nope'",
        error: expect.objectContaining({ code: 'NOT_FOUND', retryable: false }),
      }),
    );
  });

  test('POST creates through the batch engine', async () => {
    const res = await call('POST', '/api/technical_capabilities', {
      name: 'Convoy Control',
      capabilities: ['Highway Navigation'],
      progress_relative_to_tmos: 10,
    });
    expect(res.status).toBe(201);
    expect(res.body).toEqual({
      success: true,
      data: expect.objectContaining({
        entity: expect.objectContaining({
          entityType: 'technical_function',
          links: { capabilities: ['Highway Navigation'] },
        }),
      }),
    });
    expect(repository.findByName('technical_function', 'Convoy Control')?.progressRelativeToTmos).toBe(10);
  });

  test('POST with an existing name is 409 and invalid input is 400', async () => {
    const duplicate = await call('POST', '/api/capabilities', { name: 'Lane Change' });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body).toEqual(
      expect.objectContaining({ error: expect.objectContaining({ code: 'DUPLICATE' }) }),
    );

    const invalid = await call('POST', '/api/capabilities', { name: 'Bad', target_trl: 11 });
    expect(invalid.status).toBe(400);
    expect(invalid.body).toEqual(
      expect.objectContaining({ errorMessage: 'target_trl: TRL must be between 1 and 9' }),
    );
  });

  test('PATCH cascades to assessments', async () => {
    const res = await call('PATCH', `/api/capabilities/${encodeURIComponent('Highway Navigation')}`, {
      target_trl: 8,
    });
    expect(res.status).toBe(200);
    const assessments = await call('GET', '/api/readiness_assessments?min_trl=1');
    expect(assessments.body).toEqual({
      success: true,
      data: [
        expect.objectContaining({ technicalFunctionName: 'Lane Keeping', targetTrl: 8 }),
        expect.objectContaining({ technicalFunctionName: 'Object Detection', targetTrl: 8 }),
        expect.objectContaining({ technicalFunctionName: 'Dock Approach', targetTrl: null }),
      ],
    });
  });

  test('DELETE needs force when dependents exist', async () => {
    const blocked = await call('DELETE', `/api/technical_functions/${encodeURIComponent('Lane Keeping')}`);
    expect(blocked.status).toBe(409);
    expect(blocked.body).toEqual(
      expect.objectContaining({ error: expect.objectContaining({ code: 'DEPENDENCY_CONFLICT' }) }),
    );

    const forced = await call(
      'DELETE',
      `/api/technical_functions/${encodeURIComponent('Lane Keeping')}?force=true`,
    );
    expect(forced.status).toBe(200);
    expect(repository.findByName('technical_function', 'Lane Keeping')).toBeNull();
  });

  test('assessment filters', async () => {
    const feature = repository.findByName('product_feature', 'Highway Pilot');
    const byFeature = await call('GET', `/api/readiness_assessments?product_feature_id=${feature?.id}`);
    expect(byFeature.body).toEqual({ success: true, data: [expect.anything(), expect.anything()] });

    const highTrl = await call('GET', '/api/readiness_assessments?min_trl=7');
    expect(highTrl.body).toEqual({
      success: true,
      data: [
        expect.objectContaining({ technicalFunctionName: 'Dock Approach', trailerName: 'Flatbed', trl: 8 }),
      ],
    });

    const yardOnly = await call('GET', '/api/readiness_assessments?platform_id=1');
    expect(yardOnly.body).toEqual({ success: true, data: [expect.anything()] });
  });

  test('POST /api/readiness_assessments creates an assessment', async () => {
    const res = await call('POST', '/api/readiness_assessments', {
      technical_function: 'Object Detection',
      vehicle_platform: 'Van Platform',
      odd: 'Highway',
      environment: 'Nordic',
      trl: 5,
      confidence: 4,
    });
    expect(res.status).toBe(201);
    expect(res.body).toEqual({
      success: true,
      data: expect.objectContaining({
        assessment: expect.objectContaining({ vehiclePlatformName: 'Van Platform', trl: 5, confidence: 4 }),
      }),
    });
  });

  test('GET /api/readiness_matrix groups by function and configuration', async () => {
    const res = await call('GET', '/api/readiness_matrix');
    const row = (name: string, trl: number) =>
      expect.objectContaining({ technicalFunctionName: name, cells: [expect.objectContaining({ trl })] });
    expect(res.body).toEqual({
      success: true,
      data: {
        configurations: [
          expect.objectContaining({ label: 'Terberg ATT / Yard / Nordic / Flatbed' }),
          expect.objectContaining({ label: 'Truck Platform / Highway / Nordic' }),
        ],
        rows: [row('Dock Approach', 8), row('Lane Keeping', 6), row('Object Detection', 4)],
      },
    });
  });

  test('GET /api/readiness_data and /api/configurations', async () => {
    const data = await call('GET', '/api/readiness_data');
    const level = (n: number, count: number) => expect.objectContaining({ level: n, count });
    expect(data.body).toEqual({
      success: true,
      data: {
        distribution: [
          level(1, 0),
          level(2, 0),
          level(3, 0),
          level(4, 1),
          level(5, 0),
          level(6, 1),
          level(7, 0),
          level(8, 1),
          level(9, 0),
        ],
        productFeatures: [{ name: 'Highway Pilot', averageTrl: 5, assessmentCount: 2 }],
      },
    });

    const configs = await call('GET', '/api/configurations');
    expect(configs.body).toEqual({
      success: true,
      data: expect.objectContaining({
        odds: [
          expect.objectContaining({ name: 'Highway', maxSpeed: 90 }),
          expect.objectContaining({ name: 'Yard', maxSpeed: 25 }),
        ],
        trailers: [expect.objectContaining({ name: 'Flatbed', axleCount: 3 })],
      }),
    });
  });

  test('json_editor exports and applies batches', async () => {
    const exported = await call('GET', '/api/json_editor');
    expect(exported.body).toEqual({
      success: true,
      data: expect.objectContaining({ metadata: expect.objectContaining({ total_assessments: 3 }) }),
    });

    const applied = await call('POST', '/api/json_editor', {
      entities: [
        { entity_type: 'capability', operation: 'update', name: 'Yard Docking', due_date: '2025-11-15' },
      ],
    });
    expect(applied.status).toBe(200);
    expect(applied.body).toEqual({
      success: true,
      data: expect.objectContaining({
        summary: [
          'Created: 0, Updated: 1, Deleted: 0, Skipped: 0, Errored: 0',
          '1 capability updated, 1 assessment affected',
        ],
      }),
    });

    const rejected = await call('POST', '/api/json_editor', { metadata: {} });
    expect(rejected.status).toBe(400);
  });

  test('unknown API routes and malformed JSON', async () => {
    const missing = await call('GET', '/api/nothing_here');
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ success: false, errorMessage: 'Not Found' });

    const res = await fetch(`${baseUrl}/api/capabilities`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{ not json',
    });
    expect(res.status).toBe(400);
  });
});
