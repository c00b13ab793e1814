import {
  applyDocument,
  createSampleRepository,
  SAMPLE_NOW,
} from '../../../tests/helpers/readinessFixture';
import { InMemoryReadinessRepository } from '../../readiness/InMemoryReadinessRepository';
import type { ReadinessRepository } from '../../readiness/ReadinessRepository';
import { seedReferenceData } from '../../readiness/RepositoryStore';
import { parseBatchCsv } from '../csvBatchParser';
import { exportBatchDocument, exportCapabilitiesCsv } from '../exportService';
import { buildCsvTemplate, buildJsonTemplate } from '../templates';

/** Entities with their links by name, independent of ids. */
const describeGraph = (repo: ReadinessRepository) => {
  const doc = exportBatchDocument(repo, SAMPLE_NOW);
  return { entities: doc.entities, assessments: doc.assessments };
};

describe('exportBatchDocument', () => {
  test('writes metadata totals and orders entities for re-import', () => {
    const doc = exportBatchDocument(createSampleRepository(), SAMPLE_NOW);

    expect(doc.metadata).toEqual({
      version: '2.0',
      description: 'Complete readiness database export',
      exported_by: 'trl-update-json',
      export_date: '2025-06-01T12:00:00.000Z',
      total_product_features: 1,
      total_capabilities: 3,
      total_technical_functions: 3,
      total_assessments: 3,
    });
    expect(doc.entities.map((e) => e.entity_type)).toEqual([
      'technical_function',
      'technical_function',
      'technical_function',
      'capability',
      'capability',
      'capability',
      'product_feature',
    ]);
    expect(doc.entities[3]).toEqual(
      expect.objectContaining({
        name: 'Highway Navigation',
        technical_functions: ['Lane Keeping', 'Object Detection'],
      }),
    );
    expect(doc.assessments[2]).toEqual(
      expect.objectContaining({
        technical_function: 'Dock Approach',
        vehicle_platform: 'Terberg ATT',
        trailer: 'Flatbed',
        trl: 8,
      }),
    );
  });

  test('importing an export into an empty store rebuilds it', () => {
    const source = createSampleRepository();
    const exported = exportBatchDocument(source, SAMPLE_NOW);

    const target = new InMemoryReadinessRepository();
    seedReferenceData(target);
    const report = applyDocument(target, JSON.parse(JSON.stringify(exported)));

    expect(report.counts.errored).toBe(0);
    expect(report.counts.created).toBe(4 + 7 + 3);
    expect(describeGraph(target)).toEqual(describeGraph(source));
  });

  test('re-importing an unchanged export only skips', () => {
    const repo = createSampleRepository();
    const report = applyDocument(repo, exportBatchDocument(repo, SAMPLE_NOW));

    expect(report.counts.created).toBe(0);
    expect(report.counts.updated).toBe(0);
    expect(report.counts.errored).toBe(0);
    expect(report.issues.every((i) => i.code === 'DUPLICATE')).toBe(true);
  });
});

describe('exportCapabilitiesCsv', () => {
  test('one row per entity with average TRL and last assessment day', () => {
    const csv = exportCapabilitiesCsv(createSampleRepository());
    expect(csv.split('\n')).toEqual([
      'capability_type,capability_name,description,current_avg_trl,assessment_count,last_updated',
      'product_feature,Highway Pilot,,5,2,2025-06-01',
      'capability,Highway Navigation,,5,2,2025-06-01',
      'capability,Lane Change,,6,1,2025-06-01',
      'capability,Yard Docking,,8,1,2025-06-01',
      'technical_function,Lane Keeping,Keeps the vehicle centred in lane,6,1,2025-06-01',
      'technical_function,Object Detection,,4,1,2025-06-01',
      'technical_function,Dock Approach,,8,1,2025-06-01',
      '',
    ]);
  });

  test('the CSV export can be fed back as an update file', () => {
    const parsed = parseBatchCsv(exportCapabilitiesCsv(createSampleRepository()));
    expect(parsed.ok && parsed.batch.operations).toHaveLength(7);
  });
});

describe('templates', () => {
  test('the JSON template applies cleanly to a fresh store', () => {
    const repo = new InMemoryReadinessRepository();
    seedReferenceData(repo);
    const report = applyDocument(repo, buildJsonTemplate(SAMPLE_NOW));

    expect(report.summary).toEqual([
      'Created: 7, Updated: 1, Deleted: 0, Skipped: 2, Errored: 0',
      '1 capability updated, 0 assessments affected',
    ]);
    expect(repo.list('product_feature').map((pf) => pf.label)).toEqual(['PF-ADAS-1.1']);
  });

  test('the CSV template parses into three updates', () => {
    const parsed = parseBatchCsv(buildCsvTemplate());
    expect(parsed.ok && parsed.batch.operations.map((op) => op.label)).toEqual([
      'Row 2',
      'Row 3',
      'Row 4',
    ]);
  });
});
