import {
  applyDocument,
  assessmentOf,
  createSampleRepository,
  SAMPLE_NOW,
} from '../../../tests/helpers/readinessFixture';
import { InMemoryReadinessRepository } from '../../readiness/InMemoryReadinessRepository';
import { seedReferenceData } from '../../readiness/RepositoryStore';
import { summarizeReport } from '../BatchUpdateEngine';

const LATER = new Date('2025-07-01T08:30:00.000Z');
const later = () => LATER;

const linkedFunctionNames = (
  repo: InMemoryReadinessRepository,
  capabilityName: string,
) => {
  const capability = repo.findByName('capability', capabilityName);
  if (!capability) return [];
  return repo
    .linkedIds('capability_technical_functions', 'capability', capability.id)
    .map((id) => repo.findById('technical_function', id)?.name);
};

const sampleRepo = () => {
  const repo = new InMemoryReadinessRepository();
  createSampleRepository(repo);
  return repo;
};

describe('BatchUpdateEngine cascade', () => {
  test('capability target TRL update reaches the assessments of its functions', () => {
    const repo = sampleRepo();
    const report = applyDocument(
      repo,
      {
        entities: [
          {
            entity_type: 'capability',
            operation: 'update',
            name: 'Highway Navigation',
            target_trl: 8,
            due_date: '09/30/2025',
          },
        ],
      },
      later,
    );

    expect(report.summary).toEqual([
      'Created: 0, Updated: 1, Deleted: 0, Skipped: 0, Errored: 0',
      '1 capability updated, 2 assessments affected',
    ]);
    expect(report.exitCode).toBe(0);

    for (const name of ['Lane Keeping', 'Object Detection']) {
      const assessment = assessmentOf(repo, name);
      expect(assessment.targetTrl).toBe(8);
      expect(assessment.nextReviewDate).toBe('2025-09-30');
      expect(assessment.assessmentDate).toBe('2025-07-01T08:30:00.000Z');
    }

    const untouched = assessmentOf(repo, 'Dock Approach');
    expect(untouched.targetTrl).toBeNull();
    expect(untouched.assessmentDate).toBe(SAMPLE_NOW.toISOString());
  });

  test('cascade keeps the TRL level and carries assessor and notes', () => {
    const repo = sampleRepo();
    const before = assessmentOf(repo, 'Lane Keeping');

    applyDocument(repo, {
      entities: [
        {
          entity_type: 'technical_function',
          operation: 'update',
          name: 'Lane Keeping',
          target_trl: 7,
          assessor: 'Review Board',
          notes: 'Re-planned',
        },
      ],
    });

    const after = assessmentOf(repo, 'Lane Keeping');
    expect(after.readinessLevelId).toBe(before.readinessLevelId);
    expect(after.assessor).toBe('Review Board');
    expect(after.notes).toBe('Re-planned');
    expect(after.targetTrl).toBe(7);
  });

  test('product feature update touches each reachable assessment once', () => {
    const repo = sampleRepo();
    const report = applyDocument(repo, {
      entities: [
        {
          entity_type: 'product_feature',
          operation: 'update',
          name: 'Highway Pilot',
          due_date: '2025-12-01',
        },
      ],
    });

    expect(report.assessmentsAffected).toBe(2);
    expect(report.summary[1]).toBe('1 product feature updated, 2 assessments affected');
    expect(assessmentOf(repo, 'Dock Approach').nextReviewDate).toBeNull();
  });

  test('updates without cascade fields leave assessments alone', () => {
    const repo = sampleRepo();
    const report = applyDocument(repo, {
      entities: [
        {
          entity_type: 'capability',
          operation: 'update',
          name: 'Highway Navigation',
          success_criteria: 'Drives 500 km unassisted',
        },
      ],
    });

    expect(report.assessmentsAffected).toBe(0);
    expect(report.summary[1]).toBe('1 capability updated, 0 assessments affected');
    expect(repo.findByName('capability', 'Highway Navigation')?.successCriteria).toBe(
      'Drives 500 km unassisted',
    );
  });
});

describe('BatchUpdateEngine entities', () => {
  test('unknown name on update is a warning and a skip', () => {
    const repo = sampleRepo();
    const report = applyDocument(repo, {
      entities: [{ entity_type: 'capability', operation: 'update', name: 'Ghost', target_trl: 5 }],
    });

    expect(report.counts).toEqual({ created: 0, updated: 0, deleted: 0, skipped: 1, errored: 0 });
    expect(report.issues).toEqual([
      {
        label: 'Entity 1',
        severity: 'warning',
        code: 'NOT_FOUND',
        message: "capability not found: 'Ghost'",
      },
    ]);
    expect(report.exitCode).toBe(0);
  });

  test('creating an existing name is skipped', () => {
    const repo = sampleRepo();
    const report = applyDocument(repo, {
      entities: [{ entity_type: 'technical_function', operation: 'create', name: 'Lane Keeping' }],
    });

    expect(report.counts.skipped).toBe(1);
    expect(report.issues[0]?.message).toBe(
      "technical function 'Lane Keeping' already exists, skipping creation",
    );
    expect(repo.list('technical_function')).toHaveLength(3);
  });

  test('unresolved references are reported and left out of the links', () => {
    const repo = sampleRepo();
    const report = applyDocument(repo, {
      entities: [
        {
          entity_type: 'capability',
          operation: 'create',
          name: 'Platooning',
          technical_functions: ['Lane Keeping', 'Convoy Control'],
        },
      ],
    });

    expect(report.counts.created).toBe(1);
    expect(report.issues).toEqual([
      {
        label: 'Entity 1',
        severity: 'warning',
        code: 'NOT_FOUND',
        message: "Referenced technical function 'Convoy Control' not found, skipping",
      },
    ]);
    expect(linkedFunctionNames(repo, 'Platooning')).toEqual(['Lane Keeping']);
  });

  test('references resolve by label when no name matches', () => {
    const repo = sampleRepo();
    applyDocument(repo, {
      entities: [
        {
          entity_type: 'product_feature',
          operation: 'create',
          name: 'Motorway Assist',
          capabilities: ['CAP-HWY'],
        },
      ],
    });

    const feature = repo.findByName('product_feature', 'Motorway Assist');
    const highway = repo.findByName('capability', 'Highway Navigation');
    expect(feature && repo.linkedIds('capability_product_features', 'product_feature', feature.id)).toEqual([
      highway?.id,
    ]);
  });

  test('legacy vehicle types map to platform ids and unknown ids are cleared', () => {
    const repo = sampleRepo();
    expect(repo.findByName('technical_function', 'Lane Keeping')?.vehiclePlatformId).toBe(5);

    const report = applyDocument(repo, {
      entities: [
        {
          entity_type: 'technical_function',
          operation: 'create',
          name: 'Trailer Coupling',
          vehicle_platform_id: 99,
        },
      ],
    });

    expect(report.issues[0]?.message).toBe('Vehicle platform 99 not found; platform left empty');
    expect(repo.findByName('technical_function', 'Trailer Coupling')?.vehiclePlatformId).toBeNull();
  });

  test('deleting a technical function with dependents needs force', () => {
    const repo = sampleRepo();
    const blocked = applyDocument(repo, {
      entities: [{ entity_type: 'technical_function', operation: 'delete', name: 'Lane Keeping' }],
    });

    expect(blocked.counts.errored).toBe(1);
    expect(blocked.issues[0]).toEqual({
      label: 'Entity 1',
      severity: 'error',
      code: 'DEPENDENCY_CONFLICT',
      message:
        "Cannot delete technical function 'Lane Keeping': 2 capabilities, 1 assessment depend on it. Use force_delete to override.",
    });
    expect(blocked.exitCode).toBe(0);
    expect(repo.findByName('technical_function', 'Lane Keeping')).not.toBeNull();

    const forced = applyDocument(repo, {
      entities: [
        {
          entity_type: 'technical_function',
          operation: 'delete',
          name: 'Lane Keeping',
          force_delete: true,
        },
      ],
    });

    expect(forced.counts.deleted).toBe(1);
    expect(repo.findByName('technical_function', 'Lane Keeping')).toBeNull();
    expect(repo.listAssessments()).toHaveLength(2);
    expect(linkedFunctionNames(repo, 'Highway Navigation')).toEqual(['Object Detection']);
  });

  test('invalid items are counted as errored without stopping the batch', () => {
    const repo = sampleRepo();
    const report = applyDocument(repo, {
      entities: [
        { entity_type: 'capability', operation: 'update', name: 'Lane Change', target_trl: 12 },
        { entity_type: 'capability', operation: 'update', name: 'Yard Docking', target_trl: 6 },
      ],
    });

    expect(report.counts).toEqual({ created: 0, updated: 1, deleted: 0, skipped: 0, errored: 1 });
    expect(report.issues[0]).toEqual({
      label: 'Entity 1',
      severity: 'error',
      code: 'VALIDATION_ERROR',
      message: 'target_trl: TRL must be between 1 and 9',
    });
    expect(assessmentOf(repo, 'Dock Approach').targetTrl).toBe(6);
  });
});

describe('BatchUpdateEngine configurations and assessments', () => {
  test('configuration delete with assessments conflicts unless forced', () => {
    const repo = sampleRepo();
    const report = applyDocument(repo, {
      configurations: [{ type: 'odd', operation: 'delete', data: { name: 'Highway' } }],
    });

    expect(report.issues[0]?.message).toBe(
      "Cannot delete ODD 'Highway': 2 assessments depend on it. Use force_delete to override.",
    );

    const forced = applyDocument(repo, {
      configurations: [
        { type: 'odd', operation: 'delete', data: { name: 'Highway' }, force_delete: true },
      ],
    });
    expect(forced.counts.deleted).toBe(1);
    expect(repo.listAssessments()).toHaveLength(1);
  });

  test('TRL levels cannot be deleted, even when forced', () => {
    const repo = sampleRepo();
    const report = applyDocument(repo, {
      configurations: [
        {
          type: 'technical_readiness_level',
          operation: 'delete',
          data: { level: 6 },
          force_delete: true,
        },
      ],
    });

    expect(report.counts).toEqual({ created: 0, updated: 0, deleted: 0, skipped: 0, errored: 1 });
    expect(report.issues).toEqual([
      {
        label: 'Configuration 1',
        severity: 'error',
        code: 'VALIDATION_ERROR',
        message: 'Cannot delete technical readiness levels: they are system-defined',
      },
    ]);
    expect(repo.findReadinessLevel(6)?.level).toBe(6);
    expect(repo.listAssessments()).toHaveLength(3);
  });

  test('flat configuration items are accepted', () => {
    const repo = sampleRepo();
    const report = applyDocument(repo, {
      configurations: [
        { config_type: 'environment', operation: 'update', name: 'Nordic', region: 'Scandinavia' },
      ],
    });

    expect(report.counts.updated).toBe(1);
    expect(report.summary[1]).toBe('1 environment updated, 0 assessments affected');
    expect(repo.findByName('environment', 'Nordic')?.region).toBe('Scandinavia');
  });

  test('duplicate assessment tuples are skipped', () => {
    const repo = sampleRepo();
    const report = applyDocument(repo, {
      assessments: [
        {
          technical_function: 'Lane Keeping',
          vehicle_platform: 'Truck Platform',
          odd: 'Highway',
          environment: 'Nordic',
          trl: 7,
        },
      ],
    });

    expect(report.counts.skipped).toBe(1);
    expect(report.issues[0]?.code).toBe('DUPLICATE');
    expect(repo.listAssessments()).toHaveLength(3);
  });

  test('missing assessment references fail the item', () => {
    const repo = sampleRepo();
    const report = applyDocument(repo, {
      assessments: [
        {
          technical_function: 'Ghost',
          vehicle_platform: 'Truck Platform',
          odd: 'Highway',
          environment: 'Nordic',
          trl: 3,
        },
        {
          technical_function: 'Object Detection',
          vehicle_platform: 'Van Platform',
          odd: 'Highway',
          environment: 'Nordic',
          trailer: 'Lowboy',
          trl: 3,
        },
      ],
    });

    expect(report.counts).toEqual({ created: 1, updated: 0, deleted: 0, skipped: 0, errored: 1 });
    expect(report.issues).toEqual([
      {
        label: 'Assessment 1',
        severity: 'error',
        code: 'NOT_FOUND',
        message: "technical function not found: 'Ghost'",
      },
      {
        label: 'Assessment 2',
        severity: 'warning',
        code: 'NOT_FOUND',
        message: "Referenced trailer 'Lowboy' not found, skipping",
      },
    ]);
    expect(repo.listAssessments().at(-1)?.trailerId).toBeNull();
  });
});

describe('BatchUpdateEngine transactions', () => {
  class FailingLinksRepository extends InMemoryReadinessRepository {
    replaceLinks(): void {
      throw new Error('disk full');
    }
  }

  test('an unexpected error rolls back the whole batch', () => {
    const repo = new FailingLinksRepository();
    seedReferenceData(repo);

    const report = applyDocument(repo, {
      entities: [
        { entity_type: 'technical_function', operation: 'create', name: 'Alpha' },
        {
          entity_type: 'capability',
          operation: 'create',
          name: 'Beta',
          technical_functions: ['Alpha'],
        },
      ],
    });

    expect(report.ok).toBe(false);
    expect(report.exitCode).toBe(1);
    expect(report.fatal).toEqual({ code: 'UNKNOWN_ERROR', message: 'disk full' });
    expect(report.counts).toEqual({ created: 0, updated: 0, deleted: 0, skipped: 0, errored: 0 });
    expect(report.summary).toEqual([
      'Created: 0, Updated: 0, Deleted: 0, Skipped: 0, Errored: 0',
      'Batch rolled back: disk full',
    ]);
    expect(report.issues.at(-1)?.message).toBe('Rolled back: disk full');
    expect(repo.list('technical_function')).toEqual([]);
  });
});

describe('summarizeReport', () => {
  test('lists updated kinds in entity then configuration order', () => {
    expect(
      summarizeReport(
        { created: 0, updated: 4, deleted: 0, skipped: 0, errored: 0 },
        { odd: 1, capability: 2, product_feature: 1 },
        3,
      ),
    ).toEqual([
      'Created: 0, Updated: 4, Deleted: 0, Skipped: 0, Errored: 0',
      '1 product feature updated, 2 capabilities updated, 1 ODD updated, 3 assessments affected',
    ]);
  });

  test('omits the second line when nothing was updated', () => {
    expect(
      summarizeReport({ created: 2, updated: 0, deleted: 0, skipped: 0, errored: 0 }, {}, 0),
    ).toEqual(['Created: 2, Updated: 0, Deleted: 0, Skipped: 0, Errored: 0']);
  });
});
