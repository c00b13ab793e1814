import { formatCsv } from './csvParser';
import { CSV_BATCH_COLUMNS } from './csvBatchParser';
import { isoDay } from './dateParsing';

/** Example JSON batch exercising every operation kind. */
export function buildJsonTemplate(now = new Date()) {
  return {
    metadata: {
      version: '4.1',
      description: 'Template for updating the readiness database',
      created_by: 'trl-update-json',
      created_date: isoDay(now),
      notes:
        'Entities are matched by name. Link lists replace existing links; an empty list clears them.',
    },
    configurations: [
      {
        type: 'odd',
        operation: 'create',
        data: {
          name: 'Example Highway ODD',
          description: 'Divided highway, daylight',
          max_speed: 90,
          direction: 'forward',
          lanes: 'multi-lane',
        },
      },
      {
        type: 'environment',
        operation: 'create',
        data: { name: 'Example Temperate', region: 'EU', climate: 'temperate', terrain: 'flat' },
      },
      {
        type: 'trailer',
        operation: 'update',
        data: { name: 'Example Trailer', axle_count: 3 },
      },
    ],
    entities: [
      {
        entity_type: 'technical_function',
        operation: 'create',
        name: 'Path Planning',
        description: 'Generate paths for vehicle navigation',
        success_criteria: 'Paths generated within 100ms',
        vehicle_platform_id: 5,
        tmos: 'Real-time path planning',
        progress_relative_to_tmos: 80.0,
        planned_start_date: '2025-01-01',
        planned_end_date: '2025-08-31',
      },
      {
        entity_type: 'technical_function',
        operation: 'create',
        name: 'Lane Detection',
        description: 'Lane boundary detection',
        success_criteria: 'Lane boundaries detected in daylight',
        vehicle_type: 'truck',
        progress_relative_to_tmos: 85.0,
      },
      {
        entity_type: 'capability',
        operation: 'create',
        name: 'Highway Navigation',
        success_criteria: 'Navigate highway routes',
        vehicle_platform_id: 5,
        tmos: 'Complete highway navigation capability',
        progress_relative_to_tmos: 60.0,
        technical_functions: ['Path Planning', 'Lane Detection'],
      },
      {
        entity_type: 'product_feature',
        operation: 'create',
        name: 'Example Product Feature',
        description: 'An example product feature',
        label: 'PF-ADAS-1.1',
        vehicle_platform_id: 5,
        tmos: 'Highway uptime target',
        progress_relative_to_tmos: 75.0,
        active_flag: 'next',
        capabilities: ['Highway Navigation'],
      },
      {
        entity_type: 'capability',
        operation: 'update',
        name: 'Highway Navigation',
        target_trl: 7,
        due_date: '2025-12-31',
        assessor: 'Example Assessor',
        notes: 'Cascades to every assessment of the linked technical functions',
      },
      {
        entity_type: 'technical_function',
        operation: 'delete',
        name: 'Obsolete Technical Function',
        force_delete: false,
      },
    ],
    assessments: [
      {
        technical_function: 'Path Planning',
        vehicle_platform: 'Truck Platform',
        odd: 'Example Highway ODD',
        environment: 'Example Temperate',
        trailer: null,
        trl: 4,
        confidence: 3,
        assessor: 'Example Assessor',
        notes: 'Initial assessment',
      },
    ],
  };
}

export function buildCsvTemplate(): string {
  return formatCsv(CSV_BATCH_COLUMNS, [
    {
      capability_type: 'capability',
      capability_name: 'Highway Navigation',
      due_date: '2025-12-31',
      target_trl: 7,
      assessor: 'Example Assessor',
      notes: 'Quarterly review',
    },
    {
      capability_type: 'product_feature',
      capability_name: 'Example Product Feature',
      due_date: '06/30/2026',
      target_trl: '',
      assessor: '',
      notes: '',
    },
    {
      capability_type: 'technical_function',
      capability_name: 'Path Planning',
      due_date: '',
      target_trl: 6,
      assessor: '',
      notes: 'Cascades to this function only',
    },
  ]);
}
