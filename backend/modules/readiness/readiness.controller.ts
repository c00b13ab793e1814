import type { Request, Response } from 'express';

import type { EntityType } from '../../readiness/model';
import type { ReadinessRepository } from '../../readiness/ReadinessRepository';
import { mapErrorToApiResponse } from '../../reliability/FailureHandling';
import { telemetry } from '../../telemetry/Telemetry';
import {
  applyBatchDocument,
  createAssessment,
  deleteEntity,
  exportDocument,
  getConfigurations,
  getDashboard,
  getEntity,
  getReadinessData,
  getReadinessMatrix,
  listAssessments,
  listEntities,
  writeEntity,
} from './readiness.service';
import type { AssessmentQuery } from './readiness.types';

type Handler = (req: Request, res: Response) => void;

const parseNumber = (value: unknown): number | undefined => {
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  const num = Number(value);
  return Number.isFinite(num) ? num : undefined;
};

const parseBoolean = (value: unknown): boolean =>
  value === 'true' || value === '1';

const buildAssessmentQuery = (req: Request): AssessmentQuery => ({
  technicalFunctionId: parseNumber(req.query.technical_function_id),
  productFeatureId: parseNumber(req.query.product_feature_id),
  platformId: parseNumber(req.query.platform_id),
  minTrl: parseNumber(req.query.min_trl),
});

const nameParam = (req: Request): string => req.params.name ?? '';

/**
 * Wraps a handler so that thrown errors become `{ success: false, ... }`
 * responses with the status of their error code. Each call is timed under
 * `api.<operation>`.
 */
const respond =
  (operation: string, run: (req: Request) => unknown, status = 200): Handler =>
  (req, res) => {
    try {
      const data = telemetry.time(`api.${operation}`, () => run(req));
      res.status(status).json({ success: true, data });
    } catch (err) {
      const mapped = mapErrorToApiResponse(err, { operation });
      res.status(mapped.status).json(mapped.body);
    }
  };

export const createEntityController = (
  repository: ReadinessRepository,
  entityType: EntityType,
) => ({
  list: respond(`${entityType}.list`, () => listEntities(repository, entityType)),
  get: respond(`${entityType}.get`, (req) =>
    getEntity(repository, entityType, nameParam(req)),
  ),
  create: respond(
    `${entityType}.create`,
    (req) => writeEntity(repository, entityType, 'create', req.body),
    201,
  ),
  update: respond(`${entityType}.update`, (req) =>
    writeEntity(repository, entityType, 'update', req.body, nameParam(req)),
  ),
  remove: respond(`${entityType}.delete`, (req) =>
    deleteEntity(repository, entityType, nameParam(req), parseBoolean(req.query.force)),
  ),
});

export const createReadinessController = (repository: ReadinessRepository) => ({
  dashboard: respond('dashboard', () => getDashboard(repository)),
  listAssessments: respond('assessments.list', (req) =>
    listAssessments(repository, buildAssessmentQuery(req)),
  ),
  createAssessment: respond(
    'assessments.create',
    (req) => createAssessment(repository, req.body),
    201,
  ),
  readinessMatrix: respond('readiness_matrix', () => getReadinessMatrix(repository)),
  configurations: respond('configurations', () => getConfigurations(repository)),
  readinessData: respond('readiness_data', () => getReadinessData(repository)),
  exportDocument: respond('json_editor.export', () => exportDocument(repository)),
  applyDocument: respond('json_editor.apply', (req) =>
    applyBatchDocument(repository, req.body),
  ),
});
