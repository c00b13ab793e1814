import { Router } from 'express';

import type { EntityType } from '../../readiness/model';
import type { ReadinessRepository } from '../../readiness/ReadinessRepository';
import {
  createEntityController,
  createReadinessController,
} from './readiness.controller';

const ENTITY_ROUTES: readonly [path: string, entityType: EntityType][] = [
  ['/product_features', 'product_feature'],
  ['/capabilities', 'capability'],
  ['/technical_functions', 'technical_function'],
  ['/technical_capabilities', 'technical_function'],
];

export const createReadinessRouter = (repository: ReadinessRepository) => {
  const router = Router();
  const readiness = createReadinessController(repository);

  router.get('/', readiness.dashboard);
  router.get('/dashboard', readiness.dashboard);

  for (const [path, entityType] of ENTITY_ROUTES) {
    const entity = createEntityController(repository, entityType);
    router.get(path, entity.list);
    router.post(path, entity.create);
    router.get(`${path}/:name`, entity.get);
    router.patch(`${path}/:name`, entity.update);
    router.delete(`${path}/:name`, entity.remove);
  }

  router.get('/readiness_assessments', readiness.listAssessments);
  router.post('/readiness_assessments', readiness.createAssessment);
  router.get('/readiness_matrix', readiness.readinessMatrix);
  router.get('/configurations', readiness.configurations);
  router.get('/readiness_data', readiness.readinessData);
  router.get('/json_editor', readiness.exportDocument);
  router.post('/json_editor', readiness.applyDocument);

  return router;
};
