import express, { RequestHandler } from 'express';
import { FlowsController } from './flows.controller';

/**
 * Mounted once per flow family, e.g. /ribbons + "ribbon-flows".
 */
export const createFlowsRoutes = (controller: FlowsController, authenticate: RequestHandler, segment: string) => {
  const router = express.Router();

  router.use(authenticate);

  router.get(`/${segment}`, controller.listFlows);
  router.get(`/${segment}/:tracking`, controller.getFlow);

  return router;
};
