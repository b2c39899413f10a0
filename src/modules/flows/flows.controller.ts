import { Request, Response } from 'express';
import { FlowType } from '../../constants/flow.constants';
import { ResponseHandler } from '../../utils/response';
import { FlowService } from './flows.service';
import { listFlowsQuerySchema, trackingParamSchema } from './flows.validation';

export const createFlowsController = (flows: FlowService, type: FlowType) => {
  const listFlows = async (req: Request, res: Response) => {
    try {
      const { page, limit, start_date, end_date, search } = listFlowsQuerySchema.parse(req.query);
      const result = await flows.listFlows(
        type,
        { startDate: start_date, endDate: end_date, search: search || undefined },
        page,
        limit
      );
      return ResponseHandler.paginated(res, result.flows, { page, limit, total: result.total }, `${type} flows retrieved successfully`);
    } catch (error) {
      return ResponseHandler.fromError(res, error, `Failed to retrieve ${type} flows`);
    }
  };

  const getFlow = async (req: Request, res: Response) => {
    try {
      const { tracking } = trackingParamSchema.parse(req.params);
      const flow = await flows.reconstructFlow(type, tracking);
      return ResponseHandler.success(res, flow, `${type} flow retrieved successfully`);
    } catch (error) {
      return ResponseHandler.fromError(res, error, `Failed to retrieve ${type} flow`);
    }
  };

  return { listFlows, getFlow };
};

export type FlowsController = ReturnType<typeof createFlowsController>;
