import { z } from 'zod';
import { dateOnlySchema, paginationQuerySchema } from '../../utils/validation';

// Validation schemas for the Flows module
export const listFlowsQuerySchema = paginationQuerySchema.extend({
  start_date: dateOnlySchema.optional(),
  end_date: dateOnlySchema.optional(),
  search: z.string().trim().optional(),
});

export const trackingParamSchema = z.object({
  tracking: z.string().trim().min(1, 'tracking is required'),
});
