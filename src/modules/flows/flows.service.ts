import { FlowType } from '../../constants/flow.constants';
import { Operator } from '../../connections/db/models/tracking.model';
import { DataSource } from '../../connections/db/repositories/types';
import { NotFoundError } from '../../utils/errors';

export interface QcSection {
  operator: Operator | null;
  created_at: Date;
}

export interface OutboundSection {
  operator: Operator | null;
  expedition: string;
  expedition_color: string;
  created_at: Date;
}

export interface OrderSection {
  tracking: string;
  order_ginee_id: string;
  complained: boolean;
  created_at: Date;
}

/**
 * Everything known about one tracking value, in stage order qc -> outbound -> order.
 * A section is absent when that stage has no record.
 */
export interface FlowSnapshot {
  tracking: string;
  qc?: QcSection;
  outbound?: OutboundSection;
  order?: OrderSection;
}

export interface FlowListFilter {
  startDate?: Date;
  endDate?: Date;
  search?: string;
}

export interface FlowListResult {
  flows: FlowSnapshot[];
  total: number;
}

const startOfDay = (date: Date, dayOffset = 0): Date =>
  new Date(date.getFullYear(), date.getMonth(), date.getDate() + dayOffset);

/**
 * Reconstructs cross-stage flows by tracking. The QC family is the anchor:
 * listing and date filtering only ever look at QC records.
 */
export class FlowService {
  constructor(private readonly dataSource: DataSource) {}

  private async buildSnapshot(type: FlowType, tracking: string): Promise<FlowSnapshot> {
    const { flows, orders } = this.dataSource.repositories;
    const [qc, outbound, order] = await Promise.all([
      flows.findQcEntry(type, tracking),
      flows.findOutboundEntry(tracking),
      orders.findByTracking(tracking),
    ]);

    const snapshot: FlowSnapshot = { tracking };
    if (qc) {
      snapshot.qc = { operator: qc.operator, created_at: qc.record.created_at };
    }
    if (outbound) {
      snapshot.outbound = {
        operator: outbound.operator,
        expedition: outbound.record.expedition,
        expedition_color: outbound.record.expedition_color,
        created_at: outbound.record.created_at,
      };
    }
    if (order) {
      snapshot.order = {
        tracking: order.tracking,
        order_ginee_id: order.order_ginee_id,
        complained: order.complained,
        created_at: order.created_at,
      };
    }
    return snapshot;
  }

  async reconstructFlow(type: FlowType, tracking: string): Promise<FlowSnapshot> {
    const snapshot = await this.buildSnapshot(type, tracking);
    if (!snapshot.qc) {
      throw new NotFoundError('Tracking not found', { type, tracking });
    }
    return snapshot;
  }

  /**
   * Dates are whole days: startDate from 00:00, endDate through the end of
   * that day (exclusive bound at the next midnight).
   */
  async listFlows(type: FlowType, filter: FlowListFilter, page: number, limit: number): Promise<FlowListResult> {
    const offset = (page - 1) * limit;
    const { trackings, total } = await this.dataSource.repositories.flows.listTrackings(
      type,
      {
        from: filter.startDate ? startOfDay(filter.startDate) : undefined,
        before: filter.endDate ? startOfDay(filter.endDate, 1) : undefined,
        search: filter.search,
      },
      limit,
      offset
    );

    const flows: FlowSnapshot[] = [];
    for (const tracking of trackings) {
      flows.push(await this.buildSnapshot(type, tracking));
    }
    return { flows, total };
  }
}
