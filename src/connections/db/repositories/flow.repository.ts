import { FLOW_ANCHOR_TABLE, FlowType } from '../../../constants/flow.constants';
import { Operator } from '../models/tracking.model';
import { FlowRepository, OutboundEntry, QcStageEntry, Queryable, TrackingFilter } from './types';

interface OperatorColumns {
  operator_id: number | null;
  operator_username: string | null;
  operator_full_name: string | null;
}

interface QcRow extends OperatorColumns {
  id: number;
  tracking: string;
  qc_by: number | null;
  created_at: Date;
}

interface OutboundRow extends OperatorColumns {
  id: number;
  tracking: string;
  outbound_by: number | null;
  expedition: string;
  expedition_color: string;
  created_at: Date;
}

const toOperator = (row: OperatorColumns): Operator | null => {
  if (row.operator_id === null) {
    return null;
  }
  return {
    id: row.operator_id,
    username: row.operator_username ?? '',
    full_name: row.operator_full_name ?? '',
  };
};

export class PgFlowRepository implements FlowRepository {
  constructor(private readonly db: Queryable) {}

  async findQcEntry(type: FlowType, tracking: string): Promise<QcStageEntry | null> {
    // Table name comes from a fixed map, never from input
    const table = FLOW_ANCHOR_TABLE[type];
    const result = await this.db.query<QcRow>(
      `SELECT q.id, q.tracking, q.qc_by, q.created_at,
              u.id AS operator_id, u.username AS operator_username, u.full_name AS operator_full_name
       FROM ${table} q
       LEFT JOIN users u ON u.id = q.qc_by
       WHERE q.tracking = $1
       ORDER BY q.id ASC
       LIMIT 1`,
      [tracking]
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      record: { id: row.id, tracking: row.tracking, qc_by: row.qc_by, created_at: row.created_at },
      operator: toOperator(row),
    };
  }

  async findOutboundEntry(tracking: string): Promise<OutboundEntry | null> {
    const result = await this.db.query<OutboundRow>(
      `SELECT o.id, o.tracking, o.outbound_by, o.expedition, o.expedition_color, o.created_at,
              u.id AS operator_id, u.username AS operator_username, u.full_name AS operator_full_name
       FROM outbounds o
       LEFT JOIN users u ON u.id = o.outbound_by
       WHERE o.tracking = $1
       ORDER BY o.id ASC
       LIMIT 1`,
      [tracking]
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      record: {
        id: row.id,
        tracking: row.tracking,
        outbound_by: row.outbound_by,
        expedition: row.expedition,
        expedition_color: row.expedition_color,
        created_at: row.created_at,
      },
      operator: toOperator(row),
    };
  }

  async listTrackings(
    type: FlowType,
    filter: TrackingFilter,
    limit: number,
    offset: number
  ): Promise<{ trackings: string[]; total: number }> {
    const table = FLOW_ANCHOR_TABLE[type];
    const conditions: string[] = ["tracking IS NOT NULL", "tracking <> ''"];
    const values: unknown[] = [];

    if (filter.from) {
      values.push(filter.from);
      conditions.push(`created_at >= $${values.length}`);
    }
    if (filter.before) {
      values.push(filter.before);
      conditions.push(`created_at < $${values.length}`);
    }
    if (filter.search) {
      values.push(`%${filter.search}%`);
      conditions.push(`tracking ILIKE $${values.length}`);
    }

    const whereClause = conditions.join(' AND ');

    const countResult = await this.db.query<{ total: string }>(
      `SELECT COUNT(DISTINCT tracking) AS total FROM ${table} WHERE ${whereClause}`,
      values
    );

    const pageValues = [...values, limit, offset];
    const pageResult = await this.db.query<{ tracking: string }>(
      `SELECT DISTINCT tracking FROM ${table}
       WHERE ${whereClause}
       ORDER BY tracking ASC
       LIMIT $${values.length + 1} OFFSET $${values.length + 2}`,
      pageValues
    );

    return {
      trackings: pageResult.rows.map(row => row.tracking),
      // COUNT comes back as a bigint string
      total: parseInt(countResult.rows[0]?.total ?? '0', 10),
    };
  }
}
