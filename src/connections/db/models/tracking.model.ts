// QC and outbound records, joined to orders by tracking value only

export interface QcRecord {
  id: number;
  tracking: string; // unique within its table
  qc_by: number | null;
  created_at: Date;
}

export interface OutboundRecord {
  id: number;
  tracking: string; // unique
  outbound_by: number | null;
  expedition: string;
  expedition_color: string;
  created_at: Date;
}

export interface Operator {
  id: number;
  username: string;
  full_name: string;
}
