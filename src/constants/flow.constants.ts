
/**
 * Flow types and the QC table that anchors each of them
 */
export const FLOW_TYPE = {
  RIBBON: 'ribbon',
  ONLINE: 'online',
} as const;

export type FlowType = typeof FLOW_TYPE[keyof typeof FLOW_TYPE];

export const FLOW_ANCHOR_TABLE: Readonly<Record<FlowType, string>> = {
  [FLOW_TYPE.RIBBON]: 'qc_ribbons',
  [FLOW_TYPE.ONLINE]: 'qc_onlines',
};
