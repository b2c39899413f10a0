
/**
 * Role Name Constants
 */
export const ROLE = {
  SUPERADMIN: 'superadmin',
  COORDINATOR: 'coordinator',
  ADMIN: 'admin',
  ADMIN_RETUR: 'admin-retur',
  FINANCE: 'finance',
  PICKER: 'picker',
  OUTBOUND: 'outbound',
  QC_RIBBON: 'qc-ribbon',
  QC_ONLINE: 'qc-online',
  MB_RIBBON: 'mb-ribbon',
  MB_ONLINE: 'mb-online',
  PACKING: 'packing',
  GUEST: 'guest',
} as const;

export type RoleName = typeof ROLE[keyof typeof ROLE];

/**
 * Default rank per role. Higher rank manages lower rank.
 * Loaded into a RoleHierarchy once at start-up (see roleConfig).
 */
export const DEFAULT_ROLE_HIERARCHY: Readonly<Record<string, number>> = {
  [ROLE.SUPERADMIN]: 9,
  [ROLE.COORDINATOR]: 4,
  [ROLE.ADMIN]: 3,
  [ROLE.ADMIN_RETUR]: 3,
  [ROLE.FINANCE]: 3,
  [ROLE.PICKER]: 2,
  [ROLE.OUTBOUND]: 2,
  [ROLE.QC_RIBBON]: 2,
  [ROLE.QC_ONLINE]: 2,
  [ROLE.MB_RIBBON]: 2,
  [ROLE.MB_ONLINE]: 2,
  [ROLE.PACKING]: 2,
  [ROLE.GUEST]: 1,
};

/**
 * Role given to new users created without an initial role
 */
export const DEFAULT_USER_ROLE = ROLE.GUEST;

/**
 * Role groups used by route guards
 */
export const COORDINATOR_ROLES = [ROLE.SUPERADMIN, ROLE.COORDINATOR];
export const ADMIN_ROLES = [ROLE.SUPERADMIN, ROLE.ADMIN];
