import { MigrationInfo } from './types';

// Import all migrations
import * as migration001 from './20260301_000001_create_users_table';
import * as migration002 from './20260301_000002_create_roles_table';
import * as migration003 from './20260301_000003_create_user_roles_table';
import * as migration004 from './20260301_000004_create_products_table';
import * as migration005 from './20260301_000005_create_orders_table';
import * as migration006 from './20260301_000006_create_order_details_table';
import * as migration007 from './20260301_000007_create_picked_orders_table';
import * as migration008 from './20260301_000008_create_qc_tables';
import * as migration009 from './20260301_000009_create_outbounds_table';

export const migrations: MigrationInfo[] = [
  { name: '20260301_000001_create_users_table', migration: migration001.migration },
  { name: '20260301_000002_create_roles_table', migration: migration002.migration },
  { name: '20260301_000003_create_user_roles_table', migration: migration003.migration },
  { name: '20260301_000004_create_products_table', migration: migration004.migration },
  { name: '20260301_000005_create_orders_table', migration: migration005.migration },
  { name: '20260301_000006_create_order_details_table', migration: migration006.migration },
  { name: '20260301_000007_create_picked_orders_table', migration: migration007.migration },
  { name: '20260301_000008_create_qc_tables', migration: migration008.migration },
  { name: '20260301_000009_create_outbounds_table', migration: migration009.migration },
];
