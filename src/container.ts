import { appConfig, roleConfig } from './connections/config/app.config';
import { DataSource } from './connections/db/repositories/types';
import { RoleHierarchy } from './modules/auth/role-hierarchy';
import { AuthorizationGuard } from './modules/auth/authorization.guard';
import { AuthService, AuthTokenConfig } from './modules/auth/auth.service';
import { OrderFulfillmentService } from './modules/orders/orders.service';
import { UserManagerService } from './modules/user-manager/user-manager.service';
import { FlowService } from './modules/flows/flows.service';

export interface Services {
  guard: AuthorizationGuard;
  auth: AuthService;
  orders: OrderFulfillmentService;
  userManager: UserManagerService;
  flows: FlowService;
}

export interface ServiceOptions {
  roleHierarchy?: Readonly<Record<string, number>>;
  tokens?: AuthTokenConfig;
  bcryptRounds?: number;
}

/**
 * Builds every service over one DataSource. The role hierarchy is created
 * once here and shared by reference.
 */
export const createServices = (dataSource: DataSource, options: ServiceOptions = {}): Services => {
  const hierarchy = new RoleHierarchy(options.roleHierarchy ?? roleConfig.hierarchy);
  const guard = new AuthorizationGuard(hierarchy);

  const auth = new AuthService(dataSource, guard, options.tokens ?? {
    secret: appConfig.jwtSecret,
    expiresIn: appConfig.jwtExpiresIn,
    refreshExpiresIn: appConfig.jwtRefreshExpiresIn,
  });

  return {
    guard,
    auth,
    orders: new OrderFulfillmentService(dataSource, guard, auth),
    userManager: new UserManagerService(dataSource, guard, options.bcryptRounds ?? appConfig.bcryptRounds),
    flows: new FlowService(dataSource),
  };
};
