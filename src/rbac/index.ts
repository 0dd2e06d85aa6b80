/**
 * RBAC Module
 *
 * @module rbac
 */

export { ROLES, PERMISSIONS } from "./types.js";
export type {
  Role,
  Permission,
  RolePermissionTable,
  AccessRequirement,
  AuthorizationSubject,
} from "./types.js";
export { RoleSchema, PermissionSchema } from "./validation.js";
export {
  Rbac,
  DEFAULT_ROLE_PERMISSIONS_PATH,
  loadRolePermissionTable,
  parseRolePermissionTable,
  isRole,
} from "./rbac.js";
