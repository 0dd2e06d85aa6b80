/**
 * RBAC Type Definitions
 *
 * @module rbac/types
 */

export const ROLES = ["admin", "expert_reviewer", "user", "public"] as const;

export type Role = (typeof ROLES)[number];

export const PERMISSIONS = [
  "create:simulation",
  "read:simulation",
  "update:simulation",
  "delete:simulation",
  "run:simulation",
  "create:scenario",
  "read:scenario",
  "update:scenario",
  "delete:scenario",
  "manage:users",
  "manage:roles",
  "view:audit_log",
  "manage:system",
  "view:analytics",
  "export:data",
  "import:data",
  "access:real_data",
] as const;

export type Permission = (typeof PERMISSIONS)[number];

/**
 * Static role to permission table
 */
export type RolePermissionTable = Record<Role, ReadonlySet<Permission>>;

/**
 * What a guarded operation requires; any single match grants access
 */
export interface AccessRequirement {
  permissions?: readonly Permission[];
  roles?: readonly Role[];
}

/**
 * Caller identity as far as authorization is concerned
 */
export interface AuthorizationSubject {
  subjectId?: string;
  roles: readonly string[];
}
