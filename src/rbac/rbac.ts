/**
 * Role-Based Access Control
 *
 * Permissions come only from role membership through a static table; a
 * subject's effective permissions are the union over its roles. Role
 * changes are the only mutable authorization surface and are audited.
 *
 * @module rbac/rbac
 */

import { fileURLToPath } from "node:url";
import type { Logger } from "pino";
import type {
  AccessRequirement,
  AuthorizationSubject,
  Permission,
  Role,
  RolePermissionTable,
} from "./types.js";
import { ROLES } from "./types.js";
import { RolePermissionFileSchema } from "./validation.js";
import { AuthorizationError, ValidationError } from "../errors.js";
import { getComponentLogger } from "../logging/index.js";
import { AuditEvents } from "../logging/audit-events.js";
import type { AuditLogger, AuditOrigin } from "../logging/audit-types.js";
import { readJsonFile } from "../utils/json-file.js";

/** Role file shipped next to this module */
export const DEFAULT_ROLE_PERMISSIONS_PATH = fileURLToPath(
  new URL("./role-permissions.json", import.meta.url)
);

/**
 * Read and validate a role file
 *
 * @throws {ZodError} When the file does not match the role schema
 */
export async function loadRolePermissionTable(
  filePath: string = DEFAULT_ROLE_PERMISSIONS_PATH
): Promise<RolePermissionTable> {
  const raw = await readJsonFile(filePath);
  if (raw === undefined) {
    throw new Error(`Role permission file not found: ${filePath}`);
  }
  return parseRolePermissionTable(raw);
}

/**
 * Build the lookup table from parsed role file contents
 */
export function parseRolePermissionTable(raw: unknown): RolePermissionTable {
  const parsed = RolePermissionFileSchema.parse(raw);
  return {
    admin: new Set(parsed.admin),
    expert_reviewer: new Set(parsed.expert_reviewer),
    user: new Set(parsed.user),
    public: new Set(parsed.public),
  };
}

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

export class Rbac {
  private _logger: Logger | null = null;

  constructor(
    private readonly audit: AuditLogger,
    private readonly table: RolePermissionTable
  ) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("rbac");
    }
    return this._logger;
  }

  /**
   * Whether any of `roles` grants `permission`; unknown roles grant nothing
   */
  hasPermission(roles: readonly string[], permission: Permission): boolean {
    return roles.some((role) => isRole(role) && this.table[role].has(permission));
  }

  /**
   * Union of permissions across `roles`
   */
  getPermissions(roles: readonly string[]): Set<Permission> {
    const permissions = new Set<Permission>();
    for (const role of roles) {
      if (isRole(role)) {
        for (const permission of this.table[role]) {
          permissions.add(permission);
        }
      }
    }
    return permissions;
  }

  /**
   * Whether `roles` includes any of `required`
   */
  hasRole(roles: readonly string[], required: Role | readonly Role[]): boolean {
    const wanted: readonly Role[] = typeof required === "string" ? [required] : required;
    return roles.some((role) => wanted.some((candidate) => candidate === role));
  }

  validateRole(role: string): role is Role {
    return isRole(role);
  }

  /**
   * Check a requirement without side effects
   *
   * Access is granted when ANY listed permission or ANY listed role
   * matches. An empty requirement always passes.
   */
  isAllowed(subject: AuthorizationSubject, requirement: AccessRequirement): boolean {
    const permissions = requirement.permissions ?? [];
    const roles = requirement.roles ?? [];
    if (permissions.length === 0 && roles.length === 0) {
      return true;
    }
    return (
      permissions.some((permission) => this.hasPermission(subject.roles, permission)) ||
      (roles.length > 0 && this.hasRole(subject.roles, roles))
    );
  }

  /**
   * Enforce a requirement for `resource`
   *
   * @throws {AuthorizationError} With an unauthorized-access audit entry
   */
  enforce(
    subject: AuthorizationSubject,
    requirement: AccessRequirement,
    resource: string,
    origin?: AuditOrigin
  ): void {
    if (this.isAllowed(subject, requirement)) {
      return;
    }

    const required = [...(requirement.permissions ?? []), ...(requirement.roles ?? [])];
    const reason = `requires one of [${required.join(", ")}]`;
    this.audit.emit(AuditEvents.unauthorizedAccess(resource, reason, subject.subjectId, origin));
    this.logger.info(
      { subjectId: subject.subjectId, resource, roles: subject.roles, required },
      "Authorization denied"
    );
    throw new AuthorizationError(`Insufficient permissions for ${resource}`, required);
  }

  /**
   * Validate and audit a role change
   *
   * @returns The new role list, deduplicated
   * @throws {ValidationError} If any new role is unknown
   */
  changeRoles(
    subjectId: string,
    oldRoles: readonly string[],
    newRoles: readonly string[],
    changedBy: string
  ): Role[] {
    const invalid = newRoles.filter((role) => !isRole(role));
    if (invalid.length > 0) {
      throw new ValidationError(`Unknown roles: ${invalid.join(", ")}`, "INVALID_ROLE");
    }

    const normalized = [...new Set(newRoles.filter(isRole))];
    this.audit.emit(AuditEvents.roleChanged(subjectId, oldRoles, normalized, changedBy));
    this.logger.info({ subjectId, oldRoles, newRoles: normalized, changedBy }, "Roles changed");
    return normalized;
  }
}
