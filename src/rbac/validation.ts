/**
 * RBAC Validation Schemas
 *
 * @module rbac/validation
 */

import { z } from "zod";
import { PERMISSIONS, ROLES } from "./types.js";

export const RoleSchema = z.enum(ROLES);

export const PermissionSchema = z.enum(PERMISSIONS);

/**
 * Role table file: every role must be present
 */
export const RolePermissionFileSchema = z.object({
  admin: z.array(PermissionSchema),
  expert_reviewer: z.array(PermissionSchema),
  user: z.array(PermissionSchema),
  public: z.array(PermissionSchema),
});
