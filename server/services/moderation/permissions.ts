/**
 * Moderation Inquiry — Role Capabilities
 *
 * Staff roles map onto the capabilities they grant. Unknown roles grant nothing.
 */

import type { Capability, ModeratorIdentity, PermissionCheck } from "./types";

export const ROLE_CAPABILITIES: ReadonlyMap<string, readonly Capability[]> = new Map<string, readonly Capability[]>([
  ["super_admin", ["hunter", "shusher", "admin"]],
  ["admin", ["hunter", "shusher", "admin"]],
  ["hunter", ["hunter"]],
  ["shusher", ["shusher"]],
]);

export const hasCapability = (mod: ModeratorIdentity, capability: Capability): boolean =>
  mod.roles.some((role) => ROLE_CAPABILITIES.get(role)?.includes(capability) ?? false);

/** Permission check backed by {@link ROLE_CAPABILITIES} */
export const roleGrants: PermissionCheck = {
  can: hasCapability,
};
