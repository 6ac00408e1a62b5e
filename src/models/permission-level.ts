/**
 * Permission levels of family members.
 */

import { InvalidArgumentError } from "../error/index.js";

export const USER_PERMISSION_LEVELS = ["primary", "adult", "child"] as const;

/**
 * Permission level, from most to least privileged.
 *
 * - `primary`: the family's administrator; manages members and settings
 * - `adult`: full access to family features
 * - `child`: restricted access
 */
export type UserPermissionLevel = (typeof USER_PERMISSION_LEVELS)[number];

export function isPermissionLevel(value: string): value is UserPermissionLevel {
  return USER_PERMISSION_LEVELS.some((level) => level === value);
}

/**
 * Parse a permission level, ignoring case.
 * @throws {InvalidArgumentError} For anything but primary, adult or child
 */
export function parsePermissionLevel(value: string): UserPermissionLevel {
  const normalized = value.toLowerCase();
  if (!isPermissionLevel(normalized)) {
    throw new InvalidArgumentError(
      `Invalid permission level: ${value}. Valid values are: ${USER_PERMISSION_LEVELS.join(", ")}`,
      { argumentName: "permissionLevel" }
    );
  }
  return normalized;
}

export function isAdminLevel(level: UserPermissionLevel): boolean {
  return level === "primary";
}

export function isAdultLevel(level: UserPermissionLevel): boolean {
  return level === "primary" || level === "adult";
}

export function canManageUsers(level: UserPermissionLevel): boolean {
  return level === "primary";
}

export function canModifyFamilySettings(level: UserPermissionLevel): boolean {
  return level === "primary";
}

/**
 * Check whether `level` is at least as privileged as `other`.
 */
export function hasAuthorityOver(level: UserPermissionLevel, other: UserPermissionLevel): boolean {
  return USER_PERMISSION_LEVELS.indexOf(level) <= USER_PERMISSION_LEVELS.indexOf(other);
}
