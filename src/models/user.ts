/**
 * User entity and its document mapping.
 */

import { z } from "zod";
import type { DocumentData } from "../types/index.js";
import { isPermissionLevel } from "./permission-level.js";
import type { UserPermissionLevel } from "./permission-level.js";
import { optionalStringSchema, optionalTimestampSchema, parseModel, timestampSchema } from "./schema.js";

/**
 * A family member.
 */
export interface User {
  id: string;
  displayName: string;
  familyId: string;
  permissionLevel: UserPermissionLevel;
  createdAt: Date;
  updatedAt?: Date;
  profileImageUrl?: string;
}

const permissionLevelSchema = z.string().transform((value, ctx): UserPermissionLevel => {
  const normalized = value.toLowerCase();
  if (!isPermissionLevel(normalized)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid permission level: ${value}`,
    });
    return z.NEVER;
  }
  return normalized;
});

const UserDocumentSchema = z.object({
  id: z.string().min(1, "Missing or empty required field: id"),
  displayName: z.string().min(1, "Missing or empty required field: displayName"),
  familyId: z.string().min(1, "Missing or empty required field: familyId"),
  permissionLevel: permissionLevelSchema,
  createdAt: timestampSchema,
  updatedAt: optionalTimestampSchema,
  profileImageUrl: optionalStringSchema,
});

/**
 * Convert a user to its stored form. Dates become timestamps; unset
 * optionals are left out.
 */
export function userToDocument(user: User): DocumentData {
  const document: DocumentData = {
    id: user.id,
    displayName: user.displayName,
    familyId: user.familyId,
    permissionLevel: user.permissionLevel,
    createdAt: user.createdAt,
  };
  if (user.updatedAt) {
    document.updatedAt = user.updatedAt;
  }
  if (user.profileImageUrl !== undefined) {
    document.profileImageUrl = user.profileImageUrl;
  }
  return document;
}

/**
 * Read a user from a stored document.
 * @throws {ModelParseError} If a required field is missing or malformed
 */
export function userFromDocument(document: DocumentData): User {
  const parsed = parseModel("User", UserDocumentSchema, document);
  const user: User = {
    id: parsed.id,
    displayName: parsed.displayName,
    familyId: parsed.familyId,
    permissionLevel: parsed.permissionLevel,
    createdAt: parsed.createdAt,
  };
  if (parsed.updatedAt) {
    user.updatedAt = parsed.updatedAt;
  }
  if (parsed.profileImageUrl !== undefined) {
    user.profileImageUrl = parsed.profileImageUrl;
  }
  return user;
}
