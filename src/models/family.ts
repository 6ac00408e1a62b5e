/**
 * Family entity, its settings, and their document mapping.
 */

import { z } from "zod";
import { InvalidArgumentError } from "../error/index.js";
import type { DocumentData } from "../types/index.js";
import { integerSchema, optionalTimestampSchema, parseModel, timestampSchema } from "./schema.js";

export const MIN_FAMILY_MEMBERS = 1;
export const MAX_FAMILY_MEMBERS = 50;

/**
 * Family-wide preferences.
 */
export interface FamilySettings {
  timezone: string;
  allowChildRegistration: boolean;
  requireTaskApproval: boolean;
  enableNotifications: boolean;
  allowGuestAccess: boolean;
  /** 1 to 50 */
  maxFamilyMembers: number;
  defaultChildPermissions: string[];
  enableLocationSharing: boolean;
  requireParentalApproval: boolean;
}

export const DEFAULT_FAMILY_SETTINGS: Readonly<FamilySettings> = {
  timezone: "UTC",
  allowChildRegistration: true,
  requireTaskApproval: false,
  enableNotifications: true,
  allowGuestAccess: false,
  maxFamilyMembers: 10,
  defaultChildPermissions: [],
  enableLocationSharing: false,
  requireParentalApproval: true,
};

/**
 * A family group.
 */
export interface Family {
  id: string;
  name: string;
  primaryUserId: string;
  settings: FamilySettings;
  createdAt: Date;
  updatedAt?: Date;
}

/**
 * Settings with defaults for everything not given.
 * @throws {InvalidArgumentError} If maxFamilyMembers is outside 1..50
 */
export function createFamilySettings(overrides: Partial<FamilySettings> = {}): FamilySettings {
  const settings: FamilySettings = {
    ...DEFAULT_FAMILY_SETTINGS,
    defaultChildPermissions: [...DEFAULT_FAMILY_SETTINGS.defaultChildPermissions],
    ...overrides,
  };
  const max = settings.maxFamilyMembers;
  if (!Number.isInteger(max) || max < MIN_FAMILY_MEMBERS || max > MAX_FAMILY_MEMBERS) {
    throw new InvalidArgumentError(
      `maxFamilyMembers must be an integer between ${MIN_FAMILY_MEMBERS} and ${MAX_FAMILY_MEMBERS}`,
      { argumentName: "maxFamilyMembers" }
    );
  }
  return settings;
}

const FamilySettingsSchema = z.object({
  timezone: z.string().default(DEFAULT_FAMILY_SETTINGS.timezone),
  allowChildRegistration: z.boolean().default(DEFAULT_FAMILY_SETTINGS.allowChildRegistration),
  requireTaskApproval: z.boolean().default(DEFAULT_FAMILY_SETTINGS.requireTaskApproval),
  enableNotifications: z.boolean().default(DEFAULT_FAMILY_SETTINGS.enableNotifications),
  allowGuestAccess: z.boolean().default(DEFAULT_FAMILY_SETTINGS.allowGuestAccess),
  maxFamilyMembers: integerSchema
    .pipe(
      z
        .number()
        .min(MIN_FAMILY_MEMBERS, `maxFamilyMembers must be at least ${MIN_FAMILY_MEMBERS}`)
        .max(MAX_FAMILY_MEMBERS, `maxFamilyMembers cannot exceed ${MAX_FAMILY_MEMBERS}`)
    )
    .default(DEFAULT_FAMILY_SETTINGS.maxFamilyMembers),
  defaultChildPermissions: z.array(z.string()).default(() => []),
  enableLocationSharing: z.boolean().default(DEFAULT_FAMILY_SETTINGS.enableLocationSharing),
  requireParentalApproval: z.boolean().default(DEFAULT_FAMILY_SETTINGS.requireParentalApproval),
});

const FamilyDocumentSchema = z.object({
  id: z.string().min(1, "Missing or empty required field: id"),
  name: z.string().min(1, "Missing or empty required field: name"),
  primaryUserId: z.string().min(1, "Missing or empty required field: primaryUserId"),
  settings: FamilySettingsSchema.default({}),
  createdAt: timestampSchema,
  updatedAt: optionalTimestampSchema,
});

/**
 * Convert settings to a map value. maxFamilyMembers is stored as an integer.
 */
export function familySettingsToDocument(settings: FamilySettings): DocumentData {
  return {
    timezone: settings.timezone,
    allowChildRegistration: settings.allowChildRegistration,
    requireTaskApproval: settings.requireTaskApproval,
    enableNotifications: settings.enableNotifications,
    allowGuestAccess: settings.allowGuestAccess,
    maxFamilyMembers: BigInt(settings.maxFamilyMembers),
    defaultChildPermissions: [...settings.defaultChildPermissions],
    enableLocationSharing: settings.enableLocationSharing,
    requireParentalApproval: settings.requireParentalApproval,
  };
}

/**
 * Convert a family to its stored form.
 */
export function familyToDocument(family: Family): DocumentData {
  const document: DocumentData = {
    id: family.id,
    name: family.name,
    primaryUserId: family.primaryUserId,
    settings: familySettingsToDocument(family.settings),
    createdAt: family.createdAt,
  };
  if (family.updatedAt) {
    document.updatedAt = family.updatedAt;
  }
  return document;
}

/**
 * Read a family from a stored document. Missing settings take their defaults.
 * @throws {ModelParseError} If a required field is missing or malformed
 */
export function familyFromDocument(document: DocumentData): Family {
  const parsed = parseModel("Family", FamilyDocumentSchema, document);
  const family: Family = {
    id: parsed.id,
    name: parsed.name,
    primaryUserId: parsed.primaryUserId,
    settings: parsed.settings,
    createdAt: parsed.createdAt,
  };
  if (parsed.updatedAt) {
    family.updatedAt = parsed.updatedAt;
  }
  return family;
}
