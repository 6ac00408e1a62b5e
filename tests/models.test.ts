import { describe, expect, it } from "vitest";
import {
  canManageUsers,
  canModifyFamilySettings,
  createFamilySettings,
  DEFAULT_FAMILY_SETTINGS,
  familyFromDocument,
  familySettingsToDocument,
  familyToDocument,
  hasAuthorityOver,
  isAdminLevel,
  isAdultLevel,
  parsePermissionLevel,
  userFromDocument,
  userToDocument,
} from "../src/models/index.js";
import type { Family, User } from "../src/models/index.js";
import { InvalidArgumentError, ModelParseError } from "../src/error/index.js";
import { fromWireDocument, toWireDocument } from "../src/transport/wire-convert.js";

const CREATED_AT = new Date("2024-05-01T10:00:00.000Z");

function sampleUser(overrides: Partial<User> = {}): User {
  return {
    id: "u1",
    displayName: "Ada",
    familyId: "f1",
    permissionLevel: "primary",
    createdAt: CREATED_AT,
    ...overrides,
  };
}

function sampleFamily(overrides: Partial<Family> = {}): Family {
  return {
    id: "f1",
    name: "Lovelace",
    primaryUserId: "u1",
    settings: createFamilySettings(),
    createdAt: CREATED_AT,
    ...overrides,
  };
}

describe("permission levels", () => {
  it("parses case-insensitively", () => {
    expect(parsePermissionLevel("ADULT")).toBe("adult");
    expect(parsePermissionLevel("child")).toBe("child");
  });

  it("lists valid values for an unknown level", () => {
    expect(() => parsePermissionLevel("owner")).toThrow(
      new InvalidArgumentError("Invalid permission level: owner. Valid values are: primary, adult, child")
    );
  });

  it("ranks primary over adult over child", () => {
    expect(hasAuthorityOver("primary", "child")).toBe(true);
    expect(hasAuthorityOver("adult", "adult")).toBe(true);
    expect(hasAuthorityOver("child", "adult")).toBe(false);
  });

  it("grants management to the primary member only", () => {
    expect(isAdminLevel("primary")).toBe(true);
    expect(isAdminLevel("adult")).toBe(false);
    expect(isAdultLevel("adult")).toBe(true);
    expect(isAdultLevel("child")).toBe(false);
    expect(canManageUsers("adult")).toBe(false);
    expect(canModifyFamilySettings("primary")).toBe(true);
  });
});

describe("userToDocument", () => {
  it("leaves unset optionals out", () => {
    expect(userToDocument(sampleUser())).toEqual({
      id: "u1",
      displayName: "Ada",
      familyId: "f1",
      permissionLevel: "primary",
      createdAt: CREATED_AT,
    });
  });

  it("includes set optionals", () => {
    const updatedAt = new Date("2024-06-01T00:00:00.000Z");
    const document = userToDocument(sampleUser({ updatedAt, profileImageUrl: "https://img.example.test/a.png" }));
    expect(document.updatedAt).toEqual(updatedAt);
    expect(document.profileImageUrl).toBe("https://img.example.test/a.png");
  });
});

describe("userFromDocument", () => {
  it("reads timestamps from RFC 3339 strings", () => {
    const user = userFromDocument({
      id: "u1",
      displayName: "Ada",
      familyId: "f1",
      permissionLevel: "Adult",
      createdAt: "2024-05-01T10:00:00.000Z",
      updatedAt: null,
    });

    expect(user).toEqual(sampleUser({ permissionLevel: "adult" }));
    expect("updatedAt" in user).toBe(false);
  });

  it("names a missing required field", () => {
    expect(() =>
      userFromDocument({ id: "u1", displayName: "Ada", permissionLevel: "child", createdAt: CREATED_AT })
    ).toThrow(new ModelParseError("User", "familyId: Required"));
  });

  it("rejects an unknown permission level", () => {
    expect(() => userFromDocument({ ...userToDocument(sampleUser()), permissionLevel: "owner" })).toThrow(
      "Failed to parse User from document: permissionLevel: Invalid permission level: owner"
    );
  });

  it("round-trips through the wire format", () => {
    const user = sampleUser({ updatedAt: new Date("2024-06-01T00:00:00.000Z"), profileImageUrl: "https://img.example.test/a.png" });
    expect(userFromDocument(fromWireDocument(toWireDocument(userToDocument(user))))).toEqual(user);
  });
});

describe("family settings", () => {
  it("defaults every setting", () => {
    expect(createFamilySettings()).toEqual(DEFAULT_FAMILY_SETTINGS);
  });

  it("rejects a member limit outside 1..50", () => {
    expect(() => createFamilySettings({ maxFamilyMembers: 51 })).toThrow(
      "maxFamilyMembers must be an integer between 1 and 50"
    );
    expect(() => createFamilySettings({ maxFamilyMembers: 0 })).toThrow(InvalidArgumentError);
    expect(createFamilySettings({ maxFamilyMembers: 50 }).maxFamilyMembers).toBe(50);
  });

  it("stores the member limit as an integer", () => {
    expect(familySettingsToDocument(createFamilySettings()).maxFamilyMembers).toBe(10n);
  });
});

describe("familyFromDocument", () => {
  it("defaults missing settings", () => {
    const family = familyFromDocument({
      id: "f1",
      name: "Lovelace",
      primaryUserId: "u1",
      createdAt: CREATED_AT,
    });
    expect(family.settings).toEqual(DEFAULT_FAMILY_SETTINGS);
  });

  it("defaults each missing setting individually", () => {
    const family = familyFromDocument({
      ...familyToDocument(sampleFamily()),
      settings: { timezone: "Europe/Paris", maxFamilyMembers: 12 },
    });
    expect(family.settings).toEqual({ ...DEFAULT_FAMILY_SETTINGS, timezone: "Europe/Paris", maxFamilyMembers: 12 });
  });

  it("rejects a stored member limit out of range", () => {
    expect(() =>
      familyFromDocument({ ...familyToDocument(sampleFamily()), settings: { maxFamilyMembers: 0n } })
    ).toThrow("Failed to parse Family from document: settings.maxFamilyMembers: maxFamilyMembers must be at least 1");
  });

  it("round-trips through the wire format", () => {
    const family = sampleFamily({
      settings: createFamilySettings({ timezone: "Asia/Tokyo", defaultChildPermissions: ["read"] }),
      updatedAt: new Date("2024-07-01T12:00:00.000Z"),
    });
    expect(familyFromDocument(fromWireDocument(toWireDocument(familyToDocument(family))))).toEqual(family);
  });
});
