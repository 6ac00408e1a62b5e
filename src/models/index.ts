/**
 * Domain entities stored in Firestore.
 */

export * from "./permission-level.js";
export * from "./user.js";
export * from "./family.js";
