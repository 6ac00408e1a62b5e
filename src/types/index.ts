/**
 * Type definitions for the Firestore REST document store.
 */

// Generic document types
export * from "./document.js";

// Wire format types
export * from "./wire.js";

// Query types
export * from "./query.js";
