/**
 * Repositories for the domain entities.
 */

export * from "./types.js";
export { FirestoreEntityRepository } from "./base.js";
export type { EntityMapping } from "./base.js";
export * from "./user-repository.js";
export * from "./family-repository.js";
