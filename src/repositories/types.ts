/**
 * Repository contracts for the domain entities.
 */

import type { Family, User } from "../models/index.js";

/**
 * Pagination of a `findBy*` query.
 */
export interface PageOptions {
  limit?: number;
  offset?: number;
}

export interface UserRepository {
  /**
   * @throws {ConflictError} If a user with the same ID exists
   */
  create(user: User): Promise<User>;
  findById(id: string): Promise<User | null>;
  findByFamilyId(familyId: string, options?: PageOptions): Promise<User[]>;
  /**
   * @throws {EntityNotFoundError} If the user does not exist
   */
  update(user: User): Promise<User>;
  /**
   * @throws {EntityNotFoundError} If the user does not exist
   */
  delete(id: string): Promise<void>;
  exists(id: string): Promise<boolean>;
}

export interface FamilyRepository {
  /**
   * @throws {ConflictError} If a family with the same ID exists
   */
  create(family: Family): Promise<Family>;
  findById(id: string): Promise<Family | null>;
  findByPrimaryUserId(primaryUserId: string, options?: PageOptions): Promise<Family[]>;
  /**
   * @throws {EntityNotFoundError} If the family does not exist
   */
  update(family: Family): Promise<Family>;
  /**
   * @throws {EntityNotFoundError} If the family does not exist
   */
  delete(id: string): Promise<void>;
  exists(id: string): Promise<boolean>;
}
