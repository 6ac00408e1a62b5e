/**
 * Firestore-backed user repository.
 */

import type { DocumentStore } from "../client/index.js";
import type { Logger } from "../logging/index.js";
import { userFromDocument, userToDocument } from "../models/index.js";
import type { User } from "../models/index.js";
import { FirestoreEntityRepository } from "./base.js";
import type { PageOptions, UserRepository } from "./types.js";

export const USERS_COLLECTION = "users";

export class FirestoreUserRepository extends FirestoreEntityRepository<User> implements UserRepository {
  constructor(store: DocumentStore, logger?: Logger) {
    super(
      store,
      {
        collection: USERS_COLLECTION,
        entityName: "User",
        toDocument: userToDocument,
        fromDocument: userFromDocument,
        describe: (user) => ({
          userId: user.id,
          familyId: user.familyId,
          permissionLevel: user.permissionLevel,
        }),
      },
      logger
    );
  }

  /**
   * Members of a family.
   */
  findByFamilyId(familyId: string, options?: PageOptions): Promise<User[]> {
    return this.findWhere({ familyId }, options);
  }
}
