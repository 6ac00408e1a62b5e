/**
 * Firestore-backed family repository.
 */

import type { DocumentStore } from "../client/index.js";
import type { Logger } from "../logging/index.js";
import { familyFromDocument, familyToDocument } from "../models/index.js";
import type { Family } from "../models/index.js";
import { FirestoreEntityRepository } from "./base.js";
import type { FamilyRepository, PageOptions } from "./types.js";

export const FAMILIES_COLLECTION = "families";

export class FirestoreFamilyRepository
  extends FirestoreEntityRepository<Family>
  implements FamilyRepository
{
  constructor(store: DocumentStore, logger?: Logger) {
    super(
      store,
      {
        collection: FAMILIES_COLLECTION,
        entityName: "Family",
        toDocument: familyToDocument,
        fromDocument: familyFromDocument,
        describe: (family) => ({
          familyId: family.id,
          primaryUserId: family.primaryUserId,
        }),
      },
      logger
    );
  }

  /**
   * Families administered by a user.
   */
  findByPrimaryUserId(primaryUserId: string, options?: PageOptions): Promise<Family[]> {
    return this.findWhere({ primaryUserId }, options);
  }
}
