/**
 * Shared implementation of the Firestore-backed repositories.
 */

import type { DocumentStore } from "../client/index.js";
import {
  ConflictError,
  EntityNotFoundError,
  isConflictError,
  RepositoryError,
} from "../error/index.js";
import { NoopLogger } from "../logging/index.js";
import type { LogContext, Logger } from "../logging/index.js";
import type { DocumentData, EqualityFilters } from "../types/index.js";
import type { PageOptions } from "./types.js";

/**
 * How an entity maps onto a collection.
 */
export interface EntityMapping<T extends { id: string }> {
  /** Collection path */
  collection: string;
  /** Entity name used in messages, e.g. "User" */
  entityName: string;
  toDocument(entity: T): DocumentData;
  fromDocument(document: DocumentData): T;
  /** Log fields describing an entity */
  describe(entity: T): LogContext;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * CRUD over one collection. Repository errors pass through unchanged;
 * anything else is wrapped in a RepositoryError.
 */
export abstract class FirestoreEntityRepository<T extends { id: string }> {
  protected readonly store: DocumentStore;
  protected readonly logger: Logger;
  private readonly mapping: EntityMapping<T>;

  protected constructor(store: DocumentStore, mapping: EntityMapping<T>, logger?: Logger) {
    this.store = store;
    this.mapping = mapping;
    this.logger = logger ?? new NoopLogger();
  }

  /**
   * Create the entity under its own ID.
   *
   * The existence probe only catches the common case; a concurrent create
   * surfaces as the store's 409, which also becomes a ConflictError.
   */
  async create(entity: T): Promise<T> {
    const { collection, entityName } = this.mapping;
    const context = this.mapping.describe(entity);

    return this.run("create", context, async () => {
      this.logger.info(`Creating ${entityName.toLowerCase()}`, context);

      if (await this.store.documentExists(collection, entity.id)) {
        throw new ConflictError(`${entityName} with ID ${entity.id} already exists`, entity.id);
      }

      try {
        await this.store.createDocument(collection, this.mapping.toDocument(entity), {
          documentId: entity.id,
        });
      } catch (error) {
        if (isConflictError(error)) {
          throw new ConflictError(`${entityName} with ID ${entity.id} already exists`, entity.id, {
            cause: error,
          });
        }
        throw error;
      }

      this.logger.info(`${entityName} created successfully`, context);
      return entity;
    });
  }

  async findById(id: string): Promise<T | null> {
    const { collection, entityName } = this.mapping;
    const context = { id };

    return this.run("find", context, async () => {
      const document = await this.store.getDocument(collection, id);
      if (document === null) {
        this.logger.debug(`${entityName} not found`, context);
        return null;
      }
      return this.mapping.fromDocument(document);
    });
  }

  async update(entity: T): Promise<T> {
    const { collection, entityName } = this.mapping;
    const context = this.mapping.describe(entity);

    return this.run("update", context, async () => {
      this.logger.info(`Updating ${entityName.toLowerCase()}`, context);

      if (!(await this.store.documentExists(collection, entity.id))) {
        throw new EntityNotFoundError(`${entityName} with ID ${entity.id} does not exist`, entity.id);
      }
      await this.store.updateDocument(collection, entity.id, this.mapping.toDocument(entity));

      this.logger.info(`${entityName} updated successfully`, context);
      return entity;
    });
  }

  async delete(id: string): Promise<void> {
    const { collection, entityName } = this.mapping;
    const context = { id };

    await this.run("delete", context, async () => {
      this.logger.info(`Deleting ${entityName.toLowerCase()}`, context);

      if (!(await this.store.documentExists(collection, id))) {
        throw new EntityNotFoundError(`${entityName} with ID ${id} does not exist`, id);
      }
      await this.store.deleteDocument(collection, id);

      this.logger.info(`${entityName} deleted successfully`, context);
    });
  }

  async exists(id: string): Promise<boolean> {
    return this.run("check existence of", { id }, () =>
      this.store.documentExists(this.mapping.collection, id)
    );
  }

  /**
   * Entities matching every filter, in store order.
   */
  protected async findWhere(filters: EqualityFilters, options: PageOptions = {}): Promise<T[]> {
    const { collection } = this.mapping;
    const context: LogContext = { ...filters, limit: options.limit, offset: options.offset };

    return this.run("find", context, async () => {
      const documents = await this.store.queryDocuments(collection, {
        where: filters,
        limit: options.limit,
        offset: options.offset,
      });
      const entities = documents.map((document) => this.mapping.fromDocument(document));
      this.logger.debug(`Found ${entities.length} ${collection}`, context);
      return entities;
    });
  }

  private async run<R>(action: string, context: LogContext, fn: () => Promise<R>): Promise<R> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof RepositoryError) {
        throw error;
      }
      const entity = this.mapping.entityName.toLowerCase();
      this.logger.error(`Failed to ${action} ${entity}`, { ...context, error: describeError(error) });
      throw new RepositoryError(`Failed to ${action} ${entity}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
