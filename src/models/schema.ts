/**
 * zod building blocks shared by the model mappers.
 */

import { z } from "zod";
import { ModelParseError } from "../error/index.js";
import { Timestamp } from "../types/document.js";

/**
 * A timestamp field: a Timestamp as read from the store, a Date, or an
 * RFC 3339 string written by older clients. Entities hold millisecond Dates.
 */
export const timestampSchema = z
  .union([z.instanceof(Timestamp), z.date(), z.string().datetime({ offset: true })])
  .transform((value) => {
    if (value instanceof Timestamp) return value.toDate();
    return value instanceof Date ? value : new Date(value);
  });

/**
 * An optional timestamp; null and absent both mean unset.
 */
export const optionalTimestampSchema = timestampSchema.nullish().transform((value) => value ?? undefined);

/**
 * An optional string; null and absent both mean unset.
 */
export const optionalStringSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

/**
 * An integer field stored as a 64-bit integer; integral doubles are accepted.
 */
export const integerSchema = z
  .union([z.bigint(), z.number().int()])
  .transform((value) => Number(value));

/**
 * Parse with a schema, raising ModelParseError on failure.
 */
export function parseModel<T extends z.ZodTypeAny>(model: string, schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ModelParseError(model, details, { cause: result.error });
  }
  return result.data;
}
