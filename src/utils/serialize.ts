import { Types } from 'mongoose';

/**
 * Converts persisted records into plain JSON:
 * - Drops Mongo internals (`_id`, `__v`); records are addressed by their string ids
 * - Converts ObjectIds to strings
 * - Dates become ISO 8601 strings through Date#toJSON
 */
export function serializeDocument(doc: unknown): unknown {
  if (doc === undefined || doc === null) return doc;

  return JSON.parse(
    JSON.stringify(doc, (key, value: unknown) => {
      if (key === '_id' || key === '__v') {
        return undefined;
      }

      if (value instanceof Types.ObjectId) {
        return value.toString();
      }

      return value;
    })
  );
}
