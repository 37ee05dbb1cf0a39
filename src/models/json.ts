/**
 * JSON projections of the data models, as served over HTTP
 */

import type { Collection } from './collection.js';
import { storePath, type ItemRecord } from './item.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function collectionToJson(collection: Collection): JsonObject {
  return {
    id: collection.id,
    title: collection.title,
    items: collection.items.map((item) => ({ path: storePath(item) })),
  };
}

export function itemRecordToJson(record: ItemRecord): JsonObject {
  return {
    path: storePath(record),
    title: record.title,
    tags: [...record.tags],
  };
}
