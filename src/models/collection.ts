/**
 * Collection interfaces for the vorg repository
 */

import type { Item } from './item.js';

/**
 * A titled group of items. Items are ordered by item id.
 */
export interface Collection {
  id: number;
  title: string;
  items: Item[];
}
