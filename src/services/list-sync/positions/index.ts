/**
 * Positional Editing Module
 *
 * Exports add/remove/reorder operations, renormalization and read helpers.
 */

export { findItemById, getItemIds, getPage } from './item-queries.js'
export {
  addItem,
  normalizePositions,
  removeItem,
  reorderItem,
  resolveInsertPosition,
  sortByPosition,
} from './position-operations.js'
