/**
 * Reconciliation Module
 *
 * Exports single- and multi-client merge operations.
 */

export {
  applyEntries,
  applyNewerEntry,
  type ContestRank,
  settlePositions,
} from './entry-applier.js'
export { applyChangesFromMultipleClients } from './multi-client.js'
export { applyClientChanges } from './single-client.js'
export { isPreferredEntry, selectWinningEntries } from './winner-selection.js'
