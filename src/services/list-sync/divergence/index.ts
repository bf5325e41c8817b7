export { snapshotsDiffer, synchronizeWithClient } from './client-divergence.js'
export { detectItemOrderConflicts } from './order-conflicts.js'
