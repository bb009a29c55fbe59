/**
 * Post-processing stages over the canonical message sequence.
 */

export {
  createFilter,
  type FilterOptions,
  filterMessages,
  isFilterActive,
  type MessageFilter,
  matchesFilter,
  parseFilterDate
} from './filter.js'
export { ConsecutiveMerger, mergeConsecutive, reductionPercent } from './merge.js'
