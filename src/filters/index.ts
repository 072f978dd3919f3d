/**
 * Filters Module
 *
 * Validation and normalization of grid dimension filters.
 */

export { compareCodePoints, normalizeDimensionFilters, sortKeys } from './normalize'
export {
  filtersOf,
  InvalidInputError,
  toFilterSet,
  validateDimensionFilter,
  validateDimensionFilters
} from './validate'
