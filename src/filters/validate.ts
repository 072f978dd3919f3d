/**
 * Dimension Filter Validation
 *
 * Checks `selectdimensionnodes` filters against the combinations the
 * EasyData server accepts, before anything is cached or sent.
 */

import { isRecord } from '../json'
import {
  type DimensionFilter,
  type FilterSet,
  type FilterSetInput,
  VALID_DIMENSIONS
} from '../types'

/**
 * Thrown when a caller passes a malformed request argument.
 * Always raised before any I/O happens.
 */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidInputError'
  }
}

const NO_CRITERIA_MESSAGE =
  "At least one of 'codes', 'levels', 'children', or 'children_include_self' must be provided"

const INVALID_COMBINATION_MESSAGE =
  'Invalid filter combination. Supported patterns:\n' +
  "1. codes only: {'codes': ['CODE1', ...]}\n" +
  "2. levels only: {'levels': [1, 2, ...]}\n" +
  "3. codes and levels: {'codes': ['CODE1'], 'levels': [1, 2]}\n" +
  "4. single code with children: {'codes': ['CODE1'], 'children': True}\n" +
  "5. single code with children_include_self: {'codes': ['CODE1'], 'children_include_self': True}"

function isDimension(value: unknown): value is DimensionFilter['dimension'] {
  return VALID_DIMENSIONS.some((d) => d === value)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function isIntegerArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => Number.isInteger(item))
}

/**
 * Validate a single dimension filter.
 *
 * @throws InvalidInputError when a field has the wrong type or the
 * combination of fields is not one the server supports
 */
export function validateDimensionFilter(input: unknown): asserts input is DimensionFilter {
  if (!isRecord(input)) {
    throw new InvalidInputError('Dimension filter must be an object')
  }

  if (!('dimension' in input)) {
    throw new InvalidInputError("Dimension filter must include 'dimension' field")
  }
  if (!isDimension(input.dimension)) {
    throw new InvalidInputError(
      `Dimension must be one of ${VALID_DIMENSIONS.join(', ')}, got '${String(input.dimension)}'`
    )
  }

  const codes = input.codes === undefined ? [] : input.codes
  const levels = input.levels === undefined ? [] : input.levels
  const children = input.children === undefined ? false : input.children
  const childrenIncludeSelf =
    input.children_include_self === undefined ? false : input.children_include_self

  if (!Array.isArray(codes)) {
    throw new InvalidInputError("'codes' must be a list")
  }
  if (!isStringArray(codes)) {
    throw new InvalidInputError("All items in 'codes' must be strings")
  }
  if (!Array.isArray(levels)) {
    throw new InvalidInputError("'levels' must be a list")
  }
  if (!isIntegerArray(levels)) {
    throw new InvalidInputError("All items in 'levels' must be integers")
  }
  if (typeof children !== 'boolean') {
    throw new InvalidInputError("'children' must be a boolean")
  }
  if (typeof childrenIncludeSelf !== 'boolean') {
    throw new InvalidInputError("'children_include_self' must be a boolean")
  }

  const noFlags = !children && !childrenIncludeSelf
  const singleCodeOnly = codes.length === 1 && levels.length === 0

  const matchesPattern =
    // codes only / levels only / codes and levels
    (noFlags && (codes.length > 0 || levels.length > 0)) ||
    // single code with children
    (singleCodeOnly && children && !childrenIncludeSelf) ||
    // single code with children_include_self
    (singleCodeOnly && !children && childrenIncludeSelf)

  if (matchesPattern) return

  if (codes.length === 0 && levels.length === 0 && noFlags) {
    throw new InvalidInputError(NO_CRITERIA_MESSAGE)
  }
  throw new InvalidInputError(INVALID_COMBINATION_MESSAGE)
}

/**
 * Validate one filter or a non-empty list of filters.
 */
export function validateDimensionFilters(input: unknown): asserts input is FilterSetInput {
  if (Array.isArray(input)) {
    if (input.length === 0) {
      throw new InvalidInputError('selectdimensionnodes list cannot be empty')
    }
    for (const filter of input) {
      validateDimensionFilter(filter)
    }
    return
  }
  if (isRecord(input)) {
    validateDimensionFilter(input)
    return
  }
  throw new InvalidInputError('selectdimensionnodes must be an object or a list of objects')
}

function isFilterList(input: FilterSetInput): input is readonly DimensionFilter[] {
  return Array.isArray(input)
}

/**
 * Resolve the one-or-many input into a tagged filter set.
 */
export function toFilterSet(input: FilterSetInput): FilterSet {
  if (isFilterList(input)) {
    return { kind: 'many', filters: input }
  }
  return { kind: 'single', filter: input }
}

export function filtersOf(set: FilterSet): readonly DimensionFilter[] {
  return set.kind === 'single' ? [set.filter] : set.filters
}
