/**
 * Filter expressions and their translation to the wire `Filters` tree.
 *
 * Translation keeps the structure as it is: every group becomes an And/Or node
 * with the same children in the same order, every leaf a node with `on` set to
 * its property path and exactly one typed value.
 */

import { InvalidArgumentError } from "../errors";
import { FilterOperator as WireOperator, type Filters } from "../proto/schema";
import type {
  FilterExpression,
  FilterGroup,
  FilterLeaf,
  FilterOperator,
  FilterScalar,
  FilterValue,
  GeoRange,
} from "../types";

type FilterList = readonly string[] | readonly number[] | readonly boolean[] | readonly Date[];

const LEAF_OPERATORS: Record<FilterOperator, WireOperator> = {
  Equal: WireOperator.OPERATOR_EQUAL,
  NotEqual: WireOperator.OPERATOR_NOT_EQUAL,
  LessThan: WireOperator.OPERATOR_LESS_THAN,
  LessThanEqual: WireOperator.OPERATOR_LESS_THAN_EQUAL,
  GreaterThan: WireOperator.OPERATOR_GREATER_THAN,
  GreaterThanEqual: WireOperator.OPERATOR_GREATER_THAN_EQUAL,
  Like: WireOperator.OPERATOR_LIKE,
  IsNull: WireOperator.OPERATOR_IS_NULL,
  ContainsAny: WireOperator.OPERATOR_CONTAINS_ANY,
  ContainsAll: WireOperator.OPERATOR_CONTAINS_ALL,
  WithinGeoRange: WireOperator.OPERATOR_WITHIN_GEO_RANGE,
};

// =============================================================================
// Builders
// =============================================================================

/** Leaf constructors bound to one property path. */
export class FilterTarget {
  constructor(private readonly path: readonly string[]) {}

  private leaf(operator: FilterOperator, value: FilterValue): FilterLeaf {
    return { operator, target: this.path, value };
  }

  equal(value: FilterScalar | FilterList): FilterLeaf {
    return this.leaf("Equal", value);
  }

  notEqual(value: FilterScalar | FilterList): FilterLeaf {
    return this.leaf("NotEqual", value);
  }

  lessThan(value: number | Date | string): FilterLeaf {
    return this.leaf("LessThan", value);
  }

  lessOrEqual(value: number | Date | string): FilterLeaf {
    return this.leaf("LessThanEqual", value);
  }

  greaterThan(value: number | Date | string): FilterLeaf {
    return this.leaf("GreaterThan", value);
  }

  greaterOrEqual(value: number | Date | string): FilterLeaf {
    return this.leaf("GreaterThanEqual", value);
  }

  /** `*` and `?` wildcards are evaluated by the server. */
  like(pattern: string): FilterLeaf {
    return this.leaf("Like", pattern);
  }

  isNull(isNull: boolean): FilterLeaf {
    return this.leaf("IsNull", isNull);
  }

  containsAny(values: FilterList): FilterLeaf {
    return this.leaf("ContainsAny", values);
  }

  containsAll(values: FilterList): FilterLeaf {
    return this.leaf("ContainsAll", values);
  }

  withinGeoRange(range: GeoRange): FilterLeaf {
    return this.leaf("WithinGeoRange", range);
  }
}

/** Path prefix through a reference property into its target collection. */
export class ReferenceFilterTarget {
  constructor(private readonly path: readonly string[]) {}

  byProperty(name: string): FilterTarget {
    return new FilterTarget([...this.path, name]);
  }

  byId(): FilterTarget {
    return new FilterTarget([...this.path, "_id"]);
  }

  byRef(linkOn: string, targetCollection: string): ReferenceFilterTarget {
    return new ReferenceFilterTarget([...this.path, linkOn, targetCollection]);
  }
}

export const Filter = {
  byProperty(name: string): FilterTarget {
    return new FilterTarget([name]);
  },

  byId(): FilterTarget {
    return new FilterTarget(["_id"]);
  },

  byCreationTime(): FilterTarget {
    return new FilterTarget(["_creationTimeUnix"]);
  },

  byUpdateTime(): FilterTarget {
    return new FilterTarget(["_lastUpdateTimeUnix"]);
  },

  byRef(linkOn: string, targetCollection: string): ReferenceFilterTarget {
    return new ReferenceFilterTarget([linkOn, targetCollection]);
  },

  all(...filters: FilterExpression[]): FilterGroup {
    return { operator: "And", filters };
  },

  any(...filters: FilterExpression[]): FilterGroup {
    return { operator: "Or", filters };
  },
};

// =============================================================================
// Translation
// =============================================================================

function isGroup(filter: FilterExpression): filter is FilterGroup {
  return filter.operator === "And" || filter.operator === "Or";
}

function isList(value: FilterValue): value is FilterList {
  return Array.isArray(value);
}

function isGeoRange(value: FilterValue): value is GeoRange {
  return typeof value === "object" && !(value instanceof Date) && !isList(value);
}

function describe(filter: FilterLeaf): string {
  return `${filter.operator} on '${filter.target.join(".")}'`;
}

function scalarValue(filter: FilterLeaf, value: FilterScalar): Partial<Filters> {
  if (typeof value === "string") return { valueText: value };
  if (typeof value === "boolean") return { valueBoolean: value };
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new InvalidArgumentError(`Invalid date in filter ${describe(filter)}`);
    }
    return { valueText: value.toISOString() };
  }
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(`Non-finite number in filter ${describe(filter)}`);
  }
  return Number.isSafeInteger(value) ? { valueInt: value } : { valueNumber: value };
}

function listValue(filter: FilterLeaf, list: FilterList): Partial<Filters> {
  const items: readonly FilterScalar[] = list;
  if (items.length === 0) {
    throw new InvalidArgumentError(`Empty value list in filter ${describe(filter)}`);
  }
  const strings = items.filter((v): v is string => typeof v === "string");
  const booleans = items.filter((v): v is boolean => typeof v === "boolean");
  const numbers = items.filter((v): v is number => typeof v === "number");
  const dates = items.filter((v): v is Date => v instanceof Date);

  if (strings.length === items.length) return { valueTextArray: { values: strings } };
  if (booleans.length === items.length) return { valueBooleanArray: { values: booleans } };
  if (dates.length === items.length) {
    return { valueTextArray: { values: dates.map((d) => d.toISOString()) } };
  }
  if (numbers.length === items.length) {
    if (numbers.every((n) => Number.isSafeInteger(n))) {
      return { valueIntArray: { values: numbers } };
    }
    if (numbers.every((n) => Number.isFinite(n))) {
      return { valueNumberArray: { values: numbers } };
    }
    throw new InvalidArgumentError(`Non-finite number in filter ${describe(filter)}`);
  }
  throw new InvalidArgumentError(`Mixed value types in filter ${describe(filter)}`);
}

function leafValue(filter: FilterLeaf): Partial<Filters> {
  const { value } = filter;
  if (filter.operator === "WithinGeoRange") {
    if (!isGeoRange(value)) {
      throw new InvalidArgumentError(`WithinGeoRange on '${filter.target.join(".")}' needs a geo range`);
    }
    return { valueGeo: { latitude: value.latitude, longitude: value.longitude, distance: value.distance } };
  }
  if (filter.operator === "IsNull" && typeof value !== "boolean") {
    throw new InvalidArgumentError(`IsNull on '${filter.target.join(".")}' needs a boolean`);
  }
  if (isList(value)) return listValue(filter, value);
  if (isGeoRange(value)) {
    throw new InvalidArgumentError(`Geo range is only valid with WithinGeoRange, got ${describe(filter)}`);
  }
  return scalarValue(filter, value);
}

export function toWireFilters(filter: FilterExpression): Filters {
  if (isGroup(filter)) {
    if (filter.filters.length === 0) {
      throw new InvalidArgumentError(`${filter.operator} filter needs at least one operand`);
    }
    return {
      operator: filter.operator === "And" ? WireOperator.OPERATOR_AND : WireOperator.OPERATOR_OR,
      filters: filter.filters.map(toWireFilters),
    };
  }

  const operator = LEAF_OPERATORS[filter.operator];
  if (operator === undefined) {
    throw new InvalidArgumentError(`Unknown filter operator '${String(filter.operator)}'`);
  }
  if (filter.target.length === 0) {
    throw new InvalidArgumentError(`Filter ${filter.operator} has an empty property path`);
  }
  return { operator, on: [...filter.target], ...leafValue(filter) };
}
