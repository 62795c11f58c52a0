/**
 * Shared types used across the engine. Grouping these definitions keeps the
 * error codes consistent between the graph representations and the
 * algorithms built on top of them.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Keeping a single source of truth lets callers branch on `error.code` without
 * depending on message wording.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    INDEX_RANGE: "E-GRAPH-INDEX-RANGE",
    WEIGHT: "E-GRAPH-WEIGHT",
    INVALID_INPUT: "E-GRAPH-INVALID-INPUT",
    CYCLE: "E-GRAPH-CYCLE",
    PATH: "E-GRAPH-PATH",
  },
  CONFIG: {
    INVALID: "E-CONFIG-INVALID",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `GRAPH_CYCLE`). The helper keeps runtime data immutable while
 * preserving the strongly typed relationship with {@link ERROR_CATALOG}.
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.GRAPH_INDEX_RANGE`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code emitted by the engine. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];
