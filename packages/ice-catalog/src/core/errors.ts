/**
 * Ice Catalog Error Types
 *
 * The core raises these instead of tolerating bad input. There is no
 * partial-success mode: a merge either returns the whole table or throws.
 */

export type CatalogErrorKind =
  | 'InvalidInput'
  | 'SchemaMismatch'
  | 'DatetimeConflict'
  | 'Config'
  | 'Conversion';

/**
 * Base class for every catalog failure
 */
export abstract class CatalogError extends Error {
  abstract readonly kind: CatalogErrorKind;

  constructor(message: string) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Empty geometry/asset collections or unset identifiers
 */
export class InvalidInputError extends CatalogError {
  readonly kind = 'InvalidInput' as const;
  public readonly name = 'InvalidInputError';
}

/**
 * Issue found while validating a table against the catalog schema
 */
export interface SchemaIssue {
  /** Row index in the presented table */
  readonly row: number;
  /** Dotted path inside the row, e.g. `assets.asset_0.href` */
  readonly path: string;
  readonly message: string;
}

/**
 * A catalog table is missing an expected column, or a column has the wrong shape
 *
 * @example
 * ```typescript
 * try {
 *   parseCatalogTable(rows);
 * } catch (error) {
 *   if (error instanceof SchemaMismatchError) {
 *     console.error(error.missingColumns); // ['links']
 *   }
 * }
 * ```
 */
export class SchemaMismatchError extends CatalogError {
  readonly kind = 'SchemaMismatch' as const;
  public readonly name = 'SchemaMismatchError';

  constructor(
    message: string,
    public readonly missingColumns: readonly string[],
    public readonly issues: readonly SchemaIssue[]
  ) {
    super(message);
  }
}

/**
 * Records sharing an id disagree on their datetime.
 *
 * Indicates an upstream identifier collision rather than legitimate merge input.
 */
export class DatetimeConflictError extends CatalogError {
  readonly kind = 'DatetimeConflict' as const;
  public readonly name = 'DatetimeConflictError';

  constructor(
    public readonly id: string,
    public readonly datetimes: readonly string[]
  ) {
    super(`Records with id "${id}" disagree on datetime: ${datetimes.join(', ')}`);
  }
}

export class ConfigError extends CatalogError {
  readonly kind = 'Config' as const;
  public readonly name = 'ConfigError';
}

/**
 * Shapefile could not be read or written out as FlatGeobuf
 */
export class ConversionError extends CatalogError {
  readonly kind = 'Conversion' as const;
  public readonly name = 'ConversionError';

  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message);
  }
}
