/**
 * Error taxonomy for route queries
 * "No profitable route" is an outcome, not an error, and has no class here.
 */

export class TradeRouteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed constraints or calculator inputs. Raised before any computation.
 */
export class InvalidInputError extends TradeRouteError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.field = field;
  }
}

/**
 * Catalog snapshot is empty or unavailable
 */
export class NoCatalogDataError extends TradeRouteError {
  constructor(message = 'No commodity catalog data available') {
    super(message);
  }
}
