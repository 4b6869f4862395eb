/** Grids of the wrong shape reached a transform. Catalog data bug, never retried. */
export class GridShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GridShapeError";
  }
}

/** Character data refers to something the catalog does not have. */
export class CatalogDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogDataError";
  }
}
