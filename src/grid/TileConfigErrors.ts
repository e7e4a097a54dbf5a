/**
 * Configuration errors. Any of these rejects the whole layout: no canvas is
 * produced for a configuration that raised one.
 */

export type TileConfigErrorCode =
  | "invalid_grid"
  | "malformed_config"
  | "malformed_tile"
  | "out_of_bounds"
  | "self_reference"
  | "overlap";

export abstract class TileConfigError extends Error {
  abstract readonly code: TileConfigErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class GridSpecError extends TileConfigError {
  readonly code = "invalid_grid";

  constructor(readonly field: string, message: string) {
    super(message);
  }
}

/** The configuration as a whole could not be read (bad JSON, wrong root type, bad grid size). */
export class MalformedConfigError extends TileConfigError {
  readonly code = "malformed_config";

  constructor(readonly field: string, message: string) {
    super(message);
  }
}

export class MalformedTileError extends TileConfigError {
  readonly code = "malformed_tile";

  constructor(readonly index: number, readonly field: string, detail: string) {
    super(`Tile ${index}: field '${field}' ${detail}`);
  }
}

export class OutOfBoundsError extends TileConfigError {
  readonly code = "out_of_bounds";

  constructor(readonly index: number, detail: string) {
    super(`Tile ${index} is out of bounds: ${detail}`);
  }
}

export class SelfReferenceError extends TileConfigError {
  readonly code = "self_reference";

  constructor(readonly index: number, readonly pluginId: string) {
    super(`Tile ${index} cannot host the '${pluginId}' plugin inside itself`);
  }
}

export class OverlapError extends TileConfigError {
  readonly code = "overlap";

  constructor(readonly first: number, readonly second: number) {
    super(`Tiles ${first} and ${second} overlap`);
  }
}
