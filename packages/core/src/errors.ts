/**
 * Error thrown when a board is built from cells that break the 4x4 exponent invariant
 */
export class InvalidBoardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidBoardError';
  }
}

/**
 * Error thrown when a tile coordinate falls outside the grid
 */
export class TileCoordinateError extends Error {
  constructor(
    public readonly x: number,
    public readonly y: number,
  ) {
    super(`Tile coordinate (${x}, ${y}) is outside the 4x4 board`);
    this.name = 'TileCoordinateError';
  }
}

/**
 * Error thrown when a move token cannot be parsed
 */
export class InvalidMoveError extends Error {
  constructor(token: string) {
    super(`Unknown move "${token}"`);
    this.name = 'InvalidMoveError';
  }
}

/**
 * Error thrown when search parameters are out of range
 */
export class SearchConfigError extends Error {
  constructor(
    public readonly parameter: string,
    message: string,
  ) {
    super(`${parameter}: ${message}`);
    this.name = 'SearchConfigError';
  }
}

/**
 * Error thrown when the rollout worker pool cannot run a batch
 */
export class SearchWorkerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SearchWorkerError';
  }
}

/**
 * Error thrown when an agent is asked for something it cannot provide
 */
export class AgentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AgentError';
  }
}
