/**
 * Error types raised while loading, converting and writing a graph export.
 */

export class GraphExportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GraphExportError";
  }
}

/**
 * A problem with what the user handed us: arguments, bounding box,
 * input file, or an area with no usable streets.
 */
export class InputError extends GraphExportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InputError";
  }
}

/** The simplifier met a topology it cannot collapse into a single path */
export class SimplificationError extends GraphExportError {
  constructor(message: string) {
    super(message);
    this.name = "SimplificationError";
  }
}

/** An export document failed to parse or validate */
export class GraphExportFormatError extends GraphExportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GraphExportFormatError";
  }
}
