/**
 * Domain errors surfaced to the CLI and MCP tools
 */

export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Raised when the events CSV cannot be used at all. Nothing is loaded.
 */
export class CatalogLoadError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(message);
    this.name = 'CatalogLoadError';
    this.filePath = filePath;
  }
}
