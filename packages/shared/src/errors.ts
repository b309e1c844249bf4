/**
 * Pipeline error types.
 *
 * Extraction and filling failures travel as `success: false` results; these
 * classes cover the conditions that abort a call outright.
 */

export class ExtractionUnavailableError extends Error {
  constructor(message = 'No extraction methods available') {
    super(message);
    this.name = 'ExtractionUnavailableError';
  }
}

export class MappingFailureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MappingFailureError';
  }
}

export class TemplateMissingError extends Error {
  readonly format: string;
  readonly searched: string[];

  constructor(format: string, searched: string[]) {
    super(`Template for ${format} not found (searched: ${searched.join(', ')})`);
    this.name = 'TemplateMissingError';
    this.format = format;
    this.searched = searched;
  }
}

export class UnsupportedDocumentError extends Error {
  constructor(message = 'Unsupported document type: expected a PDF or a raster image') {
    super(message);
    this.name = 'UnsupportedDocumentError';
  }
}

export class FieldTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FieldTableError';
  }
}

/**
 * Render anything thrown as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
