export type ExtractionErrorKind =
  | 'FileNotFound'
  | 'MetadataMissing'
  | 'FieldMissing'
  | 'FieldMalformed';

export class ExtractionError extends Error {
  constructor(
    public readonly kind: ExtractionErrorKind,
    message: string,
    public readonly filePath: string,
    public readonly field?: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

export class FileNotFoundError extends ExtractionError {
  constructor(filePath: string) {
    super('FileNotFound', `No file found with path ${filePath}`, filePath);
    this.name = 'FileNotFoundError';
  }
}

export class MetadataMissingError extends ExtractionError {
  constructor(filePath: string, what: string, cause?: unknown) {
    super('MetadataMissing', `No ${what} found in ${filePath}`, filePath, undefined, cause);
    this.name = 'MetadataMissingError';
  }
}

export class FieldMissingError extends ExtractionError {
  constructor(filePath: string, field: string) {
    super('FieldMissing', `Required field ${field} is missing in ${filePath}`, filePath, field);
    this.name = 'FieldMissingError';
  }
}

export class FieldMalformedError extends ExtractionError {
  constructor(filePath: string, field: string, detail: string) {
    super(
      'FieldMalformed',
      `Field ${field} in ${filePath} is malformed: ${detail}`,
      filePath,
      field
    );
    this.name = 'FieldMalformedError';
  }
}
