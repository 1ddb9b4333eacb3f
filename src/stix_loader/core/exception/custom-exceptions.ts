export class StixLoaderError extends Error {
  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
  }
}

/** The input is not valid JSON. */
export class StixParseError extends StixLoaderError {}

/** Valid JSON that does not match any supported STIX variant. */
export class StixValidationError extends StixLoaderError {
  constructor(message: string, public readonly details: string[] = []) {
    super(details.length ? `${message}: ${details.join('; ')}` : message, { details });
  }
}

export class DuplicateObjectError extends StixLoaderError {
  constructor(public readonly id: string) {
    super(`object ${id} already exists in the graph`, { id });
  }
}

export class UnresolvedReferenceError extends StixLoaderError {
  constructor(public readonly id: string) {
    super(`no node found for id ${id}`, { id });
  }
}

export class GraphStoreError extends StixLoaderError {}

/** Input file or archive cannot be opened; fatal for the run. */
export class IngestionInputError extends StixLoaderError {}

export class IngestionStateError extends StixLoaderError {}

/** Bad command-line arguments. */
export class CliUsageError extends StixLoaderError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
