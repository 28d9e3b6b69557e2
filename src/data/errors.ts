/**
 * Base class for every error thrown by the dataset generators.
 */
export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetError";
  }
}

/**
 * Thrown when a sample count, ratio or option fails validation.
 */
export class InvalidArgumentError extends DatasetError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(message: string, options: { field: string; value: unknown }) {
    super(message);
    this.name = "InvalidArgumentError";
    this.field = options.field;
    this.value = options.value;
  }
}

/**
 * Thrown when the registry is asked for a dataset name it does not know.
 */
export class DatasetLookupError extends DatasetError {
  public readonly datasetName: string;

  constructor(datasetName: string, known: readonly string[]) {
    super(`Unknown dataset "${datasetName}". Known datasets: ${known.join(", ")}`);
    this.name = "DatasetLookupError";
    this.datasetName = datasetName;
  }
}
