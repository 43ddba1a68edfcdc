export class KnapsackError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'KnapsackError';
  }
}

export class ConfigError extends KnapsackError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

/**
 * The instance file could not be opened or read.
 */
export class InstanceIoError extends KnapsackError {
  constructor(message: string, public readonly path: string, cause?: Error) {
    super(message, 'IO_ERROR', 'load', cause);
    this.name = 'InstanceIoError';
  }
}

/**
 * The instance text does not follow the `N / items / capacity` layout.
 * `lineNumber` is 1-based; `line` is the offending content when there was one.
 */
export class InstanceFormatError extends KnapsackError {
  constructor(
    message: string,
    public readonly lineNumber?: number,
    public readonly line?: string,
    cause?: Error,
  ) {
    super(message, 'FORMAT_ERROR', 'load', cause);
    this.name = 'InstanceFormatError';
  }
}

export class ChoiceLengthError extends KnapsackError {
  constructor(public readonly expected: number, public readonly actual: number) {
    super(
      `Choice vector has ${actual} bits but the knapsack has ${expected} items`,
      'CHOICE_LENGTH',
      'score',
    );
    this.name = 'ChoiceLengthError';
  }
}

export class SelectionError extends KnapsackError {
  constructor(message: string) {
    super(message, 'SELECTION_ERROR', 'report');
    this.name = 'SelectionError';
  }
}

/**
 * A recorded population file could not be read or does not hold one JSON
 * array of bit strings per line.
 */
export class PopulationFileError extends KnapsackError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly lineNumber?: number,
    cause?: Error,
  ) {
    super(message, 'POPULATION_FILE', 'replay', cause);
    this.name = 'PopulationFileError';
  }
}
