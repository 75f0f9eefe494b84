export class ConfigurationError extends Error {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class NumericalInstabilityError extends Error {
  public readonly task?: number;
  public readonly time?: number;

  constructor(message: string, details: { task?: number; time?: number } = {}) {
    super(message);
    this.name = 'NumericalInstabilityError';
    this.task = details.task;
    this.time = details.time;
  }
}

export class SimulationStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulationStateError';
  }
}
