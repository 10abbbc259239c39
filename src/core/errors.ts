/** Raised for anything that makes a backtest impossible to start: bad weights, bad data, bad wiring. */
export class ConfigurationError extends Error {
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}
