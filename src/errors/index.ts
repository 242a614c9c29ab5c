export class WeatherCliError extends Error {
  constructor(
    message: string,
    readonly exitCode: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid input from the command line, env or prompt. */
export class UsageError extends WeatherCliError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 2, options);
  }
}

/** No HTTP response was received (DNS, refused connection, timeout). */
export class NetworkError extends WeatherCliError {
  constructor(
    message: string,
    readonly code?: string,
    options?: ErrorOptions
  ) {
    super(message, 1, options);
  }
}

/** The provider answered, but not with usable weather data. */
export class RemoteError extends WeatherCliError {
  constructor(
    message: string,
    readonly status: number,
    readonly issues?: unknown[],
    options?: ErrorOptions
  ) {
    super(message, 1, options);
  }
}
