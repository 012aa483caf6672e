export class CliError extends Error {
  constructor(message: string, public readonly causeError?: unknown) {
    super(message);
    this.name = "CliError";
  }
}

export class TransportError extends CliError {
  constructor(message: string, public readonly status?: number, causeError?: unknown) {
    super(message, causeError);
    this.name = "TransportError";
  }
}

export class EmptyQueryError extends CliError {
  constructor(message = "status name is required") {
    super(message);
    this.name = "EmptyQueryError";
  }
}

export class NoMatchError extends CliError {
  constructor(public readonly query: string, public readonly available: string[]) {
    super(`no transition matching ${JSON.stringify(query)}; available transitions: ${available.join(", ")}`);
    this.name = "NoMatchError";
  }
}
