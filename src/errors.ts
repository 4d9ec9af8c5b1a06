export class WtssClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends WtssClientError {}

export class NetworkError extends WtssClientError {
  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ServiceError extends WtssClientError {
  constructor(
    message: string,
    readonly url: string,
    readonly status: number,
    readonly body: string
  ) {
    super(message);
  }
}

export class DecodeError extends WtssClientError {
  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class SchemaError extends WtssClientError {}

export class ParseError extends WtssClientError {
  constructor(
    message: string,
    readonly value: string,
    readonly format: string
  ) {
    super(message);
  }
}

export class AttributeNotFoundError extends WtssClientError {
  constructor(readonly attribute: string) {
    super(`Time series for attribute '${attribute}' not found!`);
  }
}
