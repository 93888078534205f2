export class YahtzeeError extends Error {
  constructor(message: string, public code: string, public exitCode: number = 1) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends YahtzeeError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR", 2);
  }
}

export class NotFoundError extends YahtzeeError {
  constructor(message: string) {
    super(message, "NOT_FOUND", 1);
  }
}

export class InputClosedError extends YahtzeeError {
  constructor(message = "input closed before an answer was given") {
    super(message, "INPUT_CLOSED", 130);
  }
}

export class ConfigError extends YahtzeeError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR", 78);
  }
}
