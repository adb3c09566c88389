export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Telegram asked us to back off; `seconds` is how long it wants us to wait. */
export class RateLimitError extends Error {
  readonly seconds: number;

  constructor(seconds: number) {
    super(`Rate limited by Telegram for ${seconds}s`);
    this.name = "RateLimitError";
    this.seconds = seconds;
  }
}

export class InvalidFilenameError extends Error {
  constructor(name: string) {
    super(`Invalid filename: ${name}`);
    this.name = "InvalidFilenameError";
  }
}

export class FileNotFoundError extends Error {
  constructor(name: string) {
    super(`File not found: ${name}`);
    this.name = "FileNotFoundError";
  }
}
