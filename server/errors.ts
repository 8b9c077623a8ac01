export class ScraperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidUrlError extends ScraperError {
  constructor(public readonly url: string, reason = "malformed url") {
    super(`Invalid url '${url}': ${reason}`);
  }
}

export class UnknownWebsiteError extends InvalidUrlError {
  constructor(url: string) {
    super(url, "unknown website");
  }
}

export class TransportError extends ScraperError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status: number | null = null,
  ) {
    super(message);
  }
}

export class StructuredDataError extends ScraperError {}

export class AddressParseError extends ScraperError {
  constructor(public readonly input: string) {
    super(`Could not parse address from title: '${input}'`);
  }
}

export class EmptyInputError extends ScraperError {}

export class UnrecognizedStatusError extends ScraperError {
  constructor(public readonly input: string) {
    super(`No matching listing status found for: '${input}'`);
  }
}

export class MissingFileError extends ScraperError {
  constructor(public readonly path: string) {
    super(`Request file not found: ${path}`);
  }
}

export class MalformedInputError extends ScraperError {}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
