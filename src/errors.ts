export class IncompatibleTaskError extends Error {
  constructor(
    message: string,
    public readonly problems: string[] = []
  ) {
    super(problems.length > 0 ? [message, ...problems.map((p) => `  - ${p}`)].join('\n') : message);
    this.name = 'IncompatibleTaskError';
  }
}

export class UnknownTaskError extends Error {
  constructor(public readonly typeName: string) {
    super(`Unknown task type: ${typeName}`);
    this.name = 'UnknownTaskError';
  }
}

export class DuplicateTaskError extends Error {
  constructor(public readonly typeName: string) {
    super(`Task type already registered: ${typeName}`);
    this.name = 'DuplicateTaskError';
  }
}

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

export class UnknownFormatError extends Error {
  constructor(public readonly extension: string) {
    super(`No scan data format for extension "${extension}"`);
    this.name = 'UnknownFormatError';
  }
}

export class ScanFormatError extends Error {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ScanFormatError';
  }
}
