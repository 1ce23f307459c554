export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', details);
  }
}

export class TickParseError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TICK_PARSE', details);
  }
}
