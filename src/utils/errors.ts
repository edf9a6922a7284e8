export class ImporterError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ImporterError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends ImporterError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class NotesError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('NOTES', message, options);
    this.name = 'NotesError';
  }
}

export class ExportSourceError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('EXPORTS', message, options);
    this.name = 'ExportSourceError';
  }
}

export class TemplateError extends ImporterError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'TEMPLATE_ERROR', options);
    this.name = 'TemplateError';
  }
}

export class ConfigError extends ImporterError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
