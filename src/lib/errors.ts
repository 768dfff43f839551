import { ZodError } from 'zod';

// Base application error class
export class AppError extends Error {
  public readonly isOperational: boolean;
  public readonly code?: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    isOperational: boolean = true,
    code?: string,
    context?: Record<string, unknown>
  ) {
    super(message);

    this.name = this.constructor.name;
    this.isOperational = isOperational;
    this.code = code;
    this.context = context;

    // Maintain proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(includeStack: boolean = false) {
    return {
      name: this.name,
      message: this.message,
      ...(this.code ? { code: this.code } : {}),
      ...(this.context ? { context: this.context } : {}),
      ...(includeStack && this.stack ? { stack: this.stack } : {}),
    };
  }
}

// Raised while a formatter is being configured
export class ConfigurationError extends AppError {
  constructor(message: string = 'Invalid configuration', context?: Record<string, unknown>) {
    super(message, true, 'CONFIGURATION_ERROR', context);
  }
}

export class TemplateNotFoundError extends AppError {
  public readonly templatePath: string;

  constructor(templatePath: string, context?: Record<string, unknown>) {
    super(`Template not found: ${templatePath}`, true, 'TEMPLATE_NOT_FOUND', { templatePath, ...context });
    this.templatePath = templatePath;
  }
}

export class TemplateSyntaxError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, true, 'TEMPLATE_SYNTAX_ERROR', context);
  }
}

// A template referenced a key the context never received. Always a formatter bug.
export class UndefinedContextKeyError extends AppError {
  public readonly key: string;

  constructor(key: string, context?: Record<string, unknown>) {
    super(`'${key}' is undefined in the rendering context`, false, 'UNDEFINED_CONTEXT_KEY', { key, ...context });
    this.key = key;
  }
}

// Convert various error types to AppError
export const normalizeError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof ZodError) {
    return new ConfigurationError(formatZodError(error), { issues: error.errors });
  }

  if (error instanceof Error) {
    return new AppError(error.message, false, 'UNKNOWN_ERROR', { originalError: error.message });
  }

  // Handle non-Error objects
  return new AppError('An unexpected error occurred', false, 'UNKNOWN_ERROR', {
    originalError: String(error),
  });
};

export const formatZodError = (error: ZodError): string => {
  return error.errors
    .map(err => (err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message))
    .join('; ');
};
