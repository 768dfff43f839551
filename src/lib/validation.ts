import { z } from 'zod';
import { ConfigurationError, formatZodError } from './errors';
import { formatterLogger } from './logger';

// Options shared by every message formatter
export const formatterOptionsSchema = z.object({
  templateDirectory: z.string().min(1, 'Template directory cannot be empty').optional(),
  templateFilename: z.string().min(1, 'Template filename cannot be empty').optional(),
  template: z.string().optional(),
  subjectFilename: z.string().min(1, 'Subject filename cannot be empty').optional(),
  subject: z.string().optional(),
  templateType: z.enum(['plain', 'html']).optional(),
  extraContext: z.record(z.unknown()).optional(),
}).strict();

// Build-result formatters also carry data-fetching hints and the deprecated templateName
export const buildFormatterOptionsSchema = formatterOptionsSchema.extend({
  templateName: z.string().min(1, 'Template name cannot be empty').optional(),
  wantProperties: z.boolean().default(true),
  wantSteps: z.boolean().default(false),
  wantLogs: z.boolean().default(false),
}).strict();

export type FormatterOptionsInput = z.input<typeof formatterOptionsSchema>;
export type FormatterOptions = z.output<typeof formatterOptionsSchema>;
export type BuildFormatterOptionsInput = z.input<typeof buildFormatterOptionsSchema>;
export type BuildFormatterOptions = Omit<z.output<typeof buildFormatterOptionsSchema>, 'templateName'>;

// Validation helper
export const validateSchema = <T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> => {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(`Invalid formatter options: ${formatZodError(result.error)}`, {
      issues: result.error.errors,
    });
  }
  return result.data;
};

export const parseFormatterOptions = (data: unknown): FormatterOptions => {
  return validateSchema(formatterOptionsSchema, data);
};

/**
 * Validate build formatter options, translating the deprecated `templateName`
 * into `templateFilename`.
 */
export const parseBuildFormatterOptions = (data: unknown): BuildFormatterOptions => {
  const { templateName, ...options } = validateSchema(buildFormatterOptionsSchema, data);

  if (templateName === undefined) {
    return options;
  }

  // templateName wins over templateFilename when both are given
  formatterLogger.warn(
    { templateName, ignoredTemplateFilename: options.templateFilename },
    'templateName is deprecated, use templateFilename'
  );
  return { ...options, templateFilename: templateName };
};
