import type { CompiledTemplate } from './template-store';
import type { MessageResult, RenderingContext, TemplateType } from '../../types/message';

export interface MessageRendererOptions {
  bodyTemplate: CompiledTemplate;
  subjectTemplate?: CompiledTemplate | null;
  type: TemplateType;
  extraContext?: RenderingContext;
}

/**
 * Renders a message body, and a subject when one is configured, from a context.
 */
export class MessageRenderer {
  readonly bodyTemplate: CompiledTemplate;
  readonly subjectTemplate: CompiledTemplate | null;
  readonly type: TemplateType;
  private readonly extraContext: Readonly<RenderingContext>;

  constructor(options: MessageRendererOptions) {
    this.bodyTemplate = options.bodyTemplate;
    this.subjectTemplate = options.subjectTemplate ?? null;
    this.type = options.type;
    this.extraContext = Object.freeze({ ...options.extraContext });
  }

  /**
   * Apply the configured extra context over a computed one. Extra context wins.
   */
  mergeExtraContext(context: RenderingContext): RenderingContext {
    return { ...context, ...this.extraContext };
  }

  render(context: RenderingContext): MessageResult {
    const body = this.bodyTemplate.render(context);
    const result: MessageResult = { body, type: this.type };

    if (this.subjectTemplate !== null) {
      result.subject = this.subjectTemplate.render(context);
    }

    return result;
  }
}
