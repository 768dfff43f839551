/**
 * Message Formatters
 *
 * Turn a finished build, or a worker that went away, into a notification
 * message ready for a delivery channel (mail, chat). Formatting is a linear
 * pipeline: assemble context, run the extension hook, apply the configured
 * extra context, render.
 */

import type {
  BuildRecord,
  MasterContext,
  ReportingMode,
  WorkerRecord,
} from '../types/build';
import type {
  AdditionalContextHook,
  MessageResult,
  RenderingContext,
  TemplateType,
} from '../types/message';
import { DEFAULT_TEMPLATES, DEFAULT_TEMPLATE_TYPE } from '../lib/constants';
import { normalizeError } from '../lib/errors';
import { createPerformanceLogger, formatterLogger } from '../lib/logger';
import { urlUtils } from '../lib/utils';
import {
  parseBuildFormatterOptions,
  parseFormatterOptions,
} from '../lib/validation';
import type {
  BuildFormatterOptions,
  BuildFormatterOptionsInput,
  FormatterOptions,
  FormatterOptionsInput,
} from '../lib/validation';
import { buildContextForMissingWorker, buildContextForResult } from './message/context';
import { projectsText } from './message/status-text';
import { MessageRenderer } from './templates/message-renderer';
import { templateStore } from './templates/template-store';

export type MissingWorkerFormatterOptions = FormatterOptionsInput & {
  buildAdditionalContext?: AdditionalContextHook;
};

export type MessageFormatterOptions = BuildFormatterOptionsInput & {
  buildAdditionalContext?: AdditionalContextHook;
};

export abstract class MessageFormatterBase<TOptions extends FormatterOptions = FormatterOptions> {
  readonly renderer: MessageRenderer;
  protected readonly options: TOptions;
  private readonly additionalContextHook?: AdditionalContextHook;

  protected constructor(
    options: TOptions,
    defaultTemplateFilename: string,
    additionalContextHook?: AdditionalContextHook
  ) {
    this.options = options;
    this.additionalContextHook = additionalContextHook;

    const type: TemplateType = options.templateType ?? DEFAULT_TEMPLATE_TYPE;
    const noEscape = type === 'plain';

    const bodyTemplate = templateStore.resolve({
      content: options.template,
      directory: options.templateDirectory,
      filename: options.templateFilename,
      defaultFilename: defaultTemplateFilename,
      noEscape,
    });

    const subjectTemplate = options.subjectFilename || options.subject
      ? templateStore.resolve({
          content: options.subject,
          directory: options.templateDirectory,
          filename: options.subjectFilename,
          defaultFilename: defaultTemplateFilename,
          noEscape,
        })
      : null;

    this.renderer = new MessageRenderer({
      bodyTemplate,
      subjectTemplate,
      type,
      extraContext: options.extraContext,
    });
  }

  get templateType(): TemplateType {
    return this.renderer.type;
  }

  /**
   * Extension point run before rendering. Add or override context entries
   * in place. The default runs the hook given at construction, if any.
   */
  protected async buildAdditionalContext(master: MasterContext, context: RenderingContext): Promise<void> {
    if (this.additionalContextHook) {
      await this.additionalContextHook(master, context);
    }
  }

  protected async renderMessage(
    operation: string,
    master: MasterContext,
    context: RenderingContext,
    logContext: Record<string, unknown>
  ): Promise<MessageResult> {
    const perf = createPerformanceLogger(operation, formatterLogger);

    try {
      await this.buildAdditionalContext(master, context);
      const message = this.renderer.render(this.renderer.mergeExtraContext(context));
      perf.end({ ...logContext, type: message.type });
      return message;
    } catch (error) {
      perf.error(normalizeError(error), logContext);
      throw error;
    }
  }

  /**
   * Two formatters are equal when they render from the same template sources
   * with the same type.
   */
  equals(other: unknown): boolean {
    if (!(other instanceof MessageFormatterBase) || other.constructor !== this.constructor) {
      return false;
    }

    return (
      other.renderer.bodyTemplate.sourceId === this.renderer.bodyTemplate.sourceId &&
      other.renderer.subjectTemplate?.sourceId === this.renderer.subjectTemplate?.sourceId &&
      other.templateType === this.templateType &&
      this.hasSameSettings(other)
    );
  }

  protected hasSameSettings(_other: MessageFormatterBase): boolean {
    return true;
  }
}

/**
 * Formats the message sent when a build finishes.
 */
export class MessageFormatter extends MessageFormatterBase<BuildFormatterOptions> {
  constructor(options: MessageFormatterOptions = {}) {
    const { buildAdditionalContext, ...settings } = options;
    super(parseBuildFormatterOptions(settings), DEFAULT_TEMPLATES.BUILD_RESULT, buildAdditionalContext);
  }

  // Hints for the caller fetching the build record
  get wantProperties(): boolean {
    return this.options.wantProperties;
  }

  get wantSteps(): boolean {
    return this.options.wantSteps;
  }

  get wantLogs(): boolean {
    return this.options.wantLogs;
  }

  async formatForBuild(
    mode: ReportingMode,
    builderName: string,
    build: BuildRecord,
    master: MasterContext,
    blamelist: readonly string[]
  ): Promise<MessageResult> {
    const { title, buildbotURL } = master.config;
    const previousResults = build.prev_build ? build.prev_build.results : null;

    const context = buildContextForResult({
      mode,
      builderName,
      build,
      previousResults,
      blamelist,
      projectsText: projectsText(build.buildset.sourcestamps, title),
      buildURL: urlUtils.getURLForBuild(buildbotURL, build.builder.builderid, build.number),
      buildbotURL,
    });

    return this.renderMessage('formatForBuild', master, context, {
      builder: builderName,
      buildNumber: build.number,
    });
  }

  protected hasSameSettings(other: MessageFormatterBase): boolean {
    return (
      other instanceof MessageFormatter &&
      other.wantProperties === this.wantProperties &&
      other.wantSteps === this.wantSteps &&
      other.wantLogs === this.wantLogs
    );
  }
}

/**
 * Formats the message sent when a worker has been missing for too long.
 */
export class MissingWorkerMessageFormatter extends MessageFormatterBase {
  constructor(options: MissingWorkerFormatterOptions = {}) {
    const { buildAdditionalContext, ...settings } = options;
    super(parseFormatterOptions(settings), DEFAULT_TEMPLATES.MISSING_WORKER, buildAdditionalContext);
  }

  async formatForMissingWorker(master: MasterContext, worker: WorkerRecord): Promise<MessageResult> {
    const context = buildContextForMissingWorker(master.config.title, master.config.buildbotURL, worker);

    return this.renderMessage('formatForMissingWorker', master, context, {
      worker: worker.name,
    });
  }
}
