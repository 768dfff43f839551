/**
 * Template Store
 * Resolves inline or file-based Handlebars templates into compiled, reusable templates
 */

import handlebars from 'handlebars';
import * as fs from 'fs';
import * as path from 'path';
import { templateLogger } from '../../lib/logger';
import {
  ConfigurationError,
  TemplateNotFoundError,
  TemplateSyntaxError,
  UndefinedContextKeyError,
} from '../../lib/errors';
import type { RenderingContext } from '../../types/message';

export const BUNDLED_TEMPLATE_DIR = path.join(__dirname, 'bundled');

export interface TemplateResolveOptions {
  content?: string | null;
  directory?: string | null;
  filename?: string | null;
  defaultFilename: string;
  // Plain-text templates render substitutions as-is; html ones escape them
  noEscape?: boolean;
}

export interface CompiledTemplate {
  // "inline:<content>" or "file:<absolute path>"
  readonly sourceId: string;
  render(context: RenderingContext): string;
}

// Lookup failures raised while rendering in strict mode; group 1 is the key
const MISSING_KEY_PATTERNS = [
  /^"(.+?)" not defined in/,
  // a path segment looked up on a primitive, e.g. {{summary.length}}
  /^Cannot use 'in' operator to search for '(.+?)' in/,
  // a path segment looked up below a missing parent, e.g. {{wrkr.name.first}}
  /^Cannot read properties of (?:undefined|null) \(reading '(.+?)'\)/,
];

// Built-in block helpers that must not treat a missing argument as falsy
const STRICT_BLOCK_HELPERS = ['if', 'unless', 'each', 'with'] as const;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// Path of the index-th helper argument as written in the template. Needs trackIds.
const argumentPath = (options: unknown, index: number, fallback: string): string => {
  if (typeof options === 'object' && options !== null && 'ids' in options && Array.isArray(options.ids)) {
    const id: unknown = options.ids[index];
    if (typeof id === 'string' && id !== '') {
      return id;
    }
  }
  return fallback;
};

// Helpers receive Handlebars' options object as their last argument
const requireArgument = (args: unknown[], index: number, helperName: string): unknown => {
  const value = args[index];
  if (value === undefined) {
    throw new UndefinedContextKeyError(argumentPath(args[args.length - 1], index, `argument ${index + 1} of ${helperName}`));
  }
  return value;
};

export class TemplateStore {
  private readonly env: typeof handlebars;
  private compiledTemplates: Map<string, CompiledTemplate> = new Map();

  constructor() {
    this.env = handlebars.create();
    this.registerHelpers();
  }

  /**
   * Register Handlebars helpers used by the bundled templates
   */
  private registerHelpers(): void {
    for (const name of STRICT_BLOCK_HELPERS) {
      const builtIn = this.env.helpers[name];
      this.env.registerHelper(name, function (this: unknown, ...args: unknown[]) {
        // a lone argument is the options object: let the built-in report the arity error
        if (args.length > 1) {
          requireArgument(args, 0, `#${name}`);
        }
        return Reflect.apply(builtIn, this, args);
      });
    }

    // {{join blamelist}} or {{join list " | "}}
    this.env.registerHelper('join', (...args: unknown[]) => {
      const list = requireArgument(args, 0, 'join');
      const separator = args.length > 2 ? args[1] : undefined;
      const sep = typeof separator === 'string' ? separator : ', ';
      return Array.isArray(list) ? list.map(item => String(item)).join(sep) : '';
    });

    // {{#if (has worker "last_connection")}}: key present with a non-null value
    this.env.registerHelper('has', (...args: unknown[]) => {
      const target = requireArgument(args, 0, 'has');
      const key = args.length > 2 ? args[1] : undefined;
      if (typeof key !== 'string' || typeof target !== 'object' || target === null) {
        return false;
      }
      if (!Object.prototype.hasOwnProperty.call(target, key)) {
        return false;
      }
      const value: unknown = Reflect.get(target, key);
      return value !== null && value !== undefined;
    });

    // {{property build "reason" "<unknown>"}}: value part of a [value, source] build property
    this.env.registerHelper('property', (...args: unknown[]) => {
      const build = requireArgument(args, 0, 'property');
      const name = args.length > 2 ? args[1] : undefined;
      const fallback = args.length > 3 ? args[2] : undefined;
      const defaultValue = typeof fallback === 'string' ? fallback : '';
      if (typeof name !== 'string' || typeof build !== 'object' || build === null || !('properties' in build)) {
        return defaultValue;
      }
      const properties: unknown = build.properties;
      if (typeof properties !== 'object' || properties === null) {
        return defaultValue;
      }
      const property: unknown = Object.prototype.hasOwnProperty.call(properties, name)
        ? Reflect.get(properties, name)
        : undefined;
      return Array.isArray(property) ? property[0] : defaultValue;
    });
  }

  /**
   * Resolve a template from inline content, or from a file in a search directory
   */
  resolve(options: TemplateResolveOptions): CompiledTemplate {
    const { content, directory, filename, defaultFilename, noEscape = false } = options;

    if (content && (filename || directory)) {
      throw new ConfigurationError('Only one of template or template path can be given', {
        directory,
        filename,
      });
    }

    // inline content is compiled per call: each distinct string would otherwise stay cached for good
    if (content) {
      return this.compile(`inline:${content}`, content, noEscape);
    }

    const templatePath = path.resolve(directory ?? BUNDLED_TEMPLATE_DIR, filename ?? defaultFilename);
    const sourceId = `file:${templatePath}`;
    const cached = this.compiledTemplates.get(this.cacheKey(sourceId, noEscape));
    if (cached) {
      return cached;
    }

    if (!fs.existsSync(templatePath) || !fs.statSync(templatePath).isFile()) {
      throw new TemplateNotFoundError(templatePath);
    }

    const source = fs.readFileSync(templatePath, 'utf8');
    return this.compile(sourceId, source, noEscape);
  }

  /**
   * Drop every compiled file template
   */
  clearCache(): void {
    this.compiledTemplates.clear();
  }

  private cacheKey(sourceId: string, noEscape: boolean): string {
    return `${noEscape ? 'raw' : 'escaped'}|${sourceId}`;
  }

  private compile(sourceId: string, source: string, noEscape: boolean): CompiledTemplate {
    // trackIds hands helpers the argument paths, used to name missing keys
    const compileOptions = { strict: true, noEscape, trackIds: true };
    let delegate: HandlebarsTemplateDelegate<RenderingContext>;
    try {
      const ast = this.env.parse(source);
      // precompile surfaces compiler errors now rather than at first render
      this.env.precompile(ast, compileOptions);
      delegate = this.env.compile<RenderingContext>(ast, compileOptions);
    } catch (error) {
      throw new TemplateSyntaxError(errorMessage(error), {
        source: sourceId.startsWith('file:') ? sourceId.slice('file:'.length) : 'inline',
      });
    }

    const template: CompiledTemplate = {
      sourceId,
      render: (context: RenderingContext): string => {
        try {
          return delegate(context);
        } catch (error) {
          if (error instanceof UndefinedContextKeyError) {
            throw error;
          }
          const message = errorMessage(error);
          for (const pattern of MISSING_KEY_PATTERNS) {
            const missing = pattern.exec(message);
            if (missing) {
              throw new UndefinedContextKeyError(missing[1], { template: sourceId });
            }
          }
          throw error;
        }
      },
    };

    if (sourceId.startsWith('file:')) {
      this.compiledTemplates.set(this.cacheKey(sourceId, noEscape), template);
    }
    templateLogger.debug({ sourceId: sourceId.slice(0, 120), noEscape }, 'Template compiled');
    return template;
  }
}

export const templateStore = new TemplateStore();
