/**
 * Message Formatting Types
 */

import type { MasterContext } from './build';

export type TemplateType = 'plain' | 'html';

export type RenderingContext = Record<string, unknown>;

export interface MessageResult {
  body: string;
  type: TemplateType;
  subject?: string;
}

// Receives the freshly assembled context and may add or override entries
export type AdditionalContextHook = (
  master: MasterContext,
  context: RenderingContext
) => Promise<void> | void;
