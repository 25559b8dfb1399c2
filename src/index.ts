/**
 * Sigmark Mail Filter Plugin
 * Renders signature-embedded HTML into multipart/alternative messages
 *
 * @packageDocumentation
 */

import type {
  SigmarkConfig,
  PluginContext,
  FilterResult,
  FilterStats,
  Logger,
} from './types.js';

import { SigmarkConfigSchema } from './types.js';
import { MailFilter } from './filter/mail_filter.js';
import { createCliCommands } from './cli/sigmark.js';
import { PLUGIN_NAME, PLUGIN_VERSION } from './version.js';

// ============================================================================
// Plugin Metadata
// ============================================================================

export { PLUGIN_NAME, PLUGIN_VERSION };
export const PLUGIN_DESCRIPTION = 'Signature HTML rendering for plain-text mail';

// ============================================================================
// Plugin Entry Point
// ============================================================================

/**
 * Initialize the Sigmark plugin
 * This is the main entry point called by the host when loading the plugin
 */
export function activate(context: PluginContext): Promise<SigmarkPlugin> {
  const { config: rawConfig, logger, gateway } = context;

  // Validate configuration
  const configResult = SigmarkConfigSchema.safeParse(rawConfig);
  if (!configResult.success) {
    logger.error('Invalid Sigmark configuration', {
      errors: configResult.error.errors,
    });
    throw new Error(`Invalid Sigmark configuration: ${configResult.error.message}`);
  }

  const config = configResult.data;

  logger.info('Initializing Sigmark plugin', {
    version: PLUGIN_VERSION,
    imagePath: config.imagePath,
    addAuditHeader: config.addAuditHeader,
    onError: config.onError,
  });

  const filter = new MailFilter(config, logger, entry => gateway.emitAuditLog(entry));
  const plugin = new SigmarkPlugin(config, logger, filter);

  gateway.registerMailFilter({
    name: PLUGIN_NAME,
    handler: async (raw: Buffer) => plugin.filterMessage(raw),
  });

  logger.info('Registered mail filter', { name: PLUGIN_NAME });

  const cliCommands = createCliCommands(config, logger, filter);
  for (const command of cliCommands) {
    gateway.registerCliCommand(command);
  }

  logger.info('Sigmark plugin activated successfully', {
    registeredCommands: cliCommands.map(c => c.name),
  });

  return Promise.resolve(plugin);
}

/**
 * Deactivate the plugin (cleanup)
 */
export function deactivate(plugin: SigmarkPlugin): void {
  plugin.logger.info('Deactivating Sigmark plugin', { ...plugin.getStats() });
  plugin.resetStats();
}

// ============================================================================
// Plugin Class
// ============================================================================

export class SigmarkPlugin {
  readonly config: SigmarkConfig;
  readonly logger: Logger;
  private filter: MailFilter;

  constructor(config: SigmarkConfig, logger: Logger, filter: MailFilter) {
    this.config = config;
    this.logger = logger;
    this.filter = filter;
  }

  filterMessage(raw: Buffer | string): FilterResult {
    return this.filter.process(raw);
  }

  getStats(): FilterStats {
    return this.filter.getStats();
  }

  resetStats(): void {
    this.filter.resetStats();
  }
}

// ============================================================================
// Exports
// ============================================================================

// Re-export types for consumers
export type {
  SigmarkConfig,
  MimePart,
  MimeLeaf,
  MimeMultipart,
  MimeHeader,
  TextSegment,
  ImageReference,
  ResolvedAttachment,
  EligibilityDecision,
  RewriteOutcome,
  FilterResult,
  FilterStats,
  AuditLogEntry,
} from './types.js';

// Re-export key utilities
export { SigmarkConfigSchema } from './types.js';
export { MessageRewriter, findFirstTextPart } from './rewrite/rewriter.js';
export { assembleBody } from './rewrite/assembler.js';
export { splitSignature } from './signature/splitter.js';
export { classifySignature, containsHtmlMarker } from './signature/classifier.js';
export { resolveImages, hasResolvableImages, findImageReferences } from './html/image_resolver.js';
export { parseMessage } from './mime/parser.js';
export { serializeMessage } from './mime/serializer.js';
export { ContentIdGenerator } from './mime/content_id.js';
export { MailFilter } from './filter/mail_filter.js';
export { SigmarkError, DecodeError, ImageResolutionError, StructuralError } from './errors.js';
