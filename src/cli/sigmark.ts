/**
 * Sigmark CLI Commands
 * Pipe filtering and message inspection from the command line
 */

import { readFileSync, writeFileSync, existsSync } from 'fs';

import type { CliCommand, Logger, SigmarkConfig } from '../types.js';
import { MailFilter } from '../filter/mail_filter.js';
import { parseMessage } from '../mime/parser.js';
import { getMessageId } from '../mime/headers.js';
import { MessageRewriter } from '../rewrite/rewriter.js';
import { classifySignature } from '../signature/classifier.js';

// ============================================================================
// CLI Output Helper
// ============================================================================

/**
 * CLI output helper that combines console display with structured logging
 */
class CLIOutput {
  constructor(private logger: Logger) {}

  /** Print to console and log at info level */
  info(message: string, data?: Record<string, unknown>): void {
    console.log(message);
    if (data) {
      this.logger.info(message.replace(/[^\w\s]/g, '').trim(), data);
    }
  }

  /** Print to console and log at error level */
  error(message: string, data?: Record<string, unknown>): void {
    console.log(message);
    this.logger.error(message.replace(/[^\w\s]/g, '').trim(), data ?? {});
  }

  /** Print to console only */
  print(message: string): void {
    console.log(message);
  }
}

// ============================================================================
// Input / Output
// ============================================================================

async function readStdin(): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

async function readInput(path: unknown): Promise<Buffer> {
  return typeof path === 'string' && path !== '' ? readFileSync(path) : readStdin();
}

function writeOutput(path: unknown, data: Buffer): void {
  if (typeof path === 'string' && path !== '') {
    writeFileSync(path, data);
  } else {
    process.stdout.write(data);
  }
}

// ============================================================================
// CLI Command Definitions
// ============================================================================

export function createCliCommands(config: SigmarkConfig, logger: Logger, filter: MailFilter): CliCommand[] {
  const output = new CLIOutput(logger);

  return [
    createFilterCommand(filter),
    createCheckCommand(config, logger, output),
    createStatusCommand(config, filter, output),
  ];
}

// ============================================================================
// Filter Command
// ============================================================================

function createFilterCommand(filter: MailFilter): CliCommand {
  return {
    name: 'sigmark:filter',
    description: 'Rewrite one message read from a file or stdin, writing the result to a file or stdout',
    options: [
      {
        name: 'input',
        alias: 'i',
        description: 'Path of the raw message (default: stdin)',
        type: 'string',
      },
      {
        name: 'output',
        alias: 'o',
        description: 'Path to write the filtered message to (default: stdout)',
        type: 'string',
      },
    ],
    handler: async (args) => {
      const raw = await readInput(args.input);
      const result = filter.process(raw);
      writeOutput(args.output, result.output);
    },
  };
}

// ============================================================================
// Check Command
// ============================================================================

function createCheckCommand(config: SigmarkConfig, logger: Logger, output: CLIOutput): CliCommand {
  return {
    name: 'sigmark:check',
    description: 'Report whether a message would be rewritten and how its signature is segmented',
    options: [
      {
        name: 'input',
        alias: 'i',
        description: 'Path of the raw message (default: stdin)',
        type: 'string',
      },
    ],
    handler: async (args) => {
      const message = parseMessage(await readInput(args.input));
      const rewriter = new MessageRewriter(config, logger);
      const decision = rewriter.evaluate(message);
      const messageId = getMessageId(message) || '(none)';

      output.print('\nSigmark Message Check\n');
      output.print('─'.repeat(50));
      output.print(`Message-ID: ${messageId}`);
      output.print(`Eligible: ${decision.eligible ? 'yes' : 'no'} (${decision.reason})`);

      const segments = classifySignature(decision.signature);
      if (segments.length === 0) {
        output.print('Signature segments: none');
        return;
      }

      output.print(`Signature segments: ${segments.length}`);
      segments.forEach((segment, index) => {
        const noun = segment.lineCount === 1 ? 'line' : 'lines';
        output.print(`  ${index + 1}. ${segment.kind} (${segment.lineCount} ${noun})`);
      });
    },
  };
}

// ============================================================================
// Status Command
// ============================================================================

function createStatusCommand(config: SigmarkConfig, filter: MailFilter, output: CLIOutput): CliCommand {
  return {
    name: 'sigmark:status',
    description: 'Show configuration summary and filter counters',
    handler: async () => {
      const stats = filter.getStats();

      output.print('\nSigmark Status\n');
      output.print('─'.repeat(50));
      if (existsSync(config.imagePath)) {
        output.print(`Image path: ${config.imagePath}`);
      } else {
        output.error(`Image path: ${config.imagePath} (missing)`, { imagePath: config.imagePath });
      }
      output.print(`Audit header: ${config.addAuditHeader ? config.auditHeaderName : 'disabled'}`);
      output.print(`Text encoding: ${config.textTransferEncoding}`);
      output.print(`On error: ${config.onError}`);
      output.info(
        `Messages: ${stats.processed} processed, ${stats.altered} altered, ${stats.passed} passed, ${stats.failed} failed`,
        { ...stats }
      );
    },
  };
}
