/**
 * Read loop
 *
 * One persistent runtime context per session. Each line is parsed and
 * executed on its own; errors are reported and the loop keeps going.
 */

import * as readline from 'node:readline';
import type { CliConfig } from './cli-config.js';
import { formatAst, formatError, formatOutput } from './cli-shared.js';
import { parse } from './parser/index.js';
import {
  createRuntimeContext,
  execute,
  type RuntimeContext,
} from './runtime/index.js';

export interface ReplOutput {
  out(line: string): void;
  err(line: string): void;
}

export interface ReplSession {
  readonly context: RuntimeContext;
  /** Returns false when the line ends the session */
  handleLine(line: string): boolean;
}

export function createReplSession(
  config: CliConfig,
  output: ReplOutput
): ReplSession {
  const context = createRuntimeContext({
    maxCallDepth: config.maxCallDepth,
    callbacks: {
      onLog: (value) => output.out(formatOutput(value)),
    },
  });

  return {
    context,
    handleLine(line: string): boolean {
      const input = line.trim();
      if (input === '' || input === config.exitCommand) {
        return false;
      }

      try {
        const program = parse(input, {
          requireSemicolons: config.requireSemicolons,
        });
        if (config.showAst) {
          output.out(formatAst(program));
        }
        const result = execute(program, context);
        output.out(formatOutput(result.value));
      } catch (err) {
        output.err(err instanceof Error ? formatError(err) : String(err));
      }
      return true;
    },
  };
}

/**
 * Run the read loop on stdin/stdout until the session ends or input closes.
 */
export function startRepl(config: CliConfig): Promise<void> {
  const session = createReplSession(config, {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: config.prompt,
  });

  return new Promise((resolve) => {
    rl.on('line', (line: string) => {
      if (session.handleLine(line)) {
        rl.prompt();
      } else {
        rl.close();
      }
    });
    rl.on('close', () => resolve());
    rl.prompt();
  });
}
