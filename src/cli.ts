#!/usr/bin/env node
/**
 * Scrawl CLI
 *
 * Usage:
 *   scrawl                 Start the read loop
 *   scrawl '<source>'      Evaluate once and print the result
 *   scrawl --help
 *   scrawl --version
 */

import * as fs from 'node:fs';
import { loadConfig, type CliConfig } from './cli-config.js';
import { startRepl } from './cli-repl.js';
import {
  formatError,
  formatOutput,
  parseCliArgs,
} from './cli-shared.js';
import { parse } from './parser/index.js';
import {
  createRuntimeContext,
  execute,
  type ExecutionResult,
} from './runtime/index.js';

/**
 * Evaluate source in a fresh context
 */
function evaluateSource(
  source: string,
  config: CliConfig
): ExecutionResult {
  const ctx = createRuntimeContext({
    maxCallDepth: config.maxCallDepth,
    callbacks: {
      onLog: (value) => console.log(formatOutput(value)),
    },
  });
  const ast = parse(source, { requireSemicolons: config.requireSemicolons });
  return execute(ast, ctx);
}

function showHelp(): void {
  console.log(`Scrawl

Usage:
  scrawl                 Start an interactive session
  scrawl <source>        Evaluate source and print the result
  scrawl --help          Show this help message
  scrawl --version       Show version information

Configuration is read from .scrawlrc.yaml in the working directory.

Examples:
  scrawl 'let x = 5 + (4 / 3); x'
  scrawl 'fn add(x, y) { x + y } add(3, 4)'`);
}

function showVersion(): void {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    fs.readFileSync(packageJsonPath, 'utf-8')
  );
  const version =
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
      ? packageJson.version
      : 'unknown';
  console.log(`scrawl ${version}`);
}

/**
 * Entry point for the scrawl binary
 */
async function main(): Promise<void> {
  try {
    const command = parseCliArgs(process.argv.slice(2));

    if (command.mode === 'help') {
      showHelp();
      return;
    }

    if (command.mode === 'version') {
      showVersion();
      return;
    }

    const config = loadConfig(process.cwd());

    if (command.mode === 'repl') {
      await startRepl(config);
      return;
    }

    const result = evaluateSource(command.source, config);
    console.log(formatOutput(result.value));
  } catch (err) {
    console.error(err instanceof Error ? formatError(err) : String(err));
    process.exitCode = 1;
  }
}

await main();
