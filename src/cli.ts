#!/usr/bin/env node
/**
 * hmac-gate CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts
 */

import 'reflect-metadata';
import { config as loadDotenv } from 'dotenv';
import { Command } from 'commander';
import fs from 'fs';
import { Result } from 'neverthrow';

import { initializeContainer, registerSecret, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ValidatedConfig } from './config/app-config.js';
import { resolveSecret } from './config/app-config.js';
import { Err } from './errors/factories.js';
import { formatAppError } from './errors/formatter.js';
import { getBootstrapLogger } from './core/logging/bootstrap.js';
import type { HmacSha256Port } from './ports/hmac-sha256.port.js';
import type { HttpServer } from './infrastructure/http/HttpServer.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { ShutdownEvents } from './runtime/ports/shutdown-events.js';

import { interpretCliResult } from './cli/interpret-result.js';
import { printResult } from './cli/output-formatter.js';
import { failure, misuse } from './cli/types/cli-result.js';
import type { BodyFileError } from './cli/commands/index.js';
import {
  executeSignRequestCommand,
  executeSignResponseCommand,
  executeVerifyCommand,
  executeServeCommand,
} from './cli/commands/index.js';

loadDotenv();

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

interface CliContext {
  readonly terminator: ProcessTerminator;
  readonly config: ValidatedConfig;
  readonly hmac: HmacSha256Port;
}

function createContext(): CliContext {
  const initResult = initializeContainer({ runtimeMode: { kind: 'cli' } });
  const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);

  if (initResult.isErr()) {
    printResult(misuse(formatAppError(initResult.error)));
    return terminator.terminate({ kind: 'misuse' });
  }

  return {
    terminator,
    config: container.resolve<ValidatedConfig>(DI.Config.App),
    hmac: container.resolve<HmacSha256Port>(DI.Crypto.HmacSha256),
  };
}

function toBodyFileError(error: unknown): BodyFileError {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { code, message: error.message };
  }
  return { message: String(error) };
}

const readBodyFile = (filePath: string): Result<Uint8Array, BodyFileError> =>
  Result.fromThrowable(() => new Uint8Array(fs.readFileSync(filePath)), toBodyFileError)();

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

interface GlobalOptions {
  readonly secret?: string;
}

interface BodyOptions {
  readonly body?: string;
  readonly bodyFile?: string;
}

const program = new Command();

program
  .name('hmac-gate')
  .description('Sign and verify HTTP requests and responses with HMAC-SHA256')
  .version('0.1.0')
  .option('-s, --secret <secret>', 'shared secret (defaults to HMAC_GATE_SECRET)');

function secretFromFlags(config: ValidatedConfig) {
  return resolveSecret(program.opts<GlobalOptions>().secret, config);
}

program
  .command('sign-request')
  .description('Print the header value a client must send with a request')
  .requiredOption('-m, --method <method>', 'HTTP method')
  .requiredOption('-p, --path <path>', 'request path, without query string')
  .option('-b, --body <text>', 'request body')
  .option('-f, --body-file <file>', 'read the request body from a file')
  .action((options: BodyOptions & { method: string; path: string }) => {
    const { terminator, config, hmac } = createContext();

    const result = executeSignRequestCommand(options, {
      secret: secretFromFlags(config),
      hmac,
      readBodyFile,
    });

    interpretCliResult(result, terminator);
  });

program
  .command('sign-response')
  .description('Print the header value a server attaches to a response body')
  .option('-b, --body <text>', 'response body')
  .option('-f, --body-file <file>', 'read the response body from a file')
  .action((options: BodyOptions) => {
    const { terminator, config, hmac } = createContext();

    const result = executeSignResponseCommand(options, {
      secret: secretFromFlags(config),
      hmac,
      readBodyFile,
    });

    interpretCliResult(result, terminator);
  });

program
  .command('verify')
  .description('Check a request signature the way the server would')
  .requiredOption('-m, --method <method>', 'HTTP method')
  .requiredOption('-p, --path <path>', 'request path, without query string')
  .requiredOption('--signature <hex>', 'header value to check')
  .option('-b, --body <text>', 'request body')
  .option('-f, --body-file <file>', 'read the request body from a file')
  .action((options: BodyOptions & { method: string; path: string; signature: string }) => {
    const { terminator, config, hmac } = createContext();

    const result = executeVerifyCommand(options, {
      secret: secretFromFlags(config),
      hmac,
      headerName: config.hmac.headerName,
      readBodyFile,
    });

    interpretCliResult(result, terminator);
  });

program
  .command('serve')
  .description('Start the "Hello, world!" demo server behind HMAC authentication')
  .option('--port <port>', 'port to listen on (defaults to HMAC_GATE_PORT)')
  .action(async (options: { port?: string }) => {
    const { terminator, config } = createContext();
    const shutdownEvents = container.resolve<ShutdownEvents>(DI.Runtime.ShutdownEvents);

    const result = await executeServeCommand(options, {
      secret: secretFromFlags(config),
      headerName: config.hmac.headerName,
      startServer: (secret, port) => {
        registerSecret(secret);
        return container.resolve<HttpServer>(DI.Infra.HttpServer).start(port);
      },
    });

    if (result.kind === 'success') {
      shutdownEvents.onShutdown(() => terminator.terminate({ kind: 'success' }));
    }

    // On success the server keeps the process alive until a signal arrives.
    interpretCliResult(result, terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync().catch((error: unknown) => {
  getBootstrapLogger().fatal({ err: error }, 'Unexpected error');
  printResult(failure(formatAppError(Err.unexpected('hmac-gate stopped on an unexpected error', error))));
  process.exitCode = 1;
});
