#!/usr/bin/env node
/**
 * smtp-key-rotation CLI - Composition Root
 *
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts
 */

import 'dotenv/config';
import { Command } from 'commander';

import { initializeContainer, resolveService } from './di/container.js';
import { DI } from './di/tokens.js';
import { formatAppError } from './errors/formatter.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
import type { RotationStateMachine } from './rotation/usecases/rotation-state-machine.js';
import { NodeHmacSha256 } from './rotation/infra/local/hmac-sha256/index.js';
import { NodeBase64 } from './rotation/infra/local/base64/index.js';

import { interpretCliResult } from './cli/interpret-result.js';
import { failure } from './cli/types/cli-result.js';
import { executeAdvanceCommand, executeDerivePasswordCommand, DEFAULT_SECRET_ENV } from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('smtp-key-rotation')
  .description('Rotate the SES SMTP access key stored in a Secrets Manager secret')
  .version('1.0.0');

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS WITHOUT DI (pure computation)
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('derive-password')
  .description('Derive the SES SMTP password for a secret access key')
  .requiredOption('-r, --region <region>', 'SES region the password is valid for')
  .option('-e, --secret-env <variable>', 'environment variable holding the secret access key', DEFAULT_SECRET_ENV)
  .action((options: { region: string; secretEnv: string }) => {
    const result = executeDerivePasswordCommand(
      { region: options.region, secretEnv: options.secretEnv },
      { env: process.env, codec: { hmac: new NodeHmacSha256(), base64: new NodeBase64() } }
    );

    interpretCliResult(result, new NodeProcessTerminator());
  });

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS WITH DI (need AWS adapters)
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('advance')
  .description('Run one rotation phase (createSecret, setSecret, testSecret, finishSecret)')
  .requiredOption('-s, --secret-id <id>', 'secret ARN or name')
  .requiredOption('-t, --token <token>', 'client request token (version id) of the rotation')
  .requiredOption('--step <phase>', 'rotation phase to run')
  .action(async (options: { secretId: string; token: string; step: string }) => {
    const init = await initializeContainer({ runtimeMode: { kind: 'cli' } });
    if (init.isErr()) {
      interpretCliResult(failure(formatAppError(init.error), { exitCode: { kind: 'misuse' } }), new NodeProcessTerminator());
      return;
    }

    const services = resolveService<ProcessTerminator>(DI.Runtime.ProcessTerminator, 'the process terminator').andThen(
      (terminator) =>
        resolveService<RotationStateMachine>(DI.Rotation.StateMachine, 'the rotation state machine').map((machine) => ({
          terminator,
          machine,
        }))
    );
    if (services.isErr()) {
      interpretCliResult(failure(formatAppError(services.error)), new NodeProcessTerminator());
      return;
    }
    const { terminator, machine } = services.value;

    const result = await executeAdvanceCommand(options, {
      advance: (request) => machine.advance(request),
    });

    interpretCliResult(result, terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

await program.parseAsync();
