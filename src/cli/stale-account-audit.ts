#!/usr/bin/env node
/**
 * Stale account audit CLI
 * Flags identity accounts with no sign-in during the inactivity window
 */

import { Command, Option } from 'commander';
import { config as loadEnv } from 'dotenv';
import { AuditConfig, loadAuditConfig } from '../config/audit.config';
import { ConfigurationError, DirectoryFetchError } from '../services/base/errors';
import { AuditServiceOverrides, createAuditServices } from '../services/service.factory';
import { ConsoleReporter } from '../utils/console-reporter';
import { configureDiagnosticLog, flushLogger, logger } from '../utils/logger';

export function buildProgram(): Command {
  return new Command()
    .name('stale-account-audit')
    .description('Report identity accounts with no sign-in in the last 90 days')
    .addOption(
      new Option('-t, --token <token>', 'API bearer token')
        .makeOptionMandatory()
        .hideHelp()
    );
}

export interface RunAuditOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  overrides?: AuditServiceOverrides;
}

/**
 * Run the audit and map the outcome onto a process exit code
 */
export async function runAudit(token: string, options: RunAuditOptions = {}): Promise<number> {
  const reporter = options.overrides?.reporter ?? new ConsoleReporter();

  let config: AuditConfig;
  try {
    config = loadAuditConfig({ token, env: options.env, cwd: options.cwd });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      reporter.error(error.message);
      return 1;
    }
    throw error;
  }

  logger.level = config.logLevel;
  const logPath = configureDiagnosticLog(config.diagnosticLog, config.logLevel);
  const { runner } = createAuditServices(config, { ...options.overrides, reporter });

  try {
    await runner.run();
    return 0;
  } catch (error) {
    if (error instanceof DirectoryFetchError) {
      logger.error(error.message, { code: error.code, cause: error.cause?.message });
      reporter.error(`Error fetching IAM accounts. Check ${logPath}`);
    } else {
      logger.error('Audit run failed', error);
      reporter.error(`Audit run failed. Check ${logPath}`);
    }
    return 1;
  }
}

/**
 * CLI entry. Every exit path flushes the diagnostic log before returning
 * the exit code.
 */
export async function main(argv: string[]): Promise<number> {
  let exitCode = 1;
  try {
    loadEnv();
    const program = buildProgram();
    program.parse(argv);
    const { token } = program.opts<{ token: string }>();
    exitCode = await runAudit(token);
  } catch (error) {
    logger.error('Audit run aborted', error);
    console.error('Audit run aborted. Check the diagnostic log for details.');
  }

  await flushLogger();
  return exitCode;
}

if (require.main === module) {
  void main(process.argv).then(exitCode => {
    process.exitCode = exitCode;
  });
}
