#!/usr/bin/env node

import { Command } from 'commander';
import dotenv from 'dotenv';
import { type CliOptions, loadRunConfig } from './config';
import { log } from './logger';
import { SystemOperations } from './operations';
import { SyncWorkflow } from './sync-workflow';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('ts-sync-openapi')
    .description('Sync OpenAPI specs and fixtures into the public repository and publish a release')
    .version('1.0.0')
    .option('-s, --source <dir>', 'upstream checkout holding the OpenAPI files (SYNC_SOURCE_DIR)')
    .option('-t, --target <dir>', 'public repository checkout (SYNC_TARGET_DIR, default: .)')
    .option('--org <org>', 'GitHub organization of the public repository (SYNC_ORG)')
    .option('--repo <repo>', 'GitHub repository name (SYNC_REPO)')
    .option('-b, --branch <name>', 'branch the source checkout must be on (SYNC_EXPECTED_BRANCH, default: master)')
    .option('--dry-run', 'commit locally but do not push or create a release (DRY_RUN)')
    .addHelpText('after', '\nTo run the unit tests instead of a sync, use `npm test`.')
    .action(async (options: CliOptions) => {
      const config = loadRunConfig(options);
      if (config.dryRun) {
        log.info('Dry run enabled');
      }
      const workflow = new SyncWorkflow(config, new SystemOperations(config));
      await workflow.run();
      log.success('OpenAPI sync completed');
    });

  return program;
}

async function main() {
  dotenv.config();
  await buildProgram().parseAsync(process.argv);
}

if (require.main === module) {
  main().catch(error => {
    log.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
