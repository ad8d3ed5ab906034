#!/usr/bin/env node

import 'reflect-metadata';
import dotenv from 'dotenv';
import { loadConfigFromEnv } from '../config/load-config-from-env';
import {
  generateDefinitionsMigration,
  generateMigration,
  writeMigration,
} from './generate-migration';
import { runWorker } from './worker';

const USAGE =
  'Usage: event-workflows <command> [arguments]\n\n' +
  'Commands:\n' +
  '  worker                                 Consume the event stream (settings from env / .env)\n' +
  '  generate-migration <tableName>         dbmate migration for an instance table and its history\n' +
  '  generate-definitions-migration <table> dbmate migration for a workflow definitions table\n\n' +
  'Example:\n' +
  '  npx event-workflows generate-migration workflow_instances';

export async function main(argv: string[]): Promise<number> {
  const [command, tableName] = argv;

  if (!command || command === '--help' || command === '-h') {
    console.log(USAGE);
    return command ? 0 : 1;
  }

  switch (command) {
    case 'worker':
      dotenv.config();
      await runWorker(loadConfigFromEnv(process.env));
      return 0;

    case 'generate-migration':
    case 'generate-definitions-migration': {
      if (!tableName) {
        console.error('Error: tableName argument is required.');
        console.error(`Usage: event-workflows ${command} <tableName>`);
        return 1;
      }
      const sql =
        command === 'generate-migration'
          ? generateMigration(tableName)
          : generateDefinitionsMigration(tableName);
      console.log(`Migration created: ${writeMigration(tableName, sql)}`);
      return 0;
    }

    default:
      console.error(`Unknown command: ${command}`);
      console.error(
        'Available commands: worker, generate-migration, generate-definitions-migration',
      );
      return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    },
  );
}
