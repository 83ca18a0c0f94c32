#!/usr/bin/env node
import { Command } from 'commander';
import { fromStructure, readJsonFile } from './convert';
import { getExitCode, isStoreError } from './errors';
import * as read from './read';
import { openStore, type CalcStore } from './store';
import * as write from './write';

interface GlobalOptions {
  db?: string;
  logLevel?: string;
}

const program = new Command();

program
  .name('calcstore')
  .description('Content-addressed cache for quantum chemistry results')
  .version('0.1.0')
  .option('--db <path>', 'SQLite database file (default: $CALCSTORE_DB or .calcstore/calcstore.db)')
  .option('--log-level <level>', 'debug | info | warn | error | silent');

function withStore<T>(fn: (store: CalcStore) => T): T {
  const { db, logLevel } = program.opts<GlobalOptions>();
  const store = openStore({ dbPath: db, logLevel });
  try {
    return fn(store);
  } finally {
    store.close();
  }
}

program
  .command('init')
  .description('Create the database schema')
  .action(() => {
    withStore(() => undefined);
    console.log('calcstore: schema ready.');
  });

program
  .command('ingest <files...>')
  .description('Record QCIO results JSON files (one document or an array per file)')
  .action((files: string[]) => {
    withStore((store) => {
      let created = 0;
      let deduplicated = 0;
      let failed = 0;

      for (const file of files) {
        const content = readJsonFile(file);
        const documents = Array.isArray(content) ? content : [content];
        documents.forEach((document, index) => {
          try {
            const written = write.energy(document, store);
            if (written.calculation.created) {
              created++;
            } else {
              deduplicated++;
            }
          } catch (error) {
            if (!isStoreError(error)) throw error;
            failed++;
            console.error(`${file}[${index}]: ${error.message}`);
            process.exitCode = getExitCode(error);
          }
        });
      }

      console.log(`Ingested: ${created} new, ${deduplicated} already cached, ${failed} rejected.`);
    });
  });

program
  .command('energy <structure>')
  .description('Look up the cached energy for a QCIO structure JSON file')
  .requiredOption('-m, --method <method>', 'Method, e.g. HF')
  .option('-b, --basis <basis>', 'Basis set, e.g. STO-3G')
  .action((structureFile: string, options: { method: string; basis?: string }) => {
    const geometry = fromStructure(readJsonFile(structureFile));
    const value = withStore((store) => read.energyByMethod(geometry, options.method, options.basis ?? null, store));
    if (value === null) {
      console.log('No cached energy.');
      process.exitCode = 1;
      return;
    }
    console.log(value);
  });

program
  .command('stats')
  .description('Row counts per table')
  .action(() => {
    const counts = withStore((store) => store.counts());
    for (const [table, count] of Object.entries(counts)) {
      console.log(`${table.padEnd(18)} ${count}`);
    }
  });

try {
  program.parse();
} catch (error) {
  if (!isStoreError(error)) throw error;
  console.error(`Error: ${error.message}`);
  console.error(`Hint: ${error.hint}`);
  process.exitCode = getExitCode(error);
}
