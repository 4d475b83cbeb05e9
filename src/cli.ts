#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadConfig } from './config/config.js';
import { SpreadsheetProcessor } from './file-processing/spreadsheet-processor.js';
import { SheetQA } from './SheetQA.js';
import { errorMessage } from './utils/errors.js';

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('sheetqa')
    .usage('$0 --file planilha.xlsx --question "Quantos registros existem?"')
    .option('file', { alias: 'f', type: 'string', demandOption: true, desc: 'Path to the .xlsx spreadsheet' })
    .option('question', { alias: 'q', type: 'string', array: true, demandOption: true, desc: 'Question about the rows (repeatable)' })
    .option('sheet', { alias: 's', type: 'string', desc: 'Sheet to read (defaults to the first one)' })
    .option('explain', { type: 'boolean', default: false, desc: 'Print how each question was interpreted' })
    .strict()
    .help()
    .parse();

  const config = loadConfig();
  const processor = new SpreadsheetProcessor(config.maxUploadBytes);
  const loaded = await processor.processPath(argv.file, { sheet: argv.sheet });
  const qa = new SheetQA({ threshold: config.matchThreshold, listLimit: config.listLimit });

  console.log(`--- ${loaded.originalName} [${loaded.sheetName}]: ${loaded.metadata.rowCount} rows ---`);
  for (const question of argv.question) {
    const result = qa.ask(loaded.table, question);
    console.log(`\n> ${question}`);
    console.log(result.answer);
    if (argv.explain) {
      console.log(result.explanation);
    }
  }
}

main().catch((e: unknown) => {
  console.error(errorMessage(e));
  process.exit(1);
});
