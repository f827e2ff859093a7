#!/usr/bin/env tsx
/**
 * Command-line entry point
 *
 * Usage:
 *   exhibit-linker <document> --exhibits <folder> [options]
 *   exhibit-linker rename <folder> [--apply]
 *
 * Options:
 *   --exhibits <folder>        folder holding the exhibit files (required)
 *   --column <letter|header>   spreadsheet column with the citations (.xlsx only)
 *   --sheet <name>             worksheet (default: first)
 *   --sanitize                 rename cited files to Chrome-safe names before linking
 *   --viewer <acrobat|chrome>  PDF viewer the links are written for
 *   --bates-prefix <PREFIX>    only link Bates numbers with this prefix
 *   --fuzzy-threshold <0..1>   minimum similarity for a fuzzy match
 *   --retries <n>              retries for locked files
 *   --out <path>               output path (default: beside the document)
 *   --log-level <level>        debug | info | warn | error
 */

import path from 'node:path';
import { parseArgs } from 'node:util';
import {
  JsonManifestWriter,
  SpreadsheetColumnDocument,
  XlsxLinkWriter,
  createLogger,
  describeError,
  formatCitation,
  isLinkerError,
  loadConfig,
  openSourceDocument,
  parseLogLevel,
  renameExhibitFiles,
  runLinker,
  setLogLevel,
  type LinkWriter,
  type LogLevel,
  type LinkerConfigInput,
  type SourceDocument,
} from './lib';

const log = createLogger('cli');

function parseNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const level = parseLogLevel(value);
  if (!level) throw new Error(`--log-level expects debug, info, warn or error, got "${value}"`);
  return level;
}

function parseViewer(value: string | undefined): LinkerConfigInput['viewer'] {
  if (value === undefined) return undefined;
  if (value === 'acrobat' || value === 'chrome') return value;
  throw new Error(`--viewer expects acrobat or chrome, got "${value}"`);
}

async function renameCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: { apply: { type: 'boolean', default: false } },
  });

  const folder = positionals[0];
  if (!folder) {
    console.error('Usage: exhibit-linker rename <folder> [--apply]');
    return 2;
  }

  const result = await renameExhibitFiles(path.resolve(folder), { dryRun: !values.apply });
  for (const step of result.renames) {
    console.log(`${result.applied ? 'renamed' : 'would rename'}: ${path.basename(step.from)} -> ${path.basename(step.to)}`);
  }
  for (const conflict of result.conflicts) {
    console.error(`conflict: ${conflict.message}`);
  }
  console.log(`${result.renames.length} to rename, ${result.unchanged.length} already clean, ${result.conflicts.length} conflict(s)`);
  return result.conflicts.length > 0 ? 1 : 0;
}

async function linkCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      exhibits: { type: 'string' },
      column: { type: 'string' },
      sheet: { type: 'string' },
      sanitize: { type: 'boolean', default: false },
      viewer: { type: 'string' },
      'bates-prefix': { type: 'string' },
      'fuzzy-threshold': { type: 'string' },
      retries: { type: 'string' },
      out: { type: 'string' },
      'log-level': { type: 'string' },
    },
  });

  const source = positionals[0];
  if (!source || !values.exhibits) {
    console.error('Usage: exhibit-linker <document> --exhibits <folder> [options]');
    return 2;
  }

  const config = loadConfig({
    exhibitsRoot: values.exhibits,
    sanitizeFilenames: values.sanitize,
    viewer: parseViewer(values.viewer),
    batesPrefix: values['bates-prefix'],
    fuzzyThreshold: parseNumber('--fuzzy-threshold', values['fuzzy-threshold']),
    maxPageScanRetries: parseNumber('--retries', values.retries),
    logLevel: parseLevel(values['log-level']),
  });
  setLogLevel(config.logLevel);

  const sourcePath = path.resolve(source);
  let document: SourceDocument;
  let writer: LinkWriter;

  if (path.extname(sourcePath).toLowerCase() === '.xlsx') {
    if (!values.column) {
      console.error('--column is required for spreadsheets');
      return 2;
    }
    const workbook = new SpreadsheetColumnDocument(sourcePath, {
      column: values.column,
      ...(values.sheet ? { sheet: values.sheet } : {}),
    });
    document = workbook;
    writer = new XlsxLinkWriter(workbook, values.out);
  } else {
    document = openSourceDocument(sourcePath);
    writer = new JsonManifestWriter(sourcePath, values.out);
  }

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const report = await runLinker({ document, config, writer, signal: controller.signal });

    for (const link of report.links) {
      console.log(`${formatCitation(link.citation)} -> ${link.target.href}`);
    }
    for (const issue of report.issues) {
      const where = issue.citation ? ` [${issue.citation.rawText} @${issue.citation.sourceOffset}]` : '';
      console.log(`${issue.severity.toUpperCase()} ${issue.code}${where}: ${issue.message}`);
    }
    for (const step of report.renames) {
      console.log(`renamed: ${path.basename(step.from)} -> ${path.basename(step.to)}`);
    }

    const { summary } = report;
    console.log(
      `${summary.citations} citation(s): ${summary.resolved} resolved, ${summary.unresolved} unresolved` +
        (report.output ? `; wrote ${report.output.path}` : '') +
        (report.aborted ? ' (aborted)' : '')
    );
    return 0;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

async function main(argv: string[]): Promise<number> {
  try {
    return argv[0] === 'rename' ? await renameCommand(argv.slice(1)) : await linkCommand(argv);
  } catch (error) {
    if (isLinkerError(error)) {
      log.error(error.message, { error: error.toJSON() });
    } else {
      log.error('Run failed', { error: describeError(error) });
    }
    return 1;
  }
}

process.exitCode = await main(process.argv.slice(2));
