/**
 * Exhibit linking library
 *
 * - citationExtractor: find exhibit and Bates citations in text
 * - fileIndex: describe the files in an exhibits folder
 * - citationResolver: match each citation to one file
 * - pageLocator: find the cited page inside a PDF
 * - linkBuilder: relative, page-aware link targets
 * - sanitizer: Chrome-safe renaming of exhibit files
 * - documentParser / spreadsheet: source documents
 * - linkWriter / spreadsheet: output
 * - pipeline: one run, one report
 */

export * from './types';
export * from './errors';
export * from './logger';
export * from './config';
export * from './result';
export * from './retry';
export * from './similarity';
export * from './bates';
export * from './citationExtractor';
export * from './pdfSource';
export * from './fileIndex';
export * from './citationResolver';
export * from './pageLocator';
export * from './linkBuilder';
export * from './sanitizer';
export * from './documentParser';
export * from './spreadsheet';
export * from './linkWriter';
export * from './pipeline';
