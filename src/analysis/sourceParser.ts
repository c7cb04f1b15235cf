/**
 * Babel parsing helpers shared by detection and rewrite verification
 */

import { extname } from 'path';
import * as parser from '@babel/parser';
import type * as t from '@babel/types';

export const SOURCE_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];

export type ParseCheck =
  | { ok: true }
  | { ok: false; message: string; line: number };

export function isSourceFile(file: string): boolean {
  if (/\.d\.[mc]?ts$/.test(file)) {
    return false;
  }
  return SOURCE_EXTENSIONS.includes(extname(file));
}

export function parserPluginsFor(file: string): parser.ParserPlugin[] {
  const ext = extname(file);
  const plugins: parser.ParserPlugin[] = ['decorators-legacy'];

  if (ext === '.ts' || ext === '.tsx' || ext === '.mts' || ext === '.cts') {
    plugins.push('typescript');
  }

  if (ext === '.tsx' || ext === '.jsx' || ext === '.js') {
    plugins.push('jsx');
  }

  return plugins;
}

function sourceTypeFor(file: string): parser.ParserOptions['sourceType'] {
  const ext = extname(file);
  if (ext === '.cjs' || ext === '.cts') {
    return 'script';
  }
  if (ext === '.js' || ext === '.jsx') {
    return 'unambiguous';
  }
  return 'module';
}

/**
 * Parse a file's content; throws the parser's SyntaxError on failure
 */
export function parseSource(file: string, content: string): t.File {
  return parser.parse(content, {
    sourceType: sourceTypeFor(file),
    plugins: parserPluginsFor(file),
    allowReturnOutsideFunction: sourceTypeFor(file) === 'script',
    errorRecovery: false
  });
}

/**
 * Line reported by a Babel SyntaxError, 0 when unknown
 */
export function errorLine(error: unknown): number {
  if (
    error !== null &&
    typeof error === 'object' &&
    'loc' in error &&
    error.loc !== null &&
    typeof error.loc === 'object' &&
    'line' in error.loc &&
    typeof error.loc.line === 'number'
  ) {
    return error.loc.line;
  }
  return 0;
}

export function checkParses(file: string, content: string): ParseCheck {
  try {
    parseSource(file, content);
    return { ok: true };
  } catch (error) {
    return {
      ok: false,
      message: error instanceof Error ? error.message : String(error),
      line: errorLine(error)
    };
  }
}
