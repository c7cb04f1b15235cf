/**
 * Text rewrites applied by repairs and optimizations.
 * None of these are semantic transforms; callers verify that the result parses.
 */

import * as t from '@babel/types';
import { INDEX_LOOP } from '../analysis/IssueDetector.js';
import { parseSource } from '../analysis/sourceParser.js';

const NARROWED_CATCH = 'catch (error) { if (!(error instanceof Error)) throw error;';

const INDEX_LOOP_GLOBAL = new RegExp(INDEX_LOOP.source, 'g');

const FENCED_BLOCK = /```[\w+-]*\n([\s\S]*?)\n```/;
const CODE_MARKERS = ['function ', 'import ', 'export ', 'const ', 'class '];

/**
 * Give every binding-less catch clause a binding that rethrows non-Error
 * values. Stays on the same line, so reported line numbers still hold.
 * Content that does not parse comes back unchanged.
 */
export function narrowCatchClauses(file: string, content: string): string {
  let ast: t.File;
  try {
    ast = parseSource(file, content);
  } catch {
    return content;
  }

  // From `catch` through the body's opening brace
  const spans: Array<[number, number]> = [];
  t.traverseFast(ast.program, (node) => {
    if (t.isCatchClause(node) && !node.param && typeof node.start === 'number' && typeof node.body.start === 'number') {
      spans.push([node.start, node.body.start + 1]);
    }
  });

  let result = content;
  for (const [start, end] of spans.sort((a, b) => b[0] - a[0])) {
    result = result.slice(0, start) + NARROWED_CATCH + result.slice(end);
  }
  return result;
}

/**
 * `for (let i = 0; i < xs.length; i++)` -> `for (const [i, item] of xs.entries())`
 */
export function rewriteIndexLoops(content: string): string {
  return content.replace(INDEX_LOOP_GLOBAL, 'for (const [$1, item] of $2.entries())');
}

/**
 * Code from a fenced block, else the raw response when it looks like code
 */
export function extractCodeFromResponse(response: string): string | null {
  const match = FENCED_BLOCK.exec(response);
  if (match) {
    return match[1];
  }
  if (CODE_MARKERS.some(marker => response.includes(marker))) {
    return response;
  }
  return null;
}
