import * as path from 'node:path';
import type { TextEdit } from './types.js';

/**
 * Apply text edits to content. Edits are applied from the end so earlier
 * offsets stay valid; they must not overlap.
 */
export function applyTextEdits(content: string, edits: TextEdit[]): string {
  const sortedEdits = [...edits].sort((a, b) => b.startOffset - a.startOffset);

  let result = content;
  for (const edit of sortedEdits) {
    result = result.slice(0, edit.startOffset) + edit.newText + result.slice(edit.endOffset);
  }

  return result;
}

/** How a project writes the extension of relative imports */
export type ImportExtensionStyle = 'js' | 'none';

/** Guess the extension style from specifiers a file already uses */
export function detectExtensionStyle(specifiers: string[]): ImportExtensionStyle {
  const relative = specifiers.filter(s => s.startsWith('.'));
  if (relative.length === 0) return 'js';
  return relative.some(s => /\.(js|mjs|cjs)$/.test(s)) ? 'js' : 'none';
}

/**
 * Calculate the relative import path from one file to another
 */
export function calculateRelativeImport(
  fromFile: string,
  toFile: string,
  style: ImportExtensionStyle = 'js'
): string {
  const fromDir = path.dirname(fromFile);
  let relativePath = path.relative(fromDir, toFile);

  relativePath = relativePath.replace(/\\/g, '/');
  relativePath = relativePath.replace(/\.(ts|tsx|js|jsx|mjs)$/, '');

  if (!relativePath.startsWith('.') && !relativePath.startsWith('/')) {
    relativePath = './' + relativePath;
  }

  return style === 'js' ? relativePath + '.js' : relativePath;
}
