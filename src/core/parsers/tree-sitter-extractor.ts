/**
 * Function and token extraction over a tree-sitter syntax tree, for the
 * grammars the loader knows about.
 */

import type Parser from 'tree-sitter';
import type { Language } from '../../types.js';
import { ParseDegraded } from '../errors.js';
import { createTreeSitterParser } from './tree-sitter-loader.js';
import type { Extraction, FunctionSpan, TokenSpan } from './types.js';

type SyntaxNode = Parser.SyntaxNode;

const FUNCTION_NODES: Partial<Record<Language, ReadonlySet<string>>> = {
  c: new Set(['function_definition']),
  cpp: new Set(['function_definition']),
  java: new Set(['method_declaration', 'constructor_declaration']),
  csharp: new Set(['method_declaration', 'constructor_declaration', 'destructor_declaration']),
  go: new Set(['function_declaration', 'method_declaration']),
  rust: new Set(['function_item']),
  php: new Set(['function_definition', 'method_declaration']),
  python: new Set(['function_definition']),
};

/** Leaves of a C/C++ declarator chain that carry the function name. */
const DECLARATOR_NAMES = new Set([
  'identifier',
  'field_identifier',
  'qualified_identifier',
  'destructor_name',
  'operator_name',
]);

export function extractWithTreeSitter(text: string, language: Language): Extraction {
  const functionNodes = FUNCTION_NODES[language];
  if (!functionNodes) {
    throw new ParseDegraded(`no structural parser for language '${language}'`);
  }

  let parser: Parser;
  try {
    parser = createTreeSitterParser(language);
  } catch (error) {
    throw new ParseDegraded(error instanceof Error ? error.message : String(error));
  }

  const tree = parser.parse(text, undefined, { bufferSize: text.length * 2 + 1 });
  const root = tree.rootNode;
  if (root.hasError) {
    throw new ParseDegraded(describeError(root));
  }

  const functions: FunctionSpan[] = [];
  const tokens: TokenSpan[] = [];

  const visit = (node: SyntaxNode): void => {
    if (node.type.includes('comment')) return;

    const fn = functionNodes.has(node.type) ? node : decoratedFunction(node, functionNodes);
    if (fn) {
      functions.push({ start: node.startIndex, end: trimEnd(text, node.endIndex), name: functionName(fn, language) });
      return;
    }

    if (node.childCount === 0) {
      if (node.endIndex > node.startIndex && text.slice(node.startIndex, node.endIndex).trim() !== '') {
        tokens.push({ start: node.startIndex, end: node.endIndex });
      }
      return;
    }
    for (const child of node.children) visit(child);
  };
  visit(root);

  return { functions, tokens };
}

/** Python decorators belong to the function they wrap. */
function decoratedFunction(node: SyntaxNode, functionNodes: ReadonlySet<string>): SyntaxNode | null {
  if (node.type !== 'decorated_definition') return null;
  const definition = node.childForFieldName('definition');
  return definition && functionNodes.has(definition.type) ? definition : null;
}

function functionName(node: SyntaxNode, language: Language): string | undefined {
  if (language !== 'c' && language !== 'cpp') {
    return node.childForFieldName('name')?.text;
  }

  let current: SyntaxNode | null = node.childForFieldName('declarator');
  while (current) {
    if (DECLARATOR_NAMES.has(current.type)) return current.text;
    current = current.childForFieldName('declarator')
      ?? (current.type.endsWith('declarator') ? current.lastNamedChild : null);
  }
  return undefined;
}

function describeError(root: SyntaxNode): string {
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    const line = node.startPosition.row + 1;
    if (node.isMissing) return `missing '${node.type}' at line ${line}`;
    if (node.type === 'ERROR') return `syntax error at line ${line}`;
    if (!node.hasError) continue;
    for (let i = node.childCount - 1; i >= 0; i--) {
      const child = node.child(i);
      if (child) stack.push(child);
    }
  }
  return 'syntax error';
}

function trimEnd(text: string, end: number): number {
  let index = end;
  while (index > 0 && /\s/.test(text[index - 1])) index--;
  return index;
}
