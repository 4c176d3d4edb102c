/**
 * JavaScript and TypeScript extraction through the TypeScript compiler API.
 *
 * Handles function declarations, methods, constructors, accessors, arrow
 * functions and function expressions. An arrow or function assigned to a
 * variable or class property spans the whole declaration, so the name stays
 * with the body.
 */

import ts from 'typescript';
import type { Language } from '../../types.js';
import { ParseDegraded } from '../errors.js';
import type { Extraction, FunctionSpan, TokenSpan } from './types.js';

export function extractWithTypeScript(text: string, language: Language, path: string): Extraction {
  const scriptKind = getScriptKind(path, language);
  const diagnostic = firstSyntaxError(text, path, scriptKind);
  if (diagnostic) {
    throw new ParseDegraded(diagnostic);
  }

  const sourceFile = ts.createSourceFile(path, text, ts.ScriptTarget.Latest, true, scriptKind);
  const functions: FunctionSpan[] = [];
  const tokens: TokenSpan[] = [];

  const visit = (node: ts.Node): void => {
    if (node.kind >= ts.SyntaxKind.FirstJSDocNode && node.kind <= ts.SyntaxKind.LastJSDocNode) return;

    const assigned = assignedFunction(node);
    if (assigned) {
      functions.push({
        start: node.getStart(sourceFile),
        end: assigned.end,
        name: declarationName(node, sourceFile),
      });
      return;
    }

    if (isFunctionWithBody(node)) {
      functions.push({
        start: node.getStart(sourceFile),
        end: node.end,
        name: functionName(node, sourceFile),
      });
      return;
    }

    const children = node.getChildren(sourceFile);
    if (children.length === 0) {
      const start = node.getStart(sourceFile);
      if (node.end > start) tokens.push({ start, end: node.end });
      return;
    }
    for (const child of children) visit(child);
  };
  visit(sourceFile);

  return { functions, tokens };
}

function getScriptKind(path: string, language: Language): ts.ScriptKind {
  const lower = path.toLowerCase();
  if (lower.endsWith('.tsx')) return ts.ScriptKind.TSX;
  if (lower.endsWith('.jsx')) return ts.ScriptKind.JSX;
  return language === 'typescript' ? ts.ScriptKind.TS : ts.ScriptKind.JS;
}

function firstSyntaxError(text: string, path: string, scriptKind: ts.ScriptKind): string | undefined {
  const extension = scriptKind === ts.ScriptKind.TS ? '.ts'
    : scriptKind === ts.ScriptKind.TSX ? '.tsx'
    : scriptKind === ts.ScriptKind.JSX ? '.jsx'
    : '.js';
  const fileName = path.toLowerCase().endsWith(extension) ? path : `${path}${extension}`;
  const result = ts.transpileModule(text, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: { allowJs: true },
  });

  for (const diagnostic of result.diagnostics ?? []) {
    if (diagnostic.category !== ts.DiagnosticCategory.Error || !diagnostic.file) continue;
    const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, ' ');
    if (diagnostic.start === undefined) return message;
    const { line } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
    return `${message} at line ${line + 1}`;
  }
  return undefined;
}

type FunctionLike =
  | ts.FunctionDeclaration
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration
  | ts.AccessorDeclaration
  | ts.ArrowFunction
  | ts.FunctionExpression;

function isFunctionLike(node: ts.Node): node is FunctionLike {
  return ts.isFunctionDeclaration(node)
    || ts.isMethodDeclaration(node)
    || ts.isConstructorDeclaration(node)
    || ts.isGetAccessorDeclaration(node)
    || ts.isSetAccessorDeclaration(node)
    || ts.isArrowFunction(node)
    || ts.isFunctionExpression(node);
}

/** Overload signatures and abstract members have no body and stay module code. */
function isFunctionWithBody(node: ts.Node): node is FunctionLike {
  return isFunctionLike(node) && node.body !== undefined;
}

/**
 * The function initializer of `const f = () => {}` or a class property
 * `handle = () => {}`, when the statement holds exactly one.
 */
function assignedFunction(node: ts.Node): ts.ArrowFunction | ts.FunctionExpression | undefined {
  let initializer: ts.Expression | undefined;
  if (ts.isVariableStatement(node) && node.declarationList.declarations.length === 1) {
    initializer = node.declarationList.declarations[0].initializer;
  } else if (ts.isPropertyDeclaration(node)) {
    initializer = node.initializer;
  }
  if (initializer && (ts.isArrowFunction(initializer) || ts.isFunctionExpression(initializer))) {
    return initializer;
  }
  return undefined;
}

function declarationName(node: ts.Node, sourceFile: ts.SourceFile): string | undefined {
  if (ts.isVariableStatement(node)) {
    const declaration = node.declarationList.declarations[0];
    return ts.isIdentifier(declaration.name) ? declaration.name.text : undefined;
  }
  if (ts.isPropertyDeclaration(node)) {
    return node.name.getText(sourceFile);
  }
  return undefined;
}

function functionName(node: FunctionLike, sourceFile: ts.SourceFile): string | undefined {
  if (ts.isConstructorDeclaration(node)) return 'constructor';
  if (node.name) return node.name.getText(sourceFile);

  const parent = node.parent;
  if (ts.isVariableDeclaration(parent) && ts.isIdentifier(parent.name)) return parent.name.text;
  if (ts.isPropertyAssignment(parent) || ts.isPropertyDeclaration(parent)) return parent.name.getText(sourceFile);
  return undefined;
}
