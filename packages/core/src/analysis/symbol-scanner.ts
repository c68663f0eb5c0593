import * as fs from 'fs/promises';
import * as path from 'path';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { glob } from 'glob';
import { Node, Project, PropertyDeclaration, SourceFile, SyntaxKind, VariableDeclaration, ts } from 'ts-morph';
import { ParseError, errorMessage } from '../errors.js';
import {
  FileScanOutcome,
  ReadonlySymbolIndex,
  ScanReport,
  SymbolIndex,
  UsageKind,
  UsageRecord,
} from '../types/index.js';
import { Logger } from '../utils/logger.js';

export interface SymbolScannerOptions {
  /** Glob patterns (relative to the scan root) that are never scanned */
  exclude?: string[];
  logger?: Logger;
}

const SCRIPT_KINDS: Record<string, ts.ScriptKind> = {
  '.ts': ts.ScriptKind.TS,
  '.mts': ts.ScriptKind.TS,
  '.cts': ts.ScriptKind.TS,
  '.tsx': ts.ScriptKind.TSX,
  '.js': ts.ScriptKind.JS,
  '.mjs': ts.ScriptKind.JS,
  '.cjs': ts.ScriptKind.JS,
  '.jsx': ts.ScriptKind.JSX,
};

/**
 * Parents under which an identifier that is the parent's `name` is still a
 * use of the symbol rather than a declaration label.
 */
const NAME_IS_REFERENCE = new Set<SyntaxKind>([
  SyntaxKind.VariableDeclaration,
  SyntaxKind.BindingElement,
  SyntaxKind.ShorthandPropertyAssignment,
]);

type ParseResult = { ok: true; usages: number } | { ok: false; message: string; line?: number };

/**
 * Builds a symbol index from TypeScript and JavaScript sources. Parsing is
 * syntactic only: names are matched textually, never resolved to bindings.
 *
 * The index accumulates across `scan` calls on the same instance.
 */
export class SymbolScanner {
  private readonly index: SymbolIndex = new Map();
  private readonly outcomes: FileScanOutcome[] = [];
  private readonly project: Project;
  private readonly logger: Logger;

  constructor(private readonly options: SymbolScannerOptions = {}) {
    this.logger = options.logger ?? new Logger({ scope: 'scanner' });
    this.project = new Project({
      useInMemoryFileSystem: true,
      skipAddingFilesFromTsConfig: true,
      compilerOptions: {
        allowJs: true,
        noLib: true,
        noResolve: true,
        jsx: ts.JsxEmit.Preserve,
      },
    });
  }

  /**
   * Discover files under `root` matching `pattern` and index them in sorted
   * path order. A slash-free pattern matches basenames at any depth.
   *
   * Each file is parsed in its own macrotask; other callbacks on the event
   * loop run between files, never during one.
   */
  async scan(root: string, pattern = '*.ts'): Promise<SymbolIndex> {
    const files = await this.discover(root, pattern);
    let failed = 0;

    for (const filePath of files) {
      await yieldToEventLoop();

      let content: string;
      try {
        content = await fs.readFile(filePath, 'utf-8');
      } catch (error) {
        this.recordFailure(filePath, `could not read file: ${errorMessage(error)}`);
        failed++;
        continue;
      }

      if (!this.indexContent(content, filePath)) {
        failed++;
      }
    }

    this.logger.info('Scan complete', {
      root,
      pattern,
      files: files.length,
      failed,
      symbols: this.index.size,
    });

    return this.index;
  }

  /**
   * Index one in-memory file body; records carry `logicalName` as their path.
   */
  analyzeSingleFile(content: string, logicalName: string): SymbolIndex {
    this.indexContent(content, logicalName);
    return this.index;
  }

  findSymbol(symbol: string): readonly UsageRecord[] {
    return this.index.get(symbol) ?? [];
  }

  getIndex(): ReadonlySymbolIndex {
    return this.index;
  }

  report(): ScanReport {
    const failedFiles = this.outcomes.filter((outcome) => outcome.status === 'parse-error').length;
    return {
      index: this.index,
      files: [...this.outcomes],
      scannedFiles: this.outcomes.length,
      failedFiles,
      totalSymbols: this.index.size,
    };
  }

  private async discover(root: string, pattern: string): Promise<string[]> {
    const files = await glob(pattern, {
      cwd: root,
      absolute: true,
      nodir: true,
      matchBase: !pattern.includes('/'),
      ignore: this.options.exclude ?? [],
    });
    return files.sort();
  }

  private indexContent(content: string, filePath: string): boolean {
    const result = this.parseAndCollect(content, filePath);

    if (!result.ok) {
      this.recordFailure(filePath, result.message, result.line);
      return false;
    }

    this.outcomes.push({ status: 'ok', filePath, usages: result.usages });
    return true;
  }

  private recordFailure(filePath: string, message: string, line?: number): void {
    const failure = new ParseError(filePath, message, line);
    this.logger.warn('Skipping file that could not be parsed', { error: failure.message });
    this.outcomes.push({ status: 'parse-error', filePath, message, line });
  }

  private parseAndCollect(content: string, filePath: string): ParseResult {
    const extension = path.extname(filePath).toLowerCase();
    const sourceFile = this.project.createSourceFile(`/source${extension || '.ts'}`, content, {
      overwrite: true,
      scriptKind: SCRIPT_KINDS[extension] ?? ts.ScriptKind.TS,
    });

    try {
      const diagnostics = this.project.getProgram().getSyntacticDiagnostics(sourceFile);
      const first = diagnostics[0];
      if (first) {
        return {
          ok: false,
          message: ts.flattenDiagnosticMessageText(first.compilerObject.messageText, '\n'),
          line: first.getLineNumber(),
        };
      }

      const records = collectUsages(sourceFile, filePath, content.split(/\r?\n/));
      for (const [symbol, record] of records) {
        const usages = this.index.get(symbol);
        if (usages) {
          usages.push(record);
        } else {
          this.index.set(symbol, [record]);
        }
      }
      return { ok: true, usages: records.length };
    } catch (error) {
      return { ok: false, message: errorMessage(error) };
    } finally {
      this.project.removeSourceFile(sourceFile);
    }
  }
}

function collectUsages(
  sourceFile: SourceFile,
  filePath: string,
  lines: readonly string[]
): Array<[string, UsageRecord]> {
  const records: Array<[string, UsageRecord]> = [];

  const add = (symbol: string, node: Node, kind: UsageKind): void => {
    const position = sourceFile.compilerNode.getLineAndCharacterOfPosition(node.getStart());
    const line = position.line + 1;
    records.push([
      symbol,
      Object.freeze({
        filePath,
        line,
        column: position.character,
        context: (lines[line - 1] ?? '').trim(),
        kind,
      }),
    ]);
  };

  sourceFile.forEachDescendant((node) => {
    const nameNode = definedName(node);
    if (nameNode) {
      if (Node.isIdentifier(nameNode)) {
        add(nameNode.getText(), nameNode, 'definition');
      }
      return;
    }

    if (Node.isImportDeclaration(node)) {
      const defaultImport = node.getDefaultImport();
      if (defaultImport) {
        add(defaultImport.getText(), node, 'import');
      }
      const namespaceImport = node.getNamespaceImport();
      if (namespaceImport) {
        add(namespaceImport.getText(), node, 'import');
      }
      for (const specifier of node.getNamedImports()) {
        add(specifier.getNameNode().getText(), node, 'import');
      }
      return;
    }

    if (Node.isImportEqualsDeclaration(node)) {
      add(node.getName(), node, 'import');
      return;
    }

    if (Node.isCallExpression(node) || Node.isNewExpression(node)) {
      const callee = node.getExpression();
      if (Node.isIdentifier(callee)) {
        add(callee.getText(), node, 'call');
      } else if (Node.isPropertyAccessExpression(callee)) {
        add(callee.getName(), node, 'call');
      }
      return;
    }

    if (Node.isIdentifier(node) && isReference(node)) {
      add(node.getText(), node, 'reference');
    }
  });

  return records;
}

/**
 * Name node of a function, class, method or accessor declaration, including
 * variables and class properties initialized with an arrow or function
 * expression.
 */
function definedName(node: Node): Node | undefined {
  if (
    Node.isFunctionDeclaration(node) ||
    Node.isClassDeclaration(node) ||
    Node.isMethodDeclaration(node) ||
    Node.isGetAccessorDeclaration(node) ||
    Node.isSetAccessorDeclaration(node)
  ) {
    return node.getNameNode();
  }

  if ((Node.isVariableDeclaration(node) || Node.isPropertyDeclaration(node)) && holdsFunction(node)) {
    return node.getNameNode();
  }

  return undefined;
}

function holdsFunction(node: VariableDeclaration | PropertyDeclaration): boolean {
  const initializer = node.getInitializer();
  return initializer !== undefined && (Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer));
}

/**
 * An identifier is a reference unless it is a callee, a member name, a
 * declaration's label or part of an import/export clause.
 */
function isReference(identifier: Node): boolean {
  const parent = identifier.getParent();
  if (!parent) {
    return true;
  }

  const self = identifier.compilerNode;
  const raw = parent.compilerNode;

  if ((Node.isCallExpression(parent) || Node.isNewExpression(parent)) && parent.getExpression() === identifier) {
    return false;
  }

  if (Node.isQualifiedName(parent) && parent.getRight() === identifier) {
    return false;
  }

  if (Node.isImportSpecifier(parent) || Node.isImportClause(parent) || Node.isNamespaceImport(parent)) {
    return false;
  }

  if (Node.isExportSpecifier(parent)) {
    if (parent.getExportDeclaration().hasModuleSpecifier()) {
      return false;
    }
    // `export { local as exported }`: only the local name is a use
    return parent.compilerNode.propertyName ? parent.compilerNode.propertyName === self : true;
  }

  if ('propertyName' in raw && raw.propertyName === self) {
    return false;
  }

  if ('label' in raw && raw.label === self) {
    return false;
  }

  if ('name' in raw && raw.name === self) {
    if (Node.isVariableDeclaration(parent) && holdsFunction(parent)) {
      return false;
    }
    return NAME_IS_REFERENCE.has(parent.getKind());
  }

  return true;
}
