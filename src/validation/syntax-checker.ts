import { createRequire } from "node:module";
import path from "node:path";
import { Language, Parser } from "web-tree-sitter";

export type SyntaxLanguage = "cpp" | "csharp" | "python";

export type SyntaxPoint = { row: number; column: number };

/** The slice of a tree-sitter node the gate reads. */
export type SyntaxNode = {
  readonly type: string;
  readonly isMissing: boolean;
  readonly hasError: boolean;
  readonly startPosition: SyntaxPoint;
  readonly endPosition: SyntaxPoint;
  readonly childCount: number;
  child(index: number): SyntaxNode | null;
};

export type SyntaxTree = { readonly rootNode: SyntaxNode };

/** 1-based, inclusive line span. */
export type ErrorRange = readonly [start: number, end: number];

export type SyntaxChecker = {
  parse(source: Uint8Array, language: SyntaxLanguage): Promise<SyntaxTree>;
  hasErrors(root: SyntaxNode): boolean;
  errorRanges(root: SyntaxNode): ErrorRange[];
};

const GRAMMAR_FILES: Record<SyntaxLanguage, string> = {
  cpp: "tree-sitter-cpp.wasm",
  csharp: "tree-sitter-c-sharp.wasm",
  python: "tree-sitter-python.wasm",
};

/** Directory holding the grammar `.wasm` files shipped by @vscode/tree-sitter-wasm. */
export function defaultGrammarDir(): string {
  const require = createRequire(import.meta.url);
  let dir = path.dirname(require.resolve("@vscode/tree-sitter-wasm"));
  while (path.basename(dir) !== "tree-sitter-wasm") {
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error("Cannot locate @vscode/tree-sitter-wasm");
    dir = parent;
  }
  return path.join(dir, "wasm");
}

/** Every ERROR or MISSING node, depth-first, as 1-based line spans. */
export function collectErrorRanges(root: SyntaxNode): ErrorRange[] {
  const ranges: ErrorRange[] = [];
  const walk = (node: SyntaxNode): void => {
    if (node.type === "ERROR" || node.isMissing) {
      ranges.push([node.startPosition.row + 1, node.endPosition.row + 1]);
    }
    for (let i = 0; i < node.childCount; i++) {
      const child = node.child(i);
      if (child) walk(child);
    }
  };
  walk(root);
  return ranges;
}

/** web-tree-sitter initializes its wasm runtime once per process; this memoizes that call. */
let runtimeReady: Promise<void> | undefined;

function initRuntime(): Promise<void> {
  runtimeReady ??= Parser.init();
  return runtimeReady;
}

/** web-tree-sitter checker. Grammars load lazily, once per language. */
export class TreeSitterSyntaxChecker implements SyntaxChecker {
  private readonly parsers = new Map<SyntaxLanguage, Promise<Parser>>();
  private readonly grammarDir: string | undefined;

  constructor(opts: { grammarDir?: string } = {}) {
    this.grammarDir = opts.grammarDir;
  }

  async parse(source: Uint8Array, language: SyntaxLanguage): Promise<SyntaxTree> {
    const parser = await this.parserFor(language);
    const tree = parser.parse(new TextDecoder().decode(source));
    if (tree === null) throw new Error(`tree-sitter returned no tree for ${language}`);
    return tree;
  }

  hasErrors(root: SyntaxNode): boolean {
    return root.hasError;
  }

  errorRanges(root: SyntaxNode): ErrorRange[] {
    return collectErrorRanges(root);
  }

  private parserFor(language: SyntaxLanguage): Promise<Parser> {
    let pending = this.parsers.get(language);
    if (!pending) {
      pending = this.loadParser(language);
      // A failed load is retried on the next call.
      pending.catch(() => this.parsers.delete(language));
      this.parsers.set(language, pending);
    }
    return pending;
  }

  private async loadParser(language: SyntaxLanguage): Promise<Parser> {
    await initRuntime();
    const wasmPath = path.join(this.grammarDir ?? defaultGrammarDir(), GRAMMAR_FILES[language]);
    let grammar: Language;
    try {
      grammar = await Language.load(wasmPath);
    } catch (e: unknown) {
      throw new Error(
        `Failed to load ${language} grammar from ${wasmPath}: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
    const parser = new Parser();
    parser.setLanguage(grammar);
    return parser;
  }
}
