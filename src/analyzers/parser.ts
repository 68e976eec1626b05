import { parser } from "@lezer/python";
import type { SyntaxNode, Tree } from "@lezer/common";

export type ParseFailure = {
  line: number;
  message: string;
};

export type SyntaxTree = {
  tree: Tree;
  content: string;
  lineStarts: number[];
};

export type ParseResult =
  | { ok: true; tree: SyntaxTree }
  | { ok: false; failure: ParseFailure };

export function parse(content: string): ParseResult {
  let tree: Tree;
  try {
    tree = parser.parse(content);
  } catch (error) {
    return {
      ok: false,
      failure: { line: 1, message: error instanceof Error ? error.message : "unable to parse" },
    };
  }

  const lineStarts = computeLineStarts(content);
  const syntaxTree: SyntaxTree = { tree, content, lineStarts };

  // The grammar recovers from some errors without an error node, so the
  // layout and statement checks run as well. The earliest line wins, and on
  // the same line the more specific message comes first.
  const failures: ParseFailure[] = [];
  const layoutFailure = checkLayout(content);
  if (layoutFailure) { failures.push(layoutFailure); }
  const statementFailure = checkStatements(syntaxTree);
  if (statementFailure) { failures.push(statementFailure); }
  const errorNode = findFirstError(tree);
  if (errorNode) {
    const atEnd = errorNode.from >= content.trimEnd().length;
    failures.push({
      line: lineAt(lineStarts, errorNode.from),
      message: atEnd ? "unexpected EOF while parsing" : "invalid syntax",
    });
  }

  const failure = earliest(failures);
  if (failure) {
    return { ok: false, failure };
  }
  return { ok: true, tree: syntaxTree };
}

function earliest(failures: ParseFailure[]): ParseFailure | null {
  let first: ParseFailure | null = null;
  for (const failure of failures) {
    if (!first || failure.line < first.line) {
      first = failure;
    }
  }
  return first;
}

function findFirstError(tree: Tree): { from: number } | null {
  let found: { from: number } | null = null;
  tree.iterate({
    enter: (node) => {
      if (found) { return false; }
      if (node.type.isError) {
        found = { from: node.from };
        return false;
      }
      return undefined;
    },
  });
  return found;
}

export function computeLineStarts(content: string): number[] {
  const starts = [0];
  for (let i = 0; i < content.length; i++) {
    if (content.charCodeAt(i) === 10) {
      starts.push(i + 1);
    }
  }
  return starts;
}

/** 1-based line number of a document offset. */
export function lineAt(lineStarts: number[], offset: number): number {
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if ((lineStarts[mid] ?? 0) <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low + 1;
}

export function lineOf(tree: SyntaxTree, node: SyntaxNode): number {
  return lineAt(tree.lineStarts, node.from);
}

export function textOf(tree: SyntaxTree, node: SyntaxNode): string {
  return tree.content.slice(node.from, node.to);
}

export function childrenOf(node: SyntaxNode): SyntaxNode[] {
  const children: SyntaxNode[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) {
    children.push(child);
  }
  return children;
}

/** Every node below `node`, depth first, in document order. */
export function* descendantsOf(node: SyntaxNode): Generator<SyntaxNode> {
  for (let child = node.firstChild; child; child = child.nextSibling) {
    yield child;
    yield* descendantsOf(child);
  }
}

export function isLeaf(node: SyntaxNode): boolean {
  return node.firstChild === null;
}

/** Keyword and punctuation tokens are leaves whose text is the token itself. */
export function isToken(tree: SyntaxTree, node: SyntaxNode, token: string): boolean {
  return isLeaf(node) && node.to - node.from === token.length && textOf(tree, node) === token;
}

// --- layout ---

const TAB_SIZE = 8;
const PY2_PRINT = /^print[ \t]+(?!(?:and|or|in|is|not|if|else|for)\b)["'\w]/;

/**
 * Scans the raw text for what the tree does not reliably report: string
 * literals left open, indentation that does not match the block stack, and
 * statement-form `print`. Newlines inside brackets, strings or after a
 * backslash continue the logical line.
 */
export function checkLayout(content: string): ParseFailure | null {
  const indents = [0];
  let depth = 0;
  let string: { quote: string; line: number } | null = null;
  let line = 1;
  let atLogicalStart = true;
  let expectIndent = false;
  let lastSignificant = "";
  let i = 0;

  while (i < content.length) {
    const ch = content[i] ?? "";

    if (string) {
      if (ch === "\\") {
        const escaped = lineBreakAt(content, i + 1);
        if (escaped > 0) { line++; }
        i += 1 + Math.max(escaped, 1);
      } else if (content.startsWith(string.quote, i)) {
        i += string.quote.length;
        string = null;
      } else {
        if (ch === "\n") {
          if (string.quote.length === 1) {
            return { line: string.line, message: "unterminated string literal" };
          }
          line++;
        }
        i++;
      }
      continue;
    }

    if (atLogicalStart) {
      let column = 0;
      let j = i;
      for (let c = content[j]; c === " " || c === "\t" || c === "\f"; c = content[++j]) {
        column = c === "\t" ? (Math.floor(column / TAB_SIZE) + 1) * TAB_SIZE : column + 1;
      }
      const lineEnd = content.indexOf("\n", j);
      const rest = content.slice(j, lineEnd < 0 ? content.length : lineEnd);

      // blank and comment-only lines do not take part in indentation
      if (!rest.trim() || rest.startsWith("#")) {
        if (lineEnd < 0) { break; }
        i = lineEnd + 1;
        line++;
        continue;
      }

      const top = indents[indents.length - 1] ?? 0;
      if (expectIndent) {
        if (column <= top) {
          return { line, message: "expected an indented block" };
        }
        indents.push(column);
      } else if (column > top) {
        return { line, message: "unexpected indent" };
      } else {
        while (indents.length > 1 && column < (indents[indents.length - 1] ?? 0)) {
          indents.pop();
        }
        if (column !== indents[indents.length - 1]) {
          return { line, message: "unindent does not match any outer indentation level" };
        }
      }

      if (PY2_PRINT.test(rest)) {
        return { line, message: "Missing parentheses in call to 'print'. Did you mean print(...)?" };
      }

      expectIndent = false;
      atLogicalStart = false;
      lastSignificant = "";
      i = j;
      continue;
    }

    switch (ch) {
      case "#": {
        const lineEnd = content.indexOf("\n", i);
        i = lineEnd < 0 ? content.length : lineEnd;
        continue;
      }
      case "\\": {
        const continued = lineBreakAt(content, i + 1);
        if (continued > 0) {
          line++;
          i += 1 + continued;
          continue;
        }
        break;
      }
      case "'":
      case '"': {
        const quote = content.startsWith(ch.repeat(3), i) ? ch.repeat(3) : ch;
        string = { quote, line };
        lastSignificant = ch;
        i += quote.length;
        continue;
      }
      case "(":
      case "[":
      case "{":
        depth++;
        break;
      case ")":
      case "]":
      case "}":
        depth = Math.max(0, depth - 1);
        break;
      case "\n":
        line++;
        i++;
        if (depth === 0) {
          atLogicalStart = true;
          expectIndent = lastSignificant === ":";
        }
        continue;
    }

    if (ch !== " " && ch !== "\t" && ch !== "\r" && ch !== "\f") {
      lastSignificant = ch;
    }
    i++;
  }

  if (string) {
    return string.quote.length === 1
      ? { line: string.line, message: "unterminated string literal" }
      : { line: string.line, message: "unterminated triple-quoted string literal" };
  }
  return null;
}

/** Length of the line break starting at `offset`, or 0. */
function lineBreakAt(content: string, offset: number): number {
  if (content.startsWith("\r\n", offset)) { return 2; }
  return content[offset] === "\n" ? 1 : 0;
}

// --- statements ---

const STATEMENT_CONTAINERS = new Set(["Script", "Body"]);

function isStatement(node: SyntaxNode): boolean {
  return node.name.endsWith("Statement") || node.name.endsWith("Definition");
}

/**
 * Tree-level checks: two statements sharing a line without `;` between them,
 * assignment to a call, and the statement form of `print`.
 */
export function checkStatements(tree: SyntaxTree): ParseFailure | null {
  for (const node of descendantsOf(tree.tree.topNode)) {
    if (STATEMENT_CONTAINERS.has(node.name)) {
      const failure = checkStatementSeparation(tree, node);
      if (failure) { return failure; }
    }

    if (isToken(tree, node, "=") && node.prevSibling?.name === "CallExpression") {
      return { line: lineOf(tree, node), message: "cannot assign to function call" };
    }

    if (node.name === "PrintStatement" && !textOf(tree, node).slice("print".length).trimStart().startsWith("(")) {
      return { line: lineOf(tree, node), message: "Missing parentheses in call to 'print'. Did you mean print(...)?" };
    }
  }
  return null;
}

function checkStatementSeparation(tree: SyntaxTree, container: SyntaxNode): ParseFailure | null {
  const statements = childrenOf(container).filter(isStatement);
  for (let index = 1; index < statements.length; index++) {
    const previous = statements[index - 1];
    const current = statements[index];
    if (!previous || !current) { continue; }

    // block statements can extend over the whitespace before the next one
    const previousText = textOf(tree, previous).trimEnd();
    if (!previousText) { continue; }
    const previousEndLine = lineAt(tree.lineStarts, previous.from + previousText.length - 1);
    if (previousEndLine !== lineOf(tree, current)) { continue; }

    const between = tree.content.slice(previous.from, current.from).trimEnd();
    if (!between.endsWith(";")) {
      return { line: lineOf(tree, current), message: "invalid syntax" };
    }
  }
  return null;
}
