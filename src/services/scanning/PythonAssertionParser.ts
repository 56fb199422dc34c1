import { parser } from '@lezer/python';
import type { SyntaxNode, Tree } from '@lezer/common';
import { ParseError } from '../../utils/errors.js';

const ASSERT_NODE = 'AssertStatement';
const COMMENT_NODE = 'Comment';
const VERBATIM_NODES = new Set(['String', 'FormatString']);
const PRINT_NODE = 'PrintStatement';
const TRY_NODE = 'TryStatement';

interface Span {
  from: number;
  to: number;
  keep: boolean;
}

const collapseWhitespace = (text: string): string =>
  text
    .replace(/\\\r?\n/g, ' ')
    .replace(/\s+/g, ' ')
    .replace(/([([{]) /g, '$1')
    .replace(/ ([)\]}])/g, '$1');

const collectSpans = (node: SyntaxNode, spans: Span[]): void => {
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (child.name === COMMENT_NODE) {
      spans.push({ from: child.from, to: child.to, keep: false });
    } else if (VERBATIM_NODES.has(child.name)) {
      spans.push({ from: child.from, to: child.to, keep: true });
    } else {
      collectSpans(child, spans);
    }
  }
};

/**
 * Canonical one-line text of a statement node: comments dropped, whitespace
 * outside string literals collapsed to single spaces and removed just inside
 * brackets, literals untouched.
 */
export const renderStatement = (source: string, node: SyntaxNode): string => {
  const spans: Span[] = [];
  collectSpans(node, spans);

  let rendered = '';
  let pending = '';
  let pos = node.from;
  for (const span of spans) {
    pending += source.slice(pos, span.from);
    if (span.keep) {
      rendered += collapseWhitespace(pending) + source.slice(span.from, span.to);
      pending = '';
    } else {
      pending += ' ';
    }
    pos = span.to;
  }
  pending += source.slice(pos, node.to);
  rendered += collapseWhitespace(pending);

  return rendered.trim();
};

const lineAndColumn = (source: string, offset: number): { line: number; column: number } => {
  const before = source.slice(0, offset);
  const lastBreak = before.lastIndexOf('\n');
  return {
    line: before.split('\n').length,
    column: offset - lastBreak,
  };
};

const firstErrorOffset = (tree: Tree): number | undefined => {
  let offset: number | undefined;
  tree.iterate({
    enter: node => {
      if (offset !== undefined) return false;
      if (node.type.isError) {
        offset = node.from;
        return false;
      }
      return undefined;
    },
  });
  return offset;
};

// `except E, name:` binds its name through a bare comma instead of `as`.
const commaBoundHandlerAt = (source: string, tryNode: SyntaxNode): number | undefined => {
  for (let child = tryNode.firstChild; child; child = child.nextSibling) {
    if (child.name === 'VariableName' && /,\s*$/.test(source.slice(tryNode.from, child.from))) {
      return child.from;
    }
  }
  return undefined;
};

/** Python 2 statements the grammar accepts but a Python 3 compiler rejects. */
const firstLegacyOffset = (source: string, tree: Tree): number | undefined => {
  let offset: number | undefined;
  tree.iterate({
    enter: node => {
      if (offset !== undefined) return false;
      if (node.name === PRINT_NODE) {
        offset = node.from;
        return false;
      }
      if (node.name === TRY_NODE) {
        offset = commaBoundHandlerAt(source, node.node);
      }
      return undefined;
    },
  });
  return offset;
};

export class PythonAssertionParser {
  /**
   * Assertion texts of one module in document order.
   * @throws ParseError when the module does not parse cleanly.
   */
  extract(source: string, file: string): string[] {
    const tree = parser.parse(source);

    const errorAt = firstErrorOffset(tree) ?? firstLegacyOffset(source, tree);
    if (errorAt !== undefined) {
      const { line, column } = lineAndColumn(source, errorAt);
      throw new ParseError(`Syntax error in ${file} at line ${line}`, file, line, column);
    }

    const assertions: string[] = [];
    tree.iterate({
      enter: node => {
        if (node.name === ASSERT_NODE) {
          assertions.push(renderStatement(source, node.node));
        }
      },
    });
    return assertions;
  }
}
