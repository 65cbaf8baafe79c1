import type { ParseTreeNode } from '../grammar/index.js';

/**
 * Render a parse tree fragment, one rule per line, indented with `| ` per
 * level. A node whose only child covers the same text is folded into one
 * line as `outer > inner`.
 *
 * @example
 * dumpTree(tree)
 * // plusExpression: "1 + 2"
 * // | naturalLiteral: "1"
 * // | naturalLiteral: "2"
 */
export function dumpTree(root: ParseTreeNode): string {
  const lines: string[] = [];
  const stack: { node: ParseTreeNode; depth: number; prefix: string }[] = [
    { node: root, depth: 0, prefix: '' },
  ];

  for (let entry = stack.pop(); entry; entry = stack.pop()) {
    const { node, depth, prefix } = entry;
    const [only] = node.children;
    if (only && node.children.length === 1 && only.text === node.text) {
      stack.push({ node: only, depth, prefix: `${prefix}${node.rule} > ` });
      continue;
    }

    lines.push(`${'| '.repeat(depth)}${prefix}${node.rule}: ${JSON.stringify(node.text)}`);
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) stack.push({ node: child, depth: depth + 1, prefix: '' });
    }
  }

  return lines.join('\n');
}
