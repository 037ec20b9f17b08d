import { Token, TokenType, displayToken, rootToken } from '../lexer/tokens';

const MID_CHILD = '├─';
const LAST_CHILD = '└─';
const INDENT_WIDTH = 4;

export interface SerializedNode {
  type: TokenType;
  raw: string;
  children: SerializedNode[];
}

/**
 * A syntax tree node: one token, ordered children and a back-reference to
 * the parent. The parent link is only used for navigation; a node is owned
 * by exactly one parent and must never be appended twice.
 */
export class AstNode {
  readonly token: Token;
  private readonly childNodes: AstNode[] = [];
  private parentNode: AstNode | null = null;

  constructor(token: Token = rootToken()) {
    this.token = token;
  }

  get children(): readonly AstNode[] {
    return this.childNodes;
  }

  get parent(): AstNode | null {
    return this.parentNode;
  }

  get isRoot(): boolean {
    return this.parentNode === null;
  }

  /** True for a root, or for the last child of its parent. */
  get isLast(): boolean {
    if (this.parentNode === null) return true;
    const siblings = this.parentNode.childNodes;
    return siblings[siblings.length - 1] === this;
  }

  /** Appends `child` as the last child and returns this node for chaining. */
  append(child: AstNode): this {
    this.childNodes.push(child);
    child.parentNode = this;
    return this;
  }

  /** Direct membership only; grandchildren are not searched. */
  contains(node: AstNode): boolean {
    return this.childNodes.includes(node);
  }

  render(indent = 0): string {
    const lines: string[] = [];
    if (this.isRoot) {
      lines.push(displayToken(this.token));
    } else {
      const connector = this.isLast ? LAST_CHILD : MID_CHILD;
      lines.push(`${' '.repeat(indent)}${connector}  ${displayToken(this.token)}`);
    }

    for (const child of this.childNodes) {
      lines.push(child.render(indent + INDENT_WIDTH));
    }
    return lines.join('\n');
  }

  toString(): string {
    return this.render();
  }

  toJSON(): SerializedNode {
    return {
      type: this.token.type,
      raw: this.token.raw,
      children: this.childNodes.map(child => child.toJSON()),
    };
  }
}
