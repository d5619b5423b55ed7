import type { GenderKey } from './keywords.js';

export type TemplateNode =
  | { kind: 'text'; value: string }
  | { kind: 'select'; branches: Map<string, TemplateNode[]> };

export class TemplateSyntaxError extends Error {
  constructor(message: string, public readonly position: number) {
    super(`${message} at position ${position}`);
    this.name = 'TemplateSyntaxError';
  }
}

const SELECT_HEAD = /^\{\s*gender\s*,\s*select\s*,/;

class TemplateScanner {
  private pos = 0;

  constructor(private readonly source: string) {}

  parse(): TemplateNode[] {
    return this.parseNodes(this.source.length);
  }

  private parseNodes(end: number): TemplateNode[] {
    const nodes: TemplateNode[] = [];
    let text = '';

    while (this.pos < end) {
      const rest = this.source.slice(this.pos, end);
      const head = SELECT_HEAD.exec(rest);

      if (head) {
        if (text) nodes.push({ kind: 'text', value: text });
        text = '';
        this.pos += head[0].length;
        nodes.push(this.parseSelect(end));
        continue;
      }

      text += this.source[this.pos];
      this.pos += 1;
    }

    if (text) nodes.push({ kind: 'text', value: text });
    return nodes;
  }

  private parseSelect(end: number): TemplateNode {
    const branches = new Map<string, TemplateNode[]>();

    for (;;) {
      this.skipWhitespace(end);
      if (this.pos >= end) throw new TemplateSyntaxError('Unterminated select block', this.pos);

      if (this.source[this.pos] === '}') {
        this.pos += 1;
        return { kind: 'select', branches };
      }

      const nameStart = this.pos;
      while (this.pos < end && !/[\s{}]/.test(this.source[this.pos])) this.pos += 1;
      const name = this.source.slice(nameStart, this.pos);
      if (!name) throw new TemplateSyntaxError('Expected branch name', this.pos);

      this.skipWhitespace(end);
      if (this.source[this.pos] !== '{') throw new TemplateSyntaxError(`Expected "{" after branch "${name}"`, this.pos);

      const bodyEnd = this.findClosingBrace(this.pos, end);
      this.pos += 1;
      const body = this.parseNodes(bodyEnd);
      this.pos = bodyEnd + 1;
      branches.set(name, body);
    }
  }

  /** Index of the brace closing the one at `open`, counting nested pairs. */
  private findClosingBrace(open: number, end: number): number {
    let depth = 0;
    for (let index = open; index < end; index += 1) {
      const char = this.source[index];
      if (char === '{') depth += 1;
      if (char === '}') {
        depth -= 1;
        if (depth === 0) return index;
      }
    }
    throw new TemplateSyntaxError('Unbalanced braces in branch', open);
  }

  private skipWhitespace(end: number): void {
    while (this.pos < end && /\s/.test(this.source[this.pos])) this.pos += 1;
  }
}

export const parseTemplate = (source: string): TemplateNode[] => new TemplateScanner(source).parse();

const renderNodes = (nodes: readonly TemplateNode[], gender: GenderKey): string =>
  nodes
    .map((node) => {
      if (node.kind === 'text') return node.value;
      const branch = node.branches.get(gender) ?? node.branches.get('other') ?? [];
      return renderNodes(branch, gender);
    })
    .join('');

/**
 * Positional `{n}` substitution with `{{`/`}}` escapes. Returns null when the
 * text has a stray brace or an index with no argument.
 */
export const formatPositional = (text: string, args: readonly string[]): string | null => {
  let output = '';
  let index = 0;

  while (index < text.length) {
    const char = text[index];
    const next = text[index + 1];

    if (char === '{' && next === '{') {
      output += '{';
      index += 2;
    } else if (char === '}' && next === '}') {
      output += '}';
      index += 2;
    } else if (char === '{') {
      const match = /^\{(\d+)\}/.exec(text.slice(index));
      if (!match) return null;
      const position = Number(match[1]);
      if (position >= args.length) return null;
      output += args[position];
      index += match[0].length;
    } else if (char === '}') {
      return null;
    } else {
      output += char;
      index += 1;
    }
  }

  return output;
};

/**
 * Renders gender-select blocks for `gender`, then positional arguments. A
 * template whose select syntax is broken comes back untouched; one whose
 * positional part is broken comes back with only the selects applied.
 */
export const renderTemplate = (source: string, gender: GenderKey, args: readonly string[]): string => {
  let selected: string;
  try {
    selected = renderNodes(parseTemplate(source), gender);
  } catch (error) {
    if (!(error instanceof TemplateSyntaxError)) throw error;
    console.warn(`[Templates] ${error.message}: ${source}`);
    return source;
  }

  return formatPositional(selected, args) ?? selected;
};
