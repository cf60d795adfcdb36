import Parser from 'tree-sitter';
import Go from 'tree-sitter-go';
import { LanguageAdapter } from './adapter';
import { SymbolInfo, SymbolKind } from '../types';
import { collapseWhitespace, findFirstByType, isUpperInitial } from './utils';

const LARGE_INPUT_BUFFER = 1024 * 1024;

/** Top-level Go declarations from a tree-sitter concrete syntax tree. */
export class GoAdapter implements LanguageAdapter {
  readonly variant = 'structured' as const;
  private parser: Parser | null = null;

  getLanguageId(): string {
    return 'go';
  }

  getSupportedFileExtensions(): string[] {
    return ['.go'];
  }

  extract(_filePath: string, content: string): SymbolInfo[] {
    const root = this.parseTree(content).rootNode;
    const symbols: SymbolInfo[] = [];

    for (const n of root.namedChildren) {
      switch (n.type) {
        case 'function_declaration':
        case 'method_declaration': {
          const sym = this.functionSymbol(n);
          if (sym) symbols.push(sym);
          break;
        }
        case 'type_declaration':
          for (const spec of n.namedChildren) {
            if (spec.type !== 'type_spec' && spec.type !== 'type_alias') continue;
            const sym = this.extractTypeSpec(spec);
            if (sym) symbols.push(sym);
          }
          break;
        case 'const_declaration':
          symbols.push(...this.extractValueSpecs(n, 'const_spec', 'const'));
          break;
        case 'var_declaration':
          symbols.push(...this.extractValueSpecs(n, 'var_spec', 'var'));
          break;
        default:
          break;
      }
    }

    return symbols;
  }

  /** Syntax tree for `content`; the parser is created on first use and reused. */
  parseTree(content: string): Parser.Tree {
    if (!this.parser) {
      this.parser = new Parser();
      this.parser.setLanguage(Go);
    }
    try {
      return this.parser.parse(content);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      if (!msg.includes('Invalid argument')) throw e;
      return this.parser.parse(content, undefined, {
        bufferSize: Math.max(LARGE_INPUT_BUFFER, content.length * 2),
      });
    }
  }

  /** Symbol for a `function_declaration` or `method_declaration` node. */
  functionSymbol(n: Parser.SyntaxNode): SymbolInfo | null {
    const nameNode = n.childForFieldName('name');
    if (!nameNode) return null;
    const receiver = n.type === 'method_declaration' ? n.childForFieldName('receiver') : null;
    return {
      name: nameNode.text,
      kind: receiver ? 'method' : 'func',
      line: n.startPosition.row + 1,
      endLine: n.endPosition.row + 1,
      exported: isUpperInitial(nameNode.text),
      signature: this.functionSignature(n, nameNode.text, receiver),
      parent: receiver ? this.receiverTypeName(receiver) : '',
    };
  }

  private functionSignature(n: Parser.SyntaxNode, name: string, receiver: Parser.SyntaxNode | null): string {
    const typeParams = n.childForFieldName('type_parameters');
    const params = n.childForFieldName('parameters');
    const result = n.childForFieldName('result');
    let sig = 'func ';
    if (receiver) sig += `${receiver.text} `;
    sig += name;
    if (typeParams) sig += typeParams.text;
    sig += params ? params.text : '()';
    if (result) sig += ` ${result.text}`;
    return collapseWhitespace(sig);
  }

  /** `(s *Server)`, `(b Box[T])` and `(x (T))` all yield the bare type name. */
  private receiverTypeName(receiver: Parser.SyntaxNode): string {
    const param = findFirstByType(receiver, ['parameter_declaration']);
    const typeNode = param?.childForFieldName('type') ?? null;
    if (!typeNode) return '';
    return findFirstByType(typeNode, ['type_identifier'])?.text ?? '';
  }

  private extractTypeSpec(spec: Parser.SyntaxNode): SymbolInfo | null {
    const nameNode = spec.childForFieldName('name');
    if (!nameNode) return null;
    const typeNode = spec.childForFieldName('type');
    let kind: SymbolKind = 'type';
    if (spec.type === 'type_spec' && typeNode?.type === 'struct_type') kind = 'struct';
    else if (spec.type === 'type_spec' && typeNode?.type === 'interface_type') kind = 'interface';
    return {
      name: nameNode.text,
      kind,
      line: spec.startPosition.row + 1,
      endLine: spec.endPosition.row + 1,
      exported: isUpperInitial(nameNode.text),
      signature: `type ${nameNode.text}`,
      parent: '',
    };
  }

  private extractValueSpecs(decl: Parser.SyntaxNode, specType: string, kind: 'const' | 'var'): SymbolInfo[] {
    const out: SymbolInfo[] = [];
    const specs = decl.namedChildren.flatMap((c) => (c.type === `${specType}_list` ? c.namedChildren : [c]));
    for (const spec of specs) {
      if (spec.type !== specType) continue;
      for (const child of spec.namedChildren) {
        if (child.type !== 'identifier') continue;
        out.push({
          name: child.text,
          kind,
          line: spec.startPosition.row + 1,
          endLine: spec.endPosition.row + 1,
          exported: isUpperInitial(child.text),
          signature: `${kind} ${child.text}`,
          parent: '',
        });
      }
    }
    return out;
  }
}
