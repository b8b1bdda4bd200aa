/**
 * 文法转换相关类型定义
 */

import { PRECEDENCE_DIRECTIVE } from '../../core/utils'

/**
 * 语法符号类型
 */
export type GrammarSymbolType = 'token' | 'literal' | 'nonterminal'

/**
 * 语法符号
 */
export interface GrammarSymbol {
  type: GrammarSymbolType
  content: string
}

/**
 * 一个候选式（产生式的一个 | 分支）
 */
export interface Alternative {
  owner: string
  symbols: GrammarSymbol[]
  precedence: string[] // %prec 之后的符号，只写回文法，不参与文本重建
  actionText: string // 原动作代码，原样保留
  line: number
}

/**
 * 阅读器产生的结构事件
 */
export type GrammarEvent =
  | { kind: 'beginDeclarations'; line: number }
  | { kind: 'tokenDeclared'; name: string; line: number }
  | { kind: 'declarationEcho'; text: string; line: number }
  | { kind: 'beginRules'; line: number }
  | { kind: 'nonterminalDeclared'; name: string; line: number }
  | { kind: 'symbol'; text: string; line: number }
  | { kind: 'action'; text: string; line: number }
  | { kind: 'alternativeEnd'; line: number }
  | { kind: 'ruleEnd'; line: number }
  | { kind: 'endRules'; line: number }
  | { kind: 'endOfInput'; line: number }

/**
 * 已声明Token集合，用于区分终结符与非终结符
 */
export class TokenSet {
  private readonly _names = new Set<string>()

  get size(): number {
    return this._names.size
  }

  declare(name: string): void {
    this._names.add(name)
  }

  classify(text: string): GrammarSymbol {
    if (/^'.+'$/.test(text) || /^".+"$/.test(text)) {
      return { type: 'literal', content: text }
    }
    return { type: this._names.has(text) ? 'token' : 'nonterminal', content: text }
  }

  /**
   * 把一段替换文本切分为符号序列与 %prec 尾部
   */
  parseAlternativeText(text: string): { symbols: GrammarSymbol[]; precedence: string[] } {
    const words = text.split(/\s+/).filter(word => word !== '' && word !== '|')
    const precIndex = words.indexOf(PRECEDENCE_DIRECTIVE)
    const symbolWords = precIndex === -1 ? words : words.slice(0, precIndex)
    const precedence = precIndex === -1 ? [] : words.slice(precIndex + 1)
    return { symbols: symbolWords.map(word => this.classify(word)), precedence }
  }
}

/**
 * 候选式在文法中的文本形式
 */
export function alternativeText(symbols: GrammarSymbol[], precedence: string[]): string {
  const words = symbols.map(symbol => symbol.content)
  if (precedence.length > 0) {
    words.push(PRECEDENCE_DIRECTIVE, ...precedence)
  }
  return words.join(' ')
}
