/**
 * 产生式构建器
 * 消费阅读器事件，组装候选式并交给动作合成器
 */

import { requireCondition, DEFAULT_TYPE_TAG, PRECEDENCE_DIRECTIVE } from '../../core/utils'
import { OutputEmitter } from '../output/OutputEmitter'
import { PatchTables } from '../patch/PatchTypes'
import { ActionSynthesizer } from './ActionSynthesizer'
import { Alternative, GrammarEvent, TokenSet } from './GrammarTypes'

type BuilderMode = 'idle' | 'rule' | 'skip'

export class RuleBuilder {
  private readonly _tables: PatchTables
  private readonly _emitter: OutputEmitter
  private readonly _synthesizer: ActionSynthesizer
  private readonly _tokens: TokenSet
  private readonly _defaultTypeTag: string
  private readonly _typedNonterminals: Set<string> = new Set()

  private _mode: BuilderMode = 'idle'
  private _ruleLine = 0
  private _alternative: Alternative = RuleBuilder._emptyAlternative('', 0)
  private _expectPrecedence = false // 上一个符号是 %prec

  // 统计信息
  private _ruleCount = 0
  private _ignoredRuleCount = 0
  private _alternativeCount = 0

  get ruleCount(): number {
    return this._ruleCount
  }

  get ignoredRuleCount(): number {
    return this._ignoredRuleCount
  }

  get alternativeCount(): number {
    return this._alternativeCount
  }

  constructor(
    tables: PatchTables,
    emitter: OutputEmitter,
    tokens: TokenSet,
    synthesizer: ActionSynthesizer,
    defaultTypeTag: string = DEFAULT_TYPE_TAG
  ) {
    this._tables = tables
    this._emitter = emitter
    this._tokens = tokens
    this._synthesizer = synthesizer
    this._defaultTypeTag = defaultTypeTag
  }

  private static _emptyAlternative(owner: string, line: number): Alternative {
    return { owner, symbols: [], precedence: [], actionText: '', line }
  }

  build(events: Iterable<GrammarEvent>): void {
    for (const event of events) {
      this.consume(event)
    }
  }

  consume(event: GrammarEvent): void {
    switch (event.kind) {
      case 'beginDeclarations':
      case 'beginRules':
        break
      case 'tokenDeclared':
        this._tokens.declare(event.name)
        break
      case 'declarationEcho':
        this._emitter.append('origTokens', event.text)
        break
      case 'nonterminalDeclared':
        this._onNonterminal(event.name, event.line)
        break
      case 'symbol':
        this._onSymbol(event.text, event.line)
        break
      case 'action':
        if (this._mode === 'rule') {
          this._alternative.actionText += this._alternative.actionText === '' ? event.text : `\n${event.text}`
        }
        break
      case 'alternativeEnd':
        if (this._mode === 'skip') break
        requireCondition(this._mode === 'rule', 'MalformedRule', '规则之外出现了 |', event.line)
        this._finishAlternative(event.line)
        break
      case 'ruleEnd':
        if (this._mode === 'rule') {
          this._finishAlternative(event.line)
          this._synthesizer.endRule(this._ruleLine)
        } else {
          requireCondition(this._mode === 'skip', 'MalformedRule', '规则之外出现了 ;', event.line)
        }
        this._mode = 'idle'
        break
      case 'endRules':
      case 'endOfInput':
        requireCondition(this._mode === 'idle', 'UnterminatedRule', '文法结束时规则未终止', this._ruleLine)
        break
    }
  }

  private _onNonterminal(name: string, line: number): void {
    requireCondition(this._mode === 'idle', 'UnterminatedRule', `规则未终止，随后又声明了 ${name}`, this._ruleLine)
    this._ruleLine = line
    this._ruleCount += 1

    // 同一张表同时承担“忽略”与“改写类型”两种用途，查找一次计数一次
    const patch = this._tables.nonterminals.lookup(name)
    if (patch !== undefined && patch.kind === 'ignore') {
      this._ignoredRuleCount += 1
      this._mode = 'skip'
      return
    }

    if (!this._typedNonterminals.has(name)) {
      this._typedNonterminals.add(name)
      const tag = patch === undefined ? this._defaultTypeTag : patch.tag
      this._emitter.append('types', `%type ${tag} ${name}`)
    }

    this._mode = 'rule'
    this._expectPrecedence = false
    this._alternative = RuleBuilder._emptyAlternative(name, line)
    this._synthesizer.beginRule(name)
  }

  private _onSymbol(rawText: string, line: number): void {
    if (this._mode === 'skip') return
    requireCondition(this._mode === 'rule', 'MalformedRule', `规则之外出现了符号 ${rawText}`, line)

    const text = this._tables.rename.lookup(rawText) ?? rawText
    if (text === PRECEDENCE_DIRECTIVE) {
      this._expectPrecedence = true
      return
    }
    if (this._expectPrecedence) {
      this._alternative.precedence.push(text)
      this._expectPrecedence = false
      return
    }
    this._alternative.symbols.push(this._tokens.classify(text))
  }

  private _finishAlternative(line: number): void {
    this._synthesizer.synthesize(this._alternative)
    this._alternativeCount += 1
    this._alternative = RuleBuilder._emptyAlternative(this._alternative.owner, line)
    this._expectPrecedence = false
  }
}
