/**
 * 动作代码合成器
 * 为每个候选式生成重建原文的默认动作，并按补丁表替换、丢弃或扩展
 */

import {
  assertNever,
  escapeCString,
  requireCondition,
  normalizeSignature,
  CONDITIONAL_GUARD_PATTERN,
  FEATURE_NOT_SUPPORTED_MARKER,
} from '../../core/utils'
import { OutputEmitter } from '../output/OutputEmitter'
import { PatchTables } from '../patch/PatchTypes'
import { Alternative, GrammarSymbol, TokenSet, alternativeText } from './GrammarTypes'

// CREATE ... AS EXECUTE 产生式即使带有“不支持”标记也不输出警告
export const CREATE_AS_EXECUTE_OWNER = 'ExecuteStmt'

export const UNSUPPORTED_FEATURE_WARNING =
  'mmerror(PARSE_ERROR, ET_WARNING, "unsupported feature will be passed to server");'

/**
 * 动作中的一个字段：Token文本，或第 position 个符号的结果
 */
export type ActionField = { kind: 'text'; text: string } | { kind: 'result'; position: number }

/**
 * 合并相邻的文本字段，得到 cat_str 的参数列表
 */
export function mergeFields(fields: ActionField[]): string[] {
  const units: string[] = []
  let run: string[] = []
  const flushRun = () => {
    if (run.length > 0) {
      units.push(`mm_strdup("${escapeCString(run.join(' '))}")`)
      run = []
    }
  }
  for (const field of fields) {
    if (field.kind === 'text') {
      run.push(field.text)
    } else {
      flushRun()
      units.push(`$${field.position}`)
    }
  }
  flushRun()
  return units
}

export function isCreateAsExecute(owner: string, symbols: GrammarSymbol[]): boolean {
  if (owner !== CREATE_AS_EXECUTE_OWNER || symbols.length === 0 || symbols[0].content !== 'CREATE') {
    return false
  }
  return symbols.some((symbol, index) => symbol.content === 'AS' && symbols[index + 1]?.content === 'EXECUTE')
}

export class ActionSynthesizer {
  private readonly _tables: PatchTables
  private readonly _emitter: OutputEmitter
  private readonly _tokens: TokenSet
  private readonly _statementNonterminal: string

  private _owner = ''
  private _statementMode = false
  private _emittedCount = 0 // 当前规则已输出的候选式数

  constructor(tables: PatchTables, emitter: OutputEmitter, tokens: TokenSet, statementNonterminal: string) {
    this._tables = tables
    this._emitter = emitter
    this._tokens = tokens
    this._statementNonterminal = statementNonterminal
  }

  beginRule(owner: string): void {
    this._owner = owner
    this._statementMode = owner === this._statementNonterminal
    this._emittedCount = 0
  }

  /**
   * 结束当前规则；候选式全部被丢弃时没有可输出的规则体，应改用非终结符表忽略
   */
  endRule(ruleLine: number): void {
    requireCondition(
      this._emittedCount > 0,
      'MalformedRule',
      `${this._owner} 的候选式全部被 overrides 丢弃，应在 nonterminals 表中忽略该非终结符`,
      ruleLine
    )
    this._emitter.append('rules', ';')
    this._emitter.append('rules', '')
  }

  synthesize(alternative: Alternative): void {
    let symbols = alternative.symbols
    let precedence = alternative.precedence
    let text = alternativeText(symbols, precedence)
    let signature = normalizeSignature(`${this._owner} ${text}`)

    const override = this._tables.overrides.lookup(signature)
    if (override !== undefined) {
      switch (override.kind) {
        case 'ignore':
          return
        case 'replace': {
          const replaced = this._tokens.parseAlternativeText(override.text)
          symbols = replaced.symbols
          precedence = replaced.precedence
          text = alternativeText(symbols, precedence)
          signature = normalizeSignature(`${this._owner} ${text}`)
          break
        }
        default:
          assertNever(override)
      }
    }

    const grammarLine = this._emittedCount === 0 ? `${this._owner}: ${text}` : `| ${text}`
    this._emitter.append('rules', grammarLine.trimEnd())
    this._emittedCount += 1

    const statements = this._defaultStatements(alternative.actionText, symbols)
    const defaultAction = `\t{ ${statements.join(' ')} }`

    const addon = this._tables.addons.lookup(signature)
    if (addon === undefined || addon.body.length === 0) {
      this._emitter.append('rules', defaultAction)
      return
    }
    switch (addon.kind) {
      case 'block':
        this._emitter.appendLines('rules', addon.body)
        break
      case 'rule':
        this._emitter.append('rules', defaultAction)
        this._emitter.appendLines('rules', addon.body)
        break
      case 'addon':
        this._emitter.append('rules', '\t{')
        this._emitter.appendLines('rules', addon.body)
        this._emitter.append('rules', `\t${statements.join(' ')}`)
        this._emitter.append('rules', '\t}')
        break
      default:
        assertNever(addon.kind)
    }
  }

  /**
   * Token在重建文本中的写法
   */
  private _spell(symbol: GrammarSymbol): string {
    if (symbol.type === 'literal') {
      return symbol.content.substring(1, symbol.content.length - 1)
    }
    return this._tables.spellings.lookup(symbol.content) ?? symbol.content.replace(/_P$/, '')
  }

  private _fields(symbols: GrammarSymbol[]): ActionField[] {
    return symbols.map((symbol, index): ActionField =>
      symbol.type === 'nonterminal' ? { kind: 'result', position: index + 1 } : { kind: 'text', text: this._spell(symbol) }
    )
  }

  private _defaultStatements(actionText: string, symbols: GrammarSymbol[]): string[] {
    const units = mergeFields(this._fields(symbols))

    if (this._statementMode) {
      return units.length > 0 ? [`output_statement(${units[0]}, 0, ECPGst_normal);`] : ['$$ = NULL;']
    }

    const statements: string[] = []
    if (
      actionText.includes(FEATURE_NOT_SUPPORTED_MARKER) &&
      !CONDITIONAL_GUARD_PATTERN.test(actionText) &&
      !isCreateAsExecute(this._owner, symbols)
    ) {
      statements.push(UNSUPPORTED_FEATURE_WARNING)
    }

    if (units.length === 0) {
      statements.push('$$ = EMPTY;')
    } else if (units.length === 1) {
      statements.push(`$$ = ${units[0]};`)
    } else {
      statements.push(`$$ = cat_str(${units.length}, ${units.join(', ')});`)
    }
    return statements
  }
}
