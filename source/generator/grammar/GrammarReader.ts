/**
 * 语法定义文件（.y）阅读器
 * 逐行扫描宿主文法，跳过动作代码与注释，产生结构事件流
 */

import {
  requireCondition,
  splitLines,
  SECTION_SEPARATOR,
  PROLOGUE_START,
  PROLOGUE_END,
  TOKEN_DIRECTIVES,
  TransducerError,
} from '../../core/utils'
import { GrammarEvent } from './GrammarTypes'

interface ActionState {
  kind: 'action'
  depth: number
  startLine: number
  quote: string | null // 动作代码中尚未闭合的引号
  escaped: boolean
  text: string
}

/**
 * 扫描器状态
 */
type ScannerState =
  | { kind: 'code' }
  | { kind: 'comment'; startLine: number; resume: ActionState | null }
  | { kind: 'prologue'; startLine: number }
  | ActionState

type Section = 'declarations' | 'rules' | 'epilogue'

type LineItem =
  | { type: 'word'; text: string; line: number }
  | { type: 'punct'; char: string; line: number }
  | { type: 'action'; text: string; line: number }

interface PendingWord {
  text: string
  line: number
}

function isQuoted(word: string): boolean {
  return word[0] === "'" || word[0] === '"'
}

/**
 * 找到从 start 处开始的引号字面量的结束位置（含）
 */
function findQuoteEnd(line: string, start: number): number {
  const quote = line[start]
  let escaped = false
  for (let i = start + 1; i < line.length; i++) {
    if (escaped) {
      escaped = false
    } else if (line[i] === '\\') {
      escaped = true
    } else if (line[i] === quote) {
      return i
    }
  }
  return line.length - 1
}

export class GrammarReader {
  private readonly _lines: string[]
  private _state: ScannerState = { kind: 'code' }
  private _section: Section = 'declarations'
  private _separatorCount = 0
  private _directive = '' // 当前生效的声明指令，续行沿用
  private _pending: PendingWord | null = null

  constructor(grammarText: string) {
    this._lines = splitLines(grammarText.replace(/\r\n/g, '\n'))
  }

  *events(): Generator<GrammarEvent> {
    yield { kind: 'beginDeclarations', line: 1 }

    for (let index = 0; index < this._lines.length; index++) {
      const lineNumber = index + 1
      const line = this._lines[index]

      if (this._state.kind === 'prologue') {
        if (line.trim().startsWith(PROLOGUE_END)) {
          this._state = { kind: 'code' }
        }
        continue
      }

      if (this._state.kind === 'code' && line.startsWith(SECTION_SEPARATOR)) {
        yield* this._onSeparator(lineNumber)
        continue
      }

      switch (this._section) {
        case 'declarations':
          if (this._state.kind === 'code' && line.trim().startsWith(PROLOGUE_START)) {
            this._state = { kind: 'prologue', startLine: lineNumber }
            continue
          }
          yield* this._declarationEvents(this._scanLine(line, lineNumber), lineNumber)
          break
        case 'rules':
          yield* this._ruleEvents(this._scanLine(line, lineNumber))
          break
        case 'epilogue':
          break
      }
    }

    const state = this._state
    switch (state.kind) {
      case 'action':
        throw new TransducerError('UnterminatedAction', '动作代码块未闭合', state.startLine)
      case 'prologue':
        throw new TransducerError('UnterminatedAction', `${PROLOGUE_START} 代码块未闭合`, state.startLine)
      case 'comment':
        throw new TransducerError('UnterminatedComment', '注释未闭合', state.startLine)
      case 'code':
        break
    }

    yield* this._flushPending()
    yield { kind: 'endOfInput', line: this._lines.length }
  }

  /**
   * 处理 %% 分节符
   */
  private *_onSeparator(lineNumber: number): Generator<GrammarEvent> {
    this._separatorCount += 1
    if (this._separatorCount === 1) {
      this._section = 'rules'
      yield { kind: 'beginRules', line: lineNumber }
    } else if (this._separatorCount === 2) {
      yield* this._flushPending()
      this._section = 'epilogue'
      yield { kind: 'endRules', line: lineNumber }
    }
  }

  /**
   * 声明部分：只关心Token与优先级声明
   */
  private *_declarationEvents(items: LineItem[], lineNumber: number): Generator<GrammarEvent> {
    const words: string[] = []
    for (const item of items) {
      if (item.type === 'word') words.push(item.text)
    }
    if (words.length === 0) return

    const hasDirective = words[0][0] === '%'
    if (hasDirective) {
      // %token<str> 这样紧贴的类型标注
      words[0] = words[0].replace(/<.*>$/, '')
      this._directive = words[0]
    }
    if (!TOKEN_DIRECTIVES.includes(this._directive)) return

    // 丢弃 <type> 标注
    const names = (hasDirective ? words.slice(1) : words).filter(word => word[0] !== '<')
    for (const name of names) {
      if (!isQuoted(name)) {
        yield { kind: 'tokenDeclared', name, line: lineNumber }
      }
    }
    const echo = hasDirective ? [words[0], ...names] : names
    if (echo.length > 0) {
      yield { kind: 'declarationEcho', text: echo.join(' '), line: lineNumber }
    }
  }

  /**
   * 产生式部分：名字后面紧跟 : 才是非终结符声明，因此单词要延迟一个位置输出
   */
  private *_ruleEvents(items: LineItem[]): Generator<GrammarEvent> {
    for (const item of items) {
      switch (item.type) {
        case 'word':
          yield* this._flushPending()
          this._pending = { text: item.text, line: item.line }
          break
        case 'action':
          yield* this._flushPending()
          yield { kind: 'action', text: item.text, line: item.line }
          break
        case 'punct':
          if (item.char === ':') {
            const pending = this._pending
            requireCondition(pending !== null, 'MalformedRule', ': 之前缺少非终结符名', item.line)
            this._pending = null
            yield { kind: 'nonterminalDeclared', name: pending.text, line: pending.line }
          } else if (item.char === '|') {
            yield* this._flushPending()
            yield { kind: 'alternativeEnd', line: item.line }
          } else {
            yield* this._flushPending()
            yield { kind: 'ruleEnd', line: item.line }
          }
          break
      }
    }
  }

  private *_flushPending(): Generator<GrammarEvent> {
    if (this._pending !== null) {
      yield { kind: 'symbol', text: this._pending.text, line: this._pending.line }
      this._pending = null
    }
  }

  /**
   * 按字符扫描一行，维护跨行的注释/动作状态
   */
  private _scanLine(line: string, lineNumber: number): LineItem[] {
    const items: LineItem[] = []
    let word = ''
    const flushWord = () => {
      if (word !== '') {
        items.push({ type: 'word', text: word, line: lineNumber })
        word = ''
      }
    }

    let i = 0
    while (i < line.length) {
      const ch = line[i]
      const next = line.charAt(i + 1)
      const state = this._state

      switch (state.kind) {
        case 'comment':
          if (ch === '*' && next === '/') {
            if (state.resume !== null) state.resume.text += '*/'
            this._state = state.resume ?? { kind: 'code' }
            i += 2
          } else {
            if (state.resume !== null) state.resume.text += ch
            i += 1
          }
          break

        case 'action':
          i += 1
          if (state.quote !== null) {
            state.text += ch
            if (state.escaped) {
              state.escaped = false
            } else if (ch === '\\') {
              state.escaped = true
            } else if (ch === state.quote) {
              state.quote = null
            }
          } else if (ch === '/' && next === '*') {
            state.text += '/*'
            i += 1
            this._state = { kind: 'comment', startLine: lineNumber, resume: state }
          } else if (ch === '/' && next === '/') {
            state.text += line.slice(i - 1)
            i = line.length
          } else if (ch === '"' || ch === "'") {
            state.quote = ch
            state.text += ch
          } else if (ch === '{') {
            state.depth += 1
            state.text += ch
          } else if (ch === '}') {
            state.depth -= 1
            if (state.depth === 0) {
              items.push({ type: 'action', text: state.text.trim(), line: state.startLine })
              this._state = { kind: 'code' }
            } else {
              state.text += ch
            }
          } else {
            state.text += ch
          }
          break

        case 'code':
          if (ch === '/' && next === '*') {
            flushWord()
            this._state = { kind: 'comment', startLine: lineNumber, resume: null }
            i += 2
          } else if (ch === '/' && next === '/') {
            flushWord()
            i = line.length
          } else if (ch === '{') {
            flushWord()
            this._state = { kind: 'action', depth: 1, startLine: lineNumber, quote: null, escaped: false, text: '' }
            i += 1
          } else if (ch === '}') {
            throw new TransducerError('UnbalancedBrace', '多余的 }', lineNumber)
          } else if (ch === "'" || ch === '"') {
            flushWord()
            const end = findQuoteEnd(line, i)
            items.push({ type: 'word', text: line.slice(i, end + 1), line: lineNumber })
            i = end + 1
          } else if (ch === ':' || ch === '|' || ch === ';') {
            flushWord()
            items.push({ type: 'punct', char: ch, line: lineNumber })
            i += 1
          } else if (/\s/.test(ch)) {
            flushWord()
            i += 1
          } else {
            word += ch
            i += 1
          }
          break

        case 'prologue':
          i = line.length
          break
      }
    }
    flushWord()

    // 动作代码跨行时保留换行
    const state = this._state
    if (state.kind === 'action') {
      state.text += '\n'
    } else if (state.kind === 'comment' && state.resume !== null) {
      state.resume.text += '\n'
    }
    return items
  }
}

/**
 * 读取整个文法文本，惰性产生结构事件
 */
export function readGrammar(grammarText: string): Generator<GrammarEvent> {
  return new GrammarReader(grammarText).events()
}
