/**
 * 核心工具函数模块
 */

import * as fs from 'fs'

// 语法文件中的分节符与声明指令
export const SECTION_SEPARATOR = '%%'
export const PROLOGUE_START = '%{'
export const PROLOGUE_END = '%}'
export const PRECEDENCE_DIRECTIVE = '%prec'
export const TOKEN_DIRECTIVES = ['%token', '%left', '%right', '%nonassoc', '%precedence']

// 补丁表中的特殊取值
export const IGNORE_SENTINEL = 'ignore'
export const ADDON_MARKER = 'ADDON:'
export const OVERRIDE_SEPARATOR = '=>'

// 生成文法的默认配置
export const DEFAULT_TYPE_TAG = '<str>'
export const DEFAULT_STATEMENT_NONTERMINAL = 'stmt'
export const DEFAULT_START_RULE = 'prog: statements;'

// 动作代码中的标记
export const FEATURE_NOT_SUPPORTED_MARKER = 'ERRCODE_FEATURE_NOT_SUPPORTED'
export const CONDITIONAL_GUARD_PATTERN = /\bif\s*\(/

/**
 * 错误种类，与进程退出码一一对应
 */
export type TransducerErrorKind =
  | 'Usage'
  | 'OpenFailure'
  | 'UnterminatedAction'
  | 'UnterminatedComment'
  | 'UnterminatedRule'
  | 'UnbalancedBrace'
  | 'MalformedRule'
  | 'DuplicateAddonTag'
  | 'DuplicatePatchEntry'
  | 'MalformedPatchTable'
  | 'UnusedPatchEntry'
  | 'AmbiguousPatchEntry'

export const EXIT_CODES: { [kind in TransducerErrorKind]: number } = {
  Usage: 1,
  OpenFailure: 2,
  UnterminatedAction: 3,
  UnterminatedComment: 4,
  UnterminatedRule: 5,
  UnbalancedBrace: 6,
  MalformedRule: 7,
  DuplicateAddonTag: 8,
  DuplicatePatchEntry: 9,
  MalformedPatchTable: 10,
  UnusedPatchEntry: 11,
  AmbiguousPatchEntry: 12,
}

export class TransducerError extends Error {
  public readonly kind: TransducerErrorKind
  public readonly lineNumber: number

  get exitCode(): number {
    return EXIT_CODES[this.kind]
  }

  constructor(kind: TransducerErrorKind, message: string, lineNumber: number = 0) {
    super(lineNumber > 0 ? `${message}（第${lineNumber}行）` : message)
    this.kind = kind
    this.lineNumber = lineNumber
    this.name = 'TransducerError'
  }
}

/**
 * 断言函数，如果条件为假则抛出错误
 */
export function requireCondition(
  condition: unknown,
  kind: TransducerErrorKind,
  message: string,
  lineNumber: number = 0
): asserts condition {
  if (!condition) throw new TransducerError(kind, message, lineNumber)
}

/**
 * 读取文本文件，统一换行符
 */
export function readTextFile(filePath: string): string {
  requireCondition(fs.existsSync(filePath), 'OpenFailure', `找不到文件: ${filePath}`)
  requireCondition(fs.statSync(filePath).isFile(), 'OpenFailure', `不是普通文件: ${filePath}`)
  try {
    return fs.readFileSync(filePath, 'utf-8').replace(/\r\n/g, '\n')
  } catch (ex) {
    throw new TransducerError('OpenFailure', `无法读取文件 ${filePath}: ${ex instanceof Error ? ex.message : String(ex)}`)
  }
}

/**
 * 按行切分文本，去掉文件末尾换行符带来的空行
 */
export function splitLines(text: string): string[] {
  if (text === '') return []
  const lines = text.split('\n')
  if (lines[lines.length - 1] === '') lines.pop()
  return lines
}

/**
 * 计算产生式签名：去掉所有空白与 | 字符
 */
export function normalizeSignature(text: string): string {
  return text.replace(/[\s|]+/g, '')
}

/**
 * 转义为C字符串字面量的内容
 */
export function escapeCString(str: string): string {
  return str.replace(/\\/g, '\\\\').replace(/"/g, '\\"')
}

/**
 * 穷尽检查
 */
export function assertNever(value: never): never {
  throw new Error(`未处理的分支: ${JSON.stringify(value)}`)
}
