/**
 * 补丁表与代码片段加载器
 * 补丁表均为纯文本：键值对表、签名替换表和按标记分段的 addons 文件
 */

import * as fs from 'fs'
import * as path from 'path'
import {
  requireCondition,
  readTextFile,
  splitLines,
  normalizeSignature,
  ADDON_MARKER,
  IGNORE_SENTINEL,
  OVERRIDE_SEPARATOR,
} from '../../core/utils'
import { AddonKind, AddonPatch, NonterminalPatch, OverridePatch, PatchTable, PatchTableName, PatchTables } from './PatchTypes'

export const PATCH_FILE_NAMES = {
  rename: 'preproc.rename',
  nonterminals: 'preproc.nonterminals',
  overrides: 'preproc.overrides',
  addons: 'preproc.addons',
  spellings: 'preproc.spellings', // 可选
}

export const SNIPPET_FILE_NAMES = {
  header: 'preproc.header',
  tokens: 'preproc.tokens',
  typeSnippet: 'preproc.type',
  trailer: 'preproc.trailer',
}

/**
 * 原样拷贝到输出缓冲区的代码片段
 */
export interface SnippetSet {
  header: string[]
  tokens: string[]
  typeSnippet: string[]
  trailer: string[]
}

export interface PatchTableSources {
  rename: string
  nonterminals: string
  overrides: string
  addons: string
  spellings?: string
}

const ADDON_KINDS: AddonKind[] = ['block', 'addon', 'rule']

function isAddonKind(word: string): word is AddonKind {
  return ADDON_KINDS.some(kind => kind === word)
}

/**
 * 遍历表文件中的有效行（跳过空行与 # 注释）
 */
function forEachTableLine(text: string, callback: (line: string, lineNumber: number) => void): void {
  splitLines(text).forEach((rawLine, index) => {
    const line = rawLine.trim()
    if (line === '' || line[0] === '#') return
    callback(line, index + 1)
  })
}

/**
 * 解析“键 值”形式的表
 */
function parsePairs<V>(table: PatchTable<V>, text: string, toValue: (value: string) => V): PatchTable<V> {
  forEachTableLine(text, (line, lineNumber) => {
    const match = /^(\S+)\s+(.+)$/.exec(line)
    requireCondition(match !== null, 'MalformedPatchTable', `${table.name} 表中缺少取值：${line}`, lineNumber)
    table.define(match[1], toValue(match[2].trim()), lineNumber)
  })
  return table
}

export function parseRenameTable(text: string): PatchTable<string> {
  return parsePairs(new PatchTable<string>('rename', false), text, value => value)
}

export function parseSpellingTable(text: string): PatchTable<string> {
  return parsePairs(new PatchTable<string>('spellings', false), text, value => value)
}

export function parseNonterminalTable(text: string): PatchTable<NonterminalPatch> {
  return parsePairs(
    new PatchTable<NonterminalPatch>('nonterminals', true),
    text,
    (value): NonterminalPatch => (value === IGNORE_SENTINEL ? { kind: 'ignore' } : { kind: 'type', tag: value })
  )
}

/**
 * 解析“签名 => 替换文本”形式的表
 */
export function parseOverrideTable(text: string): PatchTable<OverridePatch> {
  const table = new PatchTable<OverridePatch>('overrides', true, normalizeSignature)
  forEachTableLine(text, (line, lineNumber) => {
    const separatorIndex = line.indexOf(OVERRIDE_SEPARATOR)
    requireCondition(separatorIndex > 0, 'MalformedPatchTable', `overrides 表中缺少 ${OVERRIDE_SEPARATOR}：${line}`, lineNumber)
    const signature = line.substring(0, separatorIndex).trim()
    const replacement = line.substring(separatorIndex + OVERRIDE_SEPARATOR.length).trim()
    requireCondition(replacement !== '', 'MalformedPatchTable', `overrides 表中缺少替换文本：${line}`, lineNumber)
    table.define(
      signature,
      replacement === IGNORE_SENTINEL ? { kind: 'ignore' } : { kind: 'replace', text: replacement },
      lineNumber
    )
  })
  return table
}

function trimTrailingBlankLines(records: AddonPatch[]): void {
  for (const record of records) {
    while (record.body.length > 0 && record.body[record.body.length - 1].trim() === '') {
      record.body.pop()
    }
  }
}

/**
 * 解析 addons 文件
 * 连续出现的多个标记行共享其后的同一段代码
 */
export function parseAddonTable(text: string): PatchTable<AddonPatch> {
  const table = new PatchTable<AddonPatch>('addons', true, normalizeSignature)
  const markerPattern = new RegExp(`^${ADDON_MARKER}\\s+(\\S+)\\s+(.*\\S)\\s*$`)

  let waiting: AddonPatch[] = [] // 等待代码的记录
  let receivingBody = false

  splitLines(text).forEach((line, index) => {
    const lineNumber = index + 1
    if (line.startsWith(ADDON_MARKER)) {
      const match = markerPattern.exec(line)
      requireCondition(match !== null, 'MalformedPatchTable', `addons 标记行格式错误：${line}`, lineNumber)
      const kind = match[1]
      requireCondition(isAddonKind(kind), 'MalformedPatchTable', `未知的 addon 类型：${kind}`, lineNumber)

      if (receivingBody) {
        trimTrailingBlankLines(waiting)
        waiting = []
        receivingBody = false
      }
      const record: AddonPatch = { kind, body: [] }
      table.define(match[2], record, lineNumber)
      waiting.push(record)
    } else if (waiting.length > 0 && (receivingBody || line.trim() !== '')) {
      // 第一个标记之前的内容是说明文字，代码段开头的空行同样跳过
      receivingBody = true
      for (const record of waiting) {
        record.body.push(line)
      }
    }
  })
  trimTrailingBlankLines(waiting)
  return table
}

export function buildPatchTables(sources: PatchTableSources): PatchTables {
  return {
    rename: parseRenameTable(sources.rename),
    nonterminals: parseNonterminalTable(sources.nonterminals),
    overrides: parseOverrideTable(sources.overrides),
    addons: parseAddonTable(sources.addons),
    spellings: parseSpellingTable(sources.spellings ?? ''),
  }
}

/**
 * 从目录加载全部补丁表
 */
export function loadPatchTables(sourceDir: string): PatchTables {
  const read = (name: PatchTableName) => readTextFile(path.join(sourceDir, PATCH_FILE_NAMES[name]))
  const spellingsPath = path.join(sourceDir, PATCH_FILE_NAMES.spellings)
  return buildPatchTables({
    rename: read('rename'),
    nonterminals: read('nonterminals'),
    overrides: read('overrides'),
    addons: read('addons'),
    spellings: fs.existsSync(spellingsPath) ? readTextFile(spellingsPath) : undefined,
  })
}

/**
 * 从目录加载代码片段
 */
export function loadSnippets(sourceDir: string): SnippetSet {
  const read = (name: keyof SnippetSet) => splitLines(readTextFile(path.join(sourceDir, SNIPPET_FILE_NAMES[name])))
  return {
    header: read('header'),
    tokens: read('tokens'),
    typeSnippet: read('typeSnippet'),
    trailer: read('trailer'),
  }
}
