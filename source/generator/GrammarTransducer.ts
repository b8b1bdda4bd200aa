/**
 * 文法转换器入口
 * 从宿主文法（.y）与补丁表生成嵌入式SQL预处理器的派生文法
 */

import * as path from 'path'
import { readTextFile, DEFAULT_START_RULE, DEFAULT_STATEMENT_NONTERMINAL, DEFAULT_TYPE_TAG } from '../core/utils'
import { readGrammar } from './grammar/GrammarReader'
import { RuleBuilder } from './grammar/RuleBuilder'
import { ActionSynthesizer } from './grammar/ActionSynthesizer'
import { TokenSet } from './grammar/GrammarTypes'
import { OutputEmitter } from './output/OutputEmitter'
import { PatchTables } from './patch/PatchTypes'
import { SnippetSet, loadPatchTables, loadSnippets } from './patch/PatchTableLoader'
import { assertPatchIntegrity } from './patch/IntegrityChecker'

export interface TransducerOptions {
  statementNonterminal: string // 顶层语句非终结符，其动作改为分发语句
  startRule: string // 紧跟在 %% 之后的开始符号绑定规则
  defaultTypeTag: string
  log: (message: string) => void
}

export const DEFAULT_TRANSDUCER_OPTIONS: TransducerOptions = {
  statementNonterminal: DEFAULT_STATEMENT_NONTERMINAL,
  startRule: DEFAULT_START_RULE,
  defaultTypeTag: DEFAULT_TYPE_TAG,
  log: () => undefined,
}

export interface TransducerInput {
  grammarText: string
  tables: PatchTables
  snippets: SnippetSet
}

/**
 * 执行一次完整的转换，返回已通过完整性检查、尚未写出的缓冲区
 * 补丁表的计数器会被修改，每次运行须使用新加载的表
 */
function runTransducer(input: TransducerInput, options: Partial<TransducerOptions>): OutputEmitter {
  const settings: TransducerOptions = { ...DEFAULT_TRANSDUCER_OPTIONS, ...options }
  const emitter = createEmitter(input.snippets, settings.startRule)
  const tokens = new TokenSet()
  const synthesizer = new ActionSynthesizer(input.tables, emitter, tokens, settings.statementNonterminal)
  const builder = new RuleBuilder(input.tables, emitter, tokens, synthesizer, settings.defaultTypeTag)

  builder.build(readGrammar(input.grammarText))
  settings.log(
    `[GrammarTransducer] 处理了 ${builder.ruleCount} 条规则（忽略 ${builder.ignoredRuleCount} 条），` +
      `${builder.alternativeCount} 个候选式，${tokens.size} 个Token`
  )

  assertPatchIntegrity(input.tables)
  settings.log('[GrammarTransducer] 补丁表完整性检查通过')
  return emitter
}

/**
 * 转换文法文本，返回派生文法文本
 */
export function transduceGrammar(input: TransducerInput, options: Partial<TransducerOptions> = {}): string {
  return runTransducer(input, options).render()
}

function createEmitter(snippets: SnippetSet, startRule: string): OutputEmitter {
  const emitter = new OutputEmitter(startRule)
  emitter.appendLines('header', snippets.header)
  emitter.appendLines('tokens', snippets.tokens)
  emitter.appendLines('typeSnippet', snippets.typeSnippet)
  emitter.appendLines('trailer', snippets.trailer)
  return emitter
}

/**
 * 从文件生成派生文法
 * @param sourceDir 补丁表与代码片段所在目录
 * @param grammarFilePath 宿主文法文件
 * @param outputPath 输出文件（可选，默认为同目录下的 preproc.y）
 */
export function generateDerivativeGrammar(
  sourceDir: string,
  grammarFilePath: string,
  outputPath?: string,
  options: Partial<TransducerOptions> = {}
): string {
  const log = options.log ?? DEFAULT_TRANSDUCER_OPTIONS.log
  const target = outputPath ?? path.join(path.dirname(grammarFilePath), 'preproc.y')

  log(`[GrammarTransducer] 加载补丁表: ${sourceDir}`)
  const tables = loadPatchTables(sourceDir)
  const snippets = loadSnippets(sourceDir)
  log(
    `[GrammarTransducer] 补丁表加载完成：${tables.nonterminals.size} 个非终结符补丁，` +
      `${tables.overrides.size} 个候选式替换，${tables.addons.size} 个 addon`
  )

  log(`[GrammarTransducer] 开始转换语法文件: ${grammarFilePath}`)
  const grammarText = readTextFile(grammarFilePath)
  // 检查通过后才写出，失败时不留下半成品
  runTransducer({ grammarText, tables, snippets }, options).flush(target)
  log(`[GrammarTransducer] 派生文法已生成: ${target}`)
  return target
}
