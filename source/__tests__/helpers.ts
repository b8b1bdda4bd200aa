import { TransducerError } from '../core/utils'
import { readGrammar } from '../generator/grammar/GrammarReader'
import { RuleBuilder } from '../generator/grammar/RuleBuilder'
import { ActionSynthesizer } from '../generator/grammar/ActionSynthesizer'
import { TokenSet } from '../generator/grammar/GrammarTypes'
import { OutputEmitter } from '../generator/output/OutputEmitter'
import { PatchTableSources, SnippetSet, buildPatchTables } from '../generator/patch/PatchTableLoader'
import { PatchTables } from '../generator/patch/PatchTypes'

export const NO_SNIPPETS: SnippetSet = { header: [], tokens: [], typeSnippet: [], trailer: [] }

export function tablesFrom(sources: Partial<PatchTableSources> = {}): PatchTables {
  return buildPatchTables({ rename: '', nonterminals: '', overrides: '', addons: '', ...sources })
}

/**
 * 只运行阅读器、构建器与合成器，不做完整性检查
 */
export function buildRules(grammar: string, sources: Partial<PatchTableSources> = {}) {
  const tables = tablesFrom(sources)
  const emitter = new OutputEmitter()
  const tokens = new TokenSet()
  const synthesizer = new ActionSynthesizer(tables, emitter, tokens, 'stmt')
  const builder = new RuleBuilder(tables, emitter, tokens, synthesizer)
  builder.build(readGrammar(grammar))
  return { tables, emitter, builder, rules: emitter.lines('rules'), types: emitter.lines('types') }
}

export function captureError(fn: () => unknown): TransducerError {
  try {
    fn()
  } catch (ex) {
    if (ex instanceof TransducerError) return ex
    throw ex
  }
  throw new Error('预期抛出 TransducerError')
}

/**
 * 取出输出中某个非终结符的规则块（从 "name:" 行到 ";" 行，含两端）
 */
export function ruleBlock(lines: string[], name: string): string[] {
  const start = lines.findIndex(line => line === `${name}:` || line.startsWith(`${name}: `))
  if (start === -1) return []
  const end = lines.indexOf(';', start)
  return lines.slice(start, end + 1)
}
