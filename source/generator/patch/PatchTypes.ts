/**
 * 补丁表类型定义
 */

import { TransducerError } from '../../core/utils'

export type PatchTableName = 'rename' | 'nonterminals' | 'overrides' | 'addons' | 'spellings'

/**
 * 非终结符补丁：忽略整个非终结符，或改写其结果类型
 */
export type NonterminalPatch = { kind: 'ignore' } | { kind: 'type'; tag: string }

/**
 * 候选式补丁：丢弃该候选式，或以替换文本取代
 */
export type OverridePatch = { kind: 'ignore' } | { kind: 'replace'; text: string }

export type AddonKind = 'block' | 'addon' | 'rule'

export interface AddonPatch {
  kind: AddonKind
  body: string[]
}

/**
 * 补丁表条目，uses 为命中次数
 */
export interface PatchEntry<V> {
  key: string
  displayKey: string
  value: V
  uses: number
  line: number
}

/**
 * 带命中计数的补丁表
 */
export class PatchTable<V> {
  private readonly _name: PatchTableName
  private readonly _checked: boolean
  private readonly _normalizeKey: (key: string) => string
  private readonly _entries: Map<string, PatchEntry<V>> = new Map()

  get name(): PatchTableName {
    return this._name
  }

  /** 是否要求每个条目恰好命中一次 */
  get checked(): boolean {
    return this._checked
  }

  get size(): number {
    return this._entries.size
  }

  constructor(name: PatchTableName, checked: boolean, normalizeKey: (key: string) => string = key => key) {
    this._name = name
    this._checked = checked
    this._normalizeKey = normalizeKey
  }

  define(displayKey: string, value: V, line: number = 0): void {
    const key = this._normalizeKey(displayKey)
    const existing = this._entries.get(key)
    if (existing !== undefined) {
      throw new TransducerError(
        this._name === 'addons' ? 'DuplicateAddonTag' : 'DuplicatePatchEntry',
        `${this._name} 表中重复定义：${displayKey}（首次定义于第${existing.line}行）`,
        line
      )
    }
    this._entries.set(key, { key, displayKey, value, uses: 0, line })
  }

  /**
   * 查找并计数
   */
  lookup(key: string): V | undefined {
    const entry = this._entries.get(this._normalizeKey(key))
    if (entry === undefined) return undefined
    entry.uses += 1
    return entry.value
  }

  entries(): PatchEntry<V>[] {
    return [...this._entries.values()]
  }
}

/**
 * 一次运行所用的全部补丁表
 */
export interface PatchTables {
  rename: PatchTable<string>
  nonterminals: PatchTable<NonterminalPatch>
  overrides: PatchTable<OverridePatch>
  addons: PatchTable<AddonPatch>
  spellings: PatchTable<string>
}
