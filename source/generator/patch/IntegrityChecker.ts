/**
 * 补丁表完整性检查
 * 宿主文法变化后，过时或有歧义的补丁条目必须让构建失败，而不是悄悄生成错误的文法
 */

import { ErrorCollector, PatchIntegrityError } from '../../core/ErrorCollector'
import { PatchTable, PatchTables } from './PatchTypes'

function checkTable<V>(table: PatchTable<V>, collector: ErrorCollector): void {
  for (const entry of table.entries()) {
    if (entry.uses === 0) {
      collector.addError(
        new PatchIntegrityError(
          'UnusedPatchEntry',
          table.name,
          entry.displayKey,
          `未使用的补丁条目：${entry.displayKey}`,
          entry.line
        )
      )
    } else if (entry.uses > 1) {
      collector.addError(
        new PatchIntegrityError(
          'AmbiguousPatchEntry',
          table.name,
          entry.displayKey,
          `补丁条目被使用了 ${entry.uses} 次：${entry.displayKey}`,
          entry.line
        )
      )
    }
  }
}

export function checkPatchIntegrity(tables: PatchTables): ErrorCollector {
  const collector = new ErrorCollector()
  const checkedTables = [tables.rename, tables.nonterminals, tables.overrides, tables.addons, tables.spellings]
  for (const table of checkedTables) {
    if (table.checked) {
      checkTable<unknown>(table, collector)
    }
  }
  return collector
}

/**
 * 有任何违规即抛出，退出码取第一条违规的种类
 */
export function assertPatchIntegrity(tables: PatchTables): void {
  const fatal = checkPatchIntegrity(tables).toFatalError()
  if (fatal !== null) {
    throw fatal
  }
}
