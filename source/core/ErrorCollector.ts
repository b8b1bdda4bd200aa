/**
 * 错误收集和报告模块
 */

import { TransducerError, TransducerErrorKind } from './utils'

/**
 * 补丁表完整性错误，记录出错的表与键
 */
export class PatchIntegrityError extends TransducerError {
  public readonly tableName: string
  public readonly key: string

  constructor(kind: TransducerErrorKind, tableName: string, key: string, message: string, lineNumber: number = 0) {
    super(kind, message, lineNumber)
    this.tableName = tableName
    this.key = key
    this.name = 'PatchIntegrityError'
  }
}

/**
 * 错误收集器类
 */
export class ErrorCollector {
  private _errors: PatchIntegrityError[] = []

  addError(error: PatchIntegrityError): void {
    this._errors.push(error)
  }

  hasErrors(): boolean {
    return this._errors.length > 0
  }

  getErrors(): PatchIntegrityError[] {
    return [...this._errors]
  }

  getErrorCount(): number {
    return this._errors.length
  }

  /**
   * 合并为一个致命错误，退出码取第一个错误的种类
   */
  toFatalError(): TransducerError | null {
    if (this._errors.length === 0) {
      return null
    }
    const lines = this._errors.map(error => `  [${error.tableName}] ${error.message}`)
    return new TransducerError(
      this._errors[0].kind,
      `补丁表完整性检查失败，共 ${this._errors.length} 处错误：\n${lines.join('\n')}`
    )
  }
}
