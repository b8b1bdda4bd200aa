/**
 * 输出缓冲区
 * 各部分先写入命名缓冲区，全部检查通过后按固定顺序一次性输出
 */

import * as fs from 'fs'
import * as path from 'path'
import { DEFAULT_START_RULE, SECTION_SEPARATOR, TransducerError } from '../../core/utils'

export type BufferName = 'header' | 'tokens' | 'types' | 'typeSnippet' | 'origTokens' | 'rules' | 'trailer'

/** 开始符号绑定规则之前输出的缓冲区 */
export const DECLARATION_BUFFERS: BufferName[] = ['header', 'tokens', 'types', 'typeSnippet', 'origTokens']
/** 开始符号绑定规则之后输出的缓冲区 */
export const RULE_BUFFERS: BufferName[] = ['rules', 'trailer']

export class OutputEmitter {
  private readonly _buffers: Map<BufferName, string[]> = new Map()
  private readonly _startRule: string

  constructor(startRule: string = DEFAULT_START_RULE) {
    this._startRule = startRule
    for (const name of [...DECLARATION_BUFFERS, ...RULE_BUFFERS]) {
      this._buffers.set(name, [])
    }
  }

  private _buffer(name: BufferName): string[] {
    const buffer = this._buffers.get(name)
    if (buffer === undefined) {
      throw new Error(`未知的缓冲区：${name}`)
    }
    return buffer
  }

  append(name: BufferName, line: string): void {
    this._buffer(name).push(line)
  }

  appendLines(name: BufferName, lines: string[]): void {
    this._buffer(name).push(...lines)
  }

  lines(name: BufferName): string[] {
    return [...this._buffer(name)]
  }

  /**
   * 按固定顺序拼接全部缓冲区
   */
  render(): string {
    const output: string[] = []
    const dump = (name: BufferName) => {
      output.push(`/* ${name} */`)
      output.push(...this._buffer(name))
    }
    DECLARATION_BUFFERS.forEach(dump)
    output.push(SECTION_SEPARATOR)
    output.push(this._startRule)
    RULE_BUFFERS.forEach(dump)
    return output.join('\n') + '\n'
  }

  /**
   * 写出到文件
   */
  flush(outputPath: string): void {
    const outputDir = path.dirname(outputPath)
    try {
      if (!fs.existsSync(outputDir)) {
        fs.mkdirSync(outputDir, { recursive: true })
      }
      fs.writeFileSync(outputPath, this.render())
    } catch (ex) {
      throw new TransducerError('OpenFailure', `无法写入输出文件 ${outputPath}: ${ex instanceof Error ? ex.message : String(ex)}`)
    }
  }
}
