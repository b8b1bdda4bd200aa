import { describe, it, expect, afterEach, vi } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { readTextFile } from '../core/utils'
import { runCommandLine } from '../cli/CommandLine'
import { captureError } from './helpers'

const UNREADABLE_NAME = 'unreadable.y'

// 模拟存在但无权读取的文件
vi.mock('fs', async importOriginal => {
  const actual = await importOriginal<typeof import('fs')>()
  const readFileSync = (...args: Parameters<typeof actual.readFileSync>) => {
    if (String(args[0]).endsWith('unreadable.y')) {
      throw new Error(`EACCES: permission denied, open '${String(args[0])}'`)
    }
    return actual.readFileSync(...args)
  }
  const mocked = { ...actual, readFileSync }
  return { ...mocked, default: mocked }
})

const SAMPLE_DIR = path.join(__dirname, '../../syntax/preproc')

describe('文件读取失败', () => {
  let tempDir = ''

  afterEach(() => {
    vi.restoreAllMocks()
    if (tempDir !== '') {
      fs.rmSync(tempDir, { recursive: true, force: true })
      tempDir = ''
    }
  })

  function unreadableFile(): string {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'transducer-'))
    const filePath = path.join(tempDir, UNREADABLE_NAME)
    fs.writeFileSync(filePath, '%%\n')
    return filePath
  }

  it('读取出错时报告 OpenFailure 并带上路径', () => {
    const filePath = unreadableFile()
    const error = captureError(() => readTextFile(filePath))
    expect(error.kind).toBe('OpenFailure')
    expect(error.message).toBe(`无法读取文件 ${filePath}: EACCES: permission denied, open '${filePath}'`)
  })

  it('命令行返回 2 而不是抛出异常', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const grammarPath = unreadableFile()
    expect(runCommandLine([SAMPLE_DIR, grammarPath, path.join(tempDir, 'out.y')])).toBe(2)
    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(fs.existsSync(path.join(tempDir, 'out.y'))).toBe(false)
  })
})
