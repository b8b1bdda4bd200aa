/**
 * 命令行参数解析与执行
 */

import * as path from 'path'
import minimist from 'minimist'
import { requireCondition, TransducerError } from '../core/utils'
import { generateDerivativeGrammar } from '../generator/GrammarTransducer'

export const USAGE =
  '[用法]: grammar-transducer <snippet_dir> <grammar.y> <output.y> [-v]\n' +
  '   或: grammar-transducer --srcdir <snippet_dir> --parser <grammar.y> --output <output.y> [-v]'

export interface CommandLineArguments {
  sourceDir: string
  grammarPath: string
  outputPath: string
  verbose: boolean
}

/**
 * 三个位置既可以按顺序给出，也可以用具名参数给出
 */
export function parseCommandLine(argv: string[]): CommandLineArguments {
  const args = minimist(argv, {
    string: ['srcdir', 'parser', 'output'],
    boolean: ['verbose'],
    alias: { v: 'verbose' },
  })
  const positional = args._.map(String)
  const take = (value: unknown): string | undefined =>
    typeof value === 'string' && value !== '' ? value : positional.shift()

  const sourceDir = take(args.srcdir)
  const grammarPath = take(args.parser)
  const outputPath = take(args.output)
  requireCondition(
    sourceDir !== undefined && grammarPath !== undefined && outputPath !== undefined && positional.length === 0,
    'Usage',
    USAGE
  )

  return {
    sourceDir: path.resolve(sourceDir),
    grammarPath: path.resolve(grammarPath),
    outputPath: path.resolve(outputPath),
    verbose: args.verbose === true,
  }
}

/**
 * 执行一次转换，返回进程退出码
 */
export function runCommandLine(argv: string[]): number {
  let verbose = false
  const print = (message: string) => {
    if (verbose) {
      console.log(message)
    }
  }

  try {
    const options = parseCommandLine(argv)
    verbose = options.verbose
    const startTime = new Date().getTime()

    print('*** 基本信息 ***')
    print(`  补丁表目录: ${options.sourceDir}`)
    print(`  宿主文法: ${options.grammarPath}`)
    print(`  输出文件: ${options.outputPath}`)
    print('')

    generateDerivativeGrammar(options.sourceDir, options.grammarPath, options.outputPath, { log: print })

    const endTime = new Date().getTime()
    print('')
    print(`转换成功完成，耗时 ${((endTime - startTime) / 1000).toFixed(2)} 秒。`)
    return 0
  } catch (ex) {
    if (ex instanceof TransducerError) {
      console.error(`[转换错误] ${ex.message}`)
      return ex.exitCode
    }
    throw ex
  }
}
