#!/usr/bin/env node
/**
 * 派生文法生成器主入口
 * 用法: grammar-transducer <snippet_dir> <grammar.y> <output.y> [-v]
 * 选项:
 *   --srcdir/--parser/--output  以具名方式给出三个位置
 *   -v                          显示转换过程详细信息
 */

import { runCommandLine } from './cli/CommandLine'

process.exitCode = runCommandLine(process.argv.slice(2))
