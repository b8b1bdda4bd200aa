import { describe, it, expect } from 'vitest'
import {
  UNSUPPORTED_FEATURE_WARNING,
  isCreateAsExecute,
  mergeFields,
} from '../generator/grammar/ActionSynthesizer'
import { buildRules, captureError } from './helpers'

describe('ActionSynthesizer', () => {
  describe('默认动作', () => {
    it('全部由Token组成时合并为一个字符串', () => {
      const { rules } = buildRules('%token A B C\n%%\nfoo: A B C ;')
      expect(rules).toEqual(['foo: A B C', '\t{ $$ = mm_strdup("A B C"); }', ';', ''])
    })

    it('Token与非终结符交替时用 cat_str 拼接', () => {
      const { rules } = buildRules('%token A B\n%%\nbar: A expr B ;')
      expect(rules).toEqual(['bar: A expr B', '\t{ $$ = cat_str(3, mm_strdup("A"), $2, mm_strdup("B")); }', ';', ''])
    })

    it('单个非终结符直接传递，空候选式得到 EMPTY', () => {
      const { rules } = buildRules('%%\nopt: item | ;')
      expect(rules).toEqual(['opt: item', '\t{ $$ = $1; }', '|', '\t{ $$ = EMPTY; }', ';', ''])
    })

    it('去掉 _P 后缀与字面量引号，按拼写表输出并转义', () => {
      const { rules } = buildRules(`%token NULL_P TYPECAST\n%%\nx: y TYPECAST NULL_P '"' ;`, {
        spellings: 'TYPECAST ::\n',
      })
      expect(rules).toEqual([`x: y TYPECAST NULL_P '"'`, '\t{ $$ = cat_str(2, $1, mm_strdup(":: NULL \\"")); }', ';', ''])
    })

    it('%prec 尾部写回文法但不参与文本重建', () => {
      const { rules } = buildRules("%token A\n%left A\n%%\nneg: '-' e %prec A ;")
      expect(rules).toEqual(["neg: '-' e %prec A", '\t{ $$ = cat_str(2, mm_strdup("-"), $2); }', ';', ''])
    })

    it('语句非终结符输出语句，空候选式得到 NULL', () => {
      const { rules } = buildRules('%token SEMI\n%%\nstmt: select_stmt | SEMI | ;')
      expect(rules).toEqual([
        'stmt: select_stmt',
        '\t{ output_statement($1, 0, ECPGst_normal); }',
        '| SEMI',
        '\t{ output_statement(mm_strdup("SEMI"), 0, ECPGst_normal); }',
        '|',
        '\t{ $$ = NULL; }',
        ';',
        '',
      ])
    })
  })

  describe('不支持的特性', () => {
    it('无条件报错的动作前加警告，有条件判断的不加', () => {
      const grammar = [
        '%token DROP',
        '%%',
        'drop_stmt: DROP name',
        '    { ereport(ERROR, (errcode(ERRCODE_FEATURE_NOT_SUPPORTED))); }',
        '  | name',
        '    { if (x) ereport(ERROR, (errcode(ERRCODE_FEATURE_NOT_SUPPORTED))); }',
        '  ;',
      ].join('\n')
      const { rules } = buildRules(grammar)
      expect(rules).toEqual([
        'drop_stmt: DROP name',
        `\t{ ${UNSUPPORTED_FEATURE_WARNING} $$ = cat_str(2, mm_strdup("DROP"), $2); }`,
        '| name',
        '\t{ $$ = $1; }',
        ';',
        '',
      ])
    })

    it('CREATE ... AS EXECUTE 不加警告', () => {
      const grammar = [
        '%token CREATE AS EXECUTE',
        '%%',
        'ExecuteStmt: CREATE name AS EXECUTE name { ereport(ERRCODE_FEATURE_NOT_SUPPORTED); } ;',
      ].join('\n')
      const { rules } = buildRules(grammar)
      expect(rules[1]).toBe('\t{ $$ = cat_str(4, mm_strdup("CREATE"), $2, mm_strdup("AS EXECUTE"), $5); }')
    })

    it('isCreateAsExecute 只认指定的非终结符', () => {
      const symbols = ['CREATE', 'AS', 'EXECUTE'].map(content => ({ type: 'token' as const, content }))
      expect(isCreateAsExecute('ExecuteStmt', symbols)).toBe(true)
      expect(isCreateAsExecute('CreateAsStmt', symbols)).toBe(false)
      expect(isCreateAsExecute('ExecuteStmt', symbols.slice(1))).toBe(false)
      expect(isCreateAsExecute('ExecuteStmt', [symbols[0], symbols[2], symbols[1]])).toBe(false)
    })
  })

  describe('mergeFields', () => {
    it('合并相邻的文本字段', () => {
      expect(
        mergeFields([
          { kind: 'text', text: 'A' },
          { kind: 'text', text: 'B' },
          { kind: 'result', position: 3 },
          { kind: 'text', text: 'C' },
        ])
      ).toEqual(['mm_strdup("A B")', '$3', 'mm_strdup("C")'])
      expect(mergeFields([])).toEqual([])
    })
  })

  describe('overrides', () => {
    it('ignore 丢弃候选式', () => {
      const { rules, tables } = buildRules('%token A B\n%%\nw: A | B ;', { overrides: 'w A => ignore\n' })
      expect(rules).toEqual(['w: B', '\t{ $$ = mm_strdup("B"); }', ';', ''])
      expect(tables.overrides.entries()[0].uses).toBe(1)
    })

    it('全部候选式被丢弃时报错，不输出空的规则', () => {
      const error = captureError(() => buildRules('%token A\n%%\nw: A ;', { overrides: 'w A => ignore\n' }))
      expect(error.kind).toBe('MalformedRule')
      expect(error.lineNumber).toBe(3)
      expect(error.message).toBe('w 的候选式全部被 overrides 丢弃，应在 nonterminals 表中忽略该非终结符（第3行）')
    })

    it('替换文本重新切分，addon 按替换后的签名查找', () => {
      const { rules, tables } = buildRules('%token A B\n%%\nw: A x ;', {
        overrides: 'w A x => B x %prec A\n',
        addons: 'ADDON: addon w B x %prec A\n\t\tcheck($2);\n',
      })
      expect(rules).toEqual([
        'w: B x %prec A',
        '\t{',
        '\t\tcheck($2);',
        '\t$$ = cat_str(2, mm_strdup("B"), $2);',
        '\t}',
        ';',
        '',
      ])
      expect(tables.addons.entries()[0].uses).toBe(1)
    })
  })

  describe('addons', () => {
    it('block 取代默认动作', () => {
      const { rules } = buildRules('%token A\n%%\nw: A ;', { addons: 'ADDON: block w A\n\t\t{ $$ = special(); }\n' })
      expect(rules).toEqual(['w: A', '\t\t{ $$ = special(); }', ';', ''])
    })

    it('rule 在默认动作之后追加候选式', () => {
      const { rules } = buildRules('%token A\n%%\nw: A ;', { addons: 'ADDON: rule w A\n\t\t| B\n\t\t{ $$ = b(); }\n' })
      expect(rules).toEqual(['w: A', '\t{ $$ = mm_strdup("A"); }', '\t\t| B', '\t\t{ $$ = b(); }', ';', ''])
    })

    it('只有空行的代码段不会抹掉动作', () => {
      const { rules } = buildRules('%token A B\n%%\nw: A | B ;', { addons: 'ADDON: block w A\n\nADDON: rule w B\n' })
      expect(rules).toEqual(['w: A', '\t{ $$ = mm_strdup("A"); }', '| B', '\t{ $$ = mm_strdup("B"); }', ';', ''])
    })

    it('没有代码的 addon 保留默认动作但仍计数', () => {
      const { rules, tables } = buildRules('%token A\n%%\nw: A ;', { addons: 'ADDON: block w A\n' })
      expect(rules).toEqual(['w: A', '\t{ $$ = mm_strdup("A"); }', ';', ''])
      expect(tables.addons.entries()[0].uses).toBe(1)
    })
  })
})
