import { describe, it, expect } from 'vitest';
import { normalize, wholeFileSnippet } from '../../../src/core/normalizer.js';
import { source } from '../../helpers/context.js';

describe('core/normalizer', () => {
  describe('brace languages', () => {
    const text = source(
      '#include <string.h>',
      '',
      'int counter = 0;',
      '',
      'void copy_name(char *dst, const char *src) {',
      '    strcpy(dst, src);',
      '}',
      '',
      'int add(int a, int b)',
      '{',
      '    return a + b;',
      '}'
    );

    it('should split functions into snippets with path and line ids', () => {
      const unit = normalize(text, 'c', 'src/x.c');

      expect(unit.degraded).toBe(false);
      expect(unit.snippets.map((snippet) => [snippet.id, snippet.kind, snippet.functionName])).toEqual([
        ['src/x.c:1-3', 'module', undefined],
        ['src/x.c:5-7', 'function', 'copy_name'],
        ['src/x.c:9-12', 'function', 'add'],
      ]);
    });

    it('should keep the exact source text of each function', () => {
      const unit = normalize(text, 'c', 'src/x.c');

      expect(unit.snippets[1].text).toBe('void copy_name(char *dst, const char *src) {\n    strcpy(dst, src);\n}');
      expect(unit.snippets[2].startLine).toBe(9);
      expect(unit.snippets[2].endLine).toBe(12);
    });

    it('should ignore braces inside comments and strings', () => {
      const unit = normalize(
        source(
          '// { not a block',
          'const handler = (req) => {',
          '  return "}";',
          '};'
        ),
        'javascript',
        'h.js'
      );

      expect(unit.degraded).toBe(false);
      expect(unit.snippets).toHaveLength(1);
      expect(unit.snippets[0]).toMatchObject({
        id: 'h.js:2-4',
        kind: 'function',
        functionName: 'handler',
        text: 'const handler = (req) => {\n  return "}";\n}',
      });
    });

    it('should fall back to coarse blocks on an unclosed brace', () => {
      const unit = normalize('void f() {\n  if (x) {\n}', 'c', 'f.c');

      expect(unit.degraded).toBe(true);
      expect(unit.degradedReason).toMatch(/^(?:syntax error|missing '.+') at line \d+$/);
      expect(unit.snippets.map((snippet) => [snippet.id, snippet.kind])).toEqual([['f.c:1-3', 'block']]);
    });

    it('should fall back on an unterminated string', () => {
      const unit = normalize('int main() {\n  puts("oops);\n}', 'c', 'm.c');

      expect(unit.degraded).toBe(true);
      expect(unit.degradedReason).toMatch(/ at line \d+$/);
    });

    it('should report the line of a JavaScript syntax error', () => {
      const unit = normalize('function f() {\n  return (1;\n}', 'javascript', 'bad.js');

      expect(unit.degraded).toBe(true);
      expect(unit.degradedReason).toBe("')' expected. at line 2");
    });
  });

  describe('signatures with type keywords', () => {
    it('should treat a function taking a struct as a function', () => {
      const unit = normalize(
        source(
          'int apply_coupon(struct order *o, int paid, int coupon) {',
          '    if (paid && coupon) {',
          '        o->total = o->total - 100;',
          '    }',
          '    return o->total;',
          '}',
          '',
          'int helper(int x) { return x + 1; }'
        ),
        'c',
        'shop.c'
      );

      expect(unit.snippets.map((snippet) => [snippet.id, snippet.kind, snippet.functionName])).toEqual([
        ['shop.c:1-6', 'function', 'apply_coupon'],
        ['shop.c:8-8', 'function', 'helper'],
      ]);
    });

    it('should name functions returning a pointer', () => {
      const unit = normalize('static char *dup(const char *s) {\n  return strdup(s);\n}', 'c', 'd.c');

      expect(unit.snippets[0]).toMatchObject({ id: 'd.c:1-3', kind: 'function', functionName: 'dup' });
    });

    it('should find methods with an object parameter inside a class', () => {
      const unit = normalize(
        source(
          'namespace Shop',
          '{',
          '    public class OrdersPage',
          '    {',
          '        private int count;',
          '',
          '        public void OnDelete(object sender, EventArgs e)',
          '        {',
          '            Orders.Delete(count);',
          '        }',
          '    }',
          '}'
        ),
        'csharp',
        'OrdersPage.cs'
      );

      expect(unit.degraded).toBe(false);
      expect(unit.snippets.map((snippet) => [snippet.id, snippet.kind, snippet.functionName])).toEqual([
        ['OrdersPage.cs:1-5', 'module', undefined],
        ['OrdersPage.cs:7-10', 'function', 'OnDelete'],
        ['OrdersPage.cs:11-12', 'module', undefined],
      ]);
      expect(unit.snippets[1].text).toBe(
        'public void OnDelete(object sender, EventArgs e)\n        {\n            Orders.Delete(count);\n        }'
      );
    });

    it('should keep class members declared with a record or struct type as module code', () => {
      const unit = normalize(
        source(
          'public class Ledger {',
          '    private Entry entry;',
          '    public record Entry(int amount) {}',
          '    public int total(Entry e) { return e.amount(); }',
          '}'
        ),
        'java',
        'Ledger.java'
      );

      expect(unit.snippets.map((snippet) => [snippet.id, snippet.kind, snippet.functionName])).toEqual([
        ['Ledger.java:1-3', 'module', undefined],
        ['Ledger.java:4-4', 'function', 'total'],
        ['Ledger.java:5-5', 'module', undefined],
      ]);
    });
  });

  describe('coverage', () => {
    it('should place every line of code in some snippet', () => {
      const text = source(
        '#include <stdio.h>',
        'struct order { int total; };',
        '',
        'int apply_coupon(struct order *o, int paid, int coupon) {',
        '    if (paid && coupon) o->total -= 100;',
        '    return o->total;',
        '}',
        '',
        '/* trailing configuration */',
        'static int limit = 3;',
        'int helper(int x) { return x * limit; }'
      );
      const unit = normalize(text, 'c', 'cover.c');

      const covered = new Set<number>();
      for (const snippet of unit.snippets) {
        for (let line = snippet.startLine; line <= snippet.endLine; line++) covered.add(line);
      }
      const codeLines = text
        .split('\n')
        .map((row, i) => ({ row: row.trim(), line: i + 1 }))
        .filter(({ row }) => row !== '' && !row.startsWith('/*'))
        .map(({ line }) => line);

      expect(codeLines.filter((line) => !covered.has(line))).toEqual([]);
      expect(unit.snippets.map((snippet) => snippet.id)).toEqual([
        'cover.c:1-2',
        'cover.c:4-7',
        'cover.c:10-10',
        'cover.c:11-11',
      ]);
    });
  });

  describe('offsets', () => {
    it('should record UTF-8 byte offsets', () => {
      const unit = normalize('// café\nint f(void) {\n  return 1;\n}', 'c', 'u.c');

      const [fn] = unit.snippets;
      expect(fn.id).toBe('u.c:2-4');
      // '// café\n' is 8 characters and 9 bytes
      expect(fn.startOffset).toBe(9);
      expect(fn.endOffset).toBe(9 + Buffer.byteLength(fn.text, 'utf8'));
    });
  });

  describe('python', () => {
    it('should find defs by indentation and include decorators', () => {
      const unit = normalize(
        source(
          'import os',
          '',
          '@cached',
          'def load(path):',
          '    with open(path) as f:',
          '        return f.read()',
          '',
          'class Store:',
          '    def save(self, data):',
          '        return data'
        ),
        'python',
        'm.py'
      );

      expect(unit.degraded).toBe(false);
      expect(unit.snippets.map((snippet) => [snippet.id, snippet.kind, snippet.functionName])).toEqual([
        ['m.py:1-1', 'module', undefined],
        ['m.py:3-6', 'function', 'load'],
        ['m.py:8-8', 'module', undefined],
        ['m.py:9-10', 'function', 'save'],
      ]);
      expect(unit.snippets[3].text).toBe('def save(self, data):\n        return data');
    });
  });

  describe('edge cases', () => {
    it('should return no snippets for empty input', () => {
      const unit = normalize('  \n\n', 'c', 'empty.c');

      expect(unit.snippets).toEqual([]);
      expect(unit.degraded).toBe(false);
    });

    it('should degrade languages without a structural parser', () => {
      const unit = normalize('a\nb', 'other', 'notes.txt');

      expect(unit.degraded).toBe(true);
      expect(unit.degradedReason).toBe("no structural parser for language 'other'");
      expect(unit.snippets.map((snippet) => snippet.id)).toEqual(['notes.txt:1-2']);
    });

    it('should cap lexical blocks at 40 lines', () => {
      const text = Array.from({ length: 45 }, (_, i) => `line ${i + 1}`).join('\n');
      const unit = normalize(text, 'other', 'long.txt');

      expect(unit.snippets.map((snippet) => snippet.id)).toEqual(['long.txt:1-40', 'long.txt:41-45']);
    });

    it('should be deterministic', () => {
      const text = 'int f(void) {\n  return 1;\n}\n';
      expect(normalize(text, 'c', 'a.c')).toEqual(normalize(text, 'c', 'a.c'));
    });
  });

  describe('wholeFileSnippet', () => {
    it('should cover every line of the unit', () => {
      const unit = normalize('int f(void) {\n  return 1;\n}\n', 'c', 'a.c');
      const snippet = wholeFileSnippet(unit);

      expect(snippet).toMatchObject({ id: 'a.c:1-4', startLine: 1, endLine: 4, kind: 'module', endOffset: 28 });
      expect(snippet.text).toBe(unit.text);
    });
  });
});
