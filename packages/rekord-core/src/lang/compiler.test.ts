/**
 * Compiler tests
 */

import { describe, it, expect } from 'vitest';
import { compile } from './compiler.js';
import { IncompleteSyntaxError, RekordSyntaxError } from './errors.js';

function syntaxErrorOf(text: string): RekordSyntaxError {
  try {
    compile(text);
  } catch (error) {
    if (error instanceof RekordSyntaxError) return error;
    throw error;
  }
  throw new Error(`Expected ${JSON.stringify(text)} to fail`);
}

describe('Compiler - Instructions', () => {
  it('should compile a bare name', () => {
    const code = compile('a');
    expect(code.instructions).toEqual([{ kind: 'name', name: 'a' }]);
    expect(code.offsets).toEqual([0]);
  });

  it('should compile the single-character opcodes', () => {
    const code = compile('*!^/?');
    expect(code.instructions.map((insn) => insn.kind)).toEqual([
      'push-record',
      'apply',
      'pop',
      'skip-if-equal',
      'skip-if-not-equal',
    ]);
  });

  it('should treat every identifier character as its own instruction', () => {
    const code = compile('aB_9');
    expect(code.instructions).toEqual([
      { kind: 'name', name: 'a' },
      { kind: 'name', name: 'B' },
      { kind: 'name', name: '_' },
      { kind: 'name', name: '9' },
    ]);
  });

  it('should compile prefix operators with their operand', () => {
    const code = compile('.x@y=z=.w');
    expect(code.instructions).toEqual([
      { kind: 'field-read', name: 'x' },
      { kind: 'jump', label: 'y' },
      { kind: 'bind', name: 'z' },
      { kind: 'field-write', name: 'w' },
    ]);
    expect(code.offsets).toEqual([0, 2, 4, 6]);
  });

  it('should skip whitespace and grouping characters', () => {
    const code = compile(' ( a ) { b } ;\nc');
    expect(code.instructions.map((insn) => insn.kind === 'name' && insn.name)).toEqual(['a', 'b', 'c']);
    expect(code.offsets).toEqual([3, 9, 15]);
  });

  it('should skip comments to the end of the line', () => {
    const code = compile('a # b c\nd');
    expect(code.instructions).toEqual([
      { kind: 'name', name: 'a' },
      { kind: 'name', name: 'd' },
    ]);
    expect(code.offsets).toEqual([0, 8]);
  });

  it('should allow a comment at the end of the text', () => {
    const code = compile('a # trailing');
    expect(code.length).toBe(1);
  });

  it('should compile empty text to an empty stream', () => {
    const code = compile('');
    expect(code.length).toBe(0);
    expect(code.labels.size).toBe(0);
  });
});

describe('Compiler - Labels', () => {
  it('should record a label at the current instruction index', () => {
    const code = compile('a:lb');
    expect(code.labels.get('l')).toBe(1);
    expect(code.instructions).toEqual([
      { kind: 'name', name: 'a' },
      { kind: 'name', name: 'b' },
    ]);
  });

  it('should allow a label at the end of the stream', () => {
    const code = compile('a :e');
    expect(code.labels.get('e')).toBe(1);
    expect(code.length).toBe(1);
  });

  it('should reject a duplicate label at the offset of its name', () => {
    const error = syntaxErrorOf(':a:a');
    expect(error.reason).toBe("Duplicate label: 'a'");
    expect(error.offset).toBe(3);
    expect(error).not.toBeInstanceOf(IncompleteSyntaxError);
  });

  it('should allow the same label name in a nested body', () => {
    const code = compile(':a[:a]');
    expect(code.labels.get('a')).toBe(0);
    expect(code.children[0].labels.get('a')).toBe(0);
  });
});

describe('Compiler - Syntax errors', () => {
  it('should reject an unknown character at its offset', () => {
    const error = syntaxErrorOf('$');
    expect(error).toBeInstanceOf(RekordSyntaxError);
    expect(error).not.toBeInstanceOf(IncompleteSyntaxError);
    expect(error.offset).toBe(0);
    expect(error.message).toBe("Unknown instruction: '$' (offset=0)");
  });

  it('should reject a tab', () => {
    const error = syntaxErrorOf('\ta');
    expect(error).toBeInstanceOf(RekordSyntaxError);
    expect(error.offset).toBe(0);
    expect(error.reason).toBe("Unknown instruction: '\t'");
  });

  it('should reject a carriage return', () => {
    const error = syntaxErrorOf('a\r\n');
    expect(error.reason).toBe("Unknown instruction: '\r'");
    expect(error.offset).toBe(1);
  });

  it('should reject an unmatched closing bracket', () => {
    const error = syntaxErrorOf('a]');
    expect(error.reason).toBe("Unknown instruction: ']'");
    expect(error.offset).toBe(1);
  });

  it('should reject a prefix operator at the end of the text', () => {
    const error = syntaxErrorOf('.');
    expect(error.reason).toBe("Expected a name after '.', got: end of input");
    expect(error.offset).toBe(1);
  });

  it('should report the offending character after a prefix operator', () => {
    expect(syntaxErrorOf('@ ').offset).toBe(1);
    expect(syntaxErrorOf('=$').reason).toBe("Expected a name after '=', got: '$'");
    expect(syntaxErrorOf(':*').offset).toBe(1);
  });

  it('should require a name after a field write', () => {
    const error = syntaxErrorOf('=.$');
    expect(error.reason).toBe("Expected a name after '=.', got: '$'");
    expect(error.offset).toBe(2);
  });

  it('should raise a recoverable error for an unterminated closure', () => {
    const error = syntaxErrorOf('[a');
    expect(error).toBeInstanceOf(IncompleteSyntaxError);
    expect(error.offset).toBe(2);
    expect(error.text).toBe('[a');
  });

  it('should count nesting depth when looking for the closing bracket', () => {
    const error = syntaxErrorOf('[[a]');
    expect(error).toBeInstanceOf(IncompleteSyntaxError);
    expect(error.offset).toBe(4);
  });

  it('should compile once the missing bracket is appended', () => {
    const code = compile('[a' + ']');
    expect(code.instructions).toEqual([{ kind: 'make-closure', child: 0 }]);
  });

  it('should report errors inside a body at offsets into the whole text', () => {
    const error = syntaxErrorOf('[a $]');
    expect(error.offset).toBe(3);
    expect(error.text).toBe('[a $]');
  });
});

describe('Compiler - Closures', () => {
  it('should compile a body into a child code', () => {
    const code = compile('x [ y]');
    expect(code.instructions).toEqual([
      { kind: 'name', name: 'x' },
      { kind: 'make-closure', child: 0 },
    ]);
    expect(code.offsets).toEqual([0, 2]);
    expect(code.children[0].text).toBe(' y');
    expect(code.children[0].offsets).toEqual([1]);
  });

  it('should number children in order of appearance', () => {
    const code = compile('[a][b]');
    expect(code.instructions).toEqual([
      { kind: 'make-closure', child: 0 },
      { kind: 'make-closure', child: 1 },
    ]);
    expect(code.children.map((child) => child.text)).toEqual(['a', 'b']);
  });

  it('should compile nested bodies recursively', () => {
    const code = compile('[[^a]b]');
    const outer = code.children[0];
    expect(outer.text).toBe('[^a]b');
    expect(outer.children[0].text).toBe('^a');
    expect(outer.children[0].instructions).toEqual([
      { kind: 'pop' },
      { kind: 'name', name: 'a' },
    ]);
  });
});

describe('Compiler - Source positions', () => {
  it('should map positions to source offsets', () => {
    const code = compile(' a .b');
    expect(code.textOffset(0)).toBe(1);
    expect(code.textOffset(1)).toBe(3);
  });

  it('should map the end of the stream to the end of the text', () => {
    const code = compile(' a .b');
    expect(code.textOffset(2)).toBe(5);
    expect(code.textOffset(10)).toBe(5);
  });
});

describe('Compiler - Variable analysis', () => {
  it('should collect names assigned by bind and field write', () => {
    const code = compile('*=a b =.c');
    expect([...code.assignedVars].sort()).toEqual(['a', 'c']);
  });

  it('should not count field reads, jumps or labels as variable reads', () => {
    const code = compile('.x @y :y');
    expect(code.freeVars.size).toBe(0);
  });

  it('should exclude assigned names from free variables', () => {
    const code = compile('a b =b');
    expect([...code.freeVars]).toEqual(['a']);
  });

  it('should include free variables of nested bodies', () => {
    const code = compile('[a =b] b');
    expect([...code.children[0].freeVars]).toEqual(['a']);
    expect([...code.freeVars].sort()).toEqual(['a', 'b']);
  });

  it('should exclude names a nested body assigns itself', () => {
    const code = compile('[*=a a] a');
    expect(code.children[0].freeVars.size).toBe(0);
    expect([...code.freeVars]).toEqual(['a']);
  });

  it('should not report a name the parent assigns as free', () => {
    const code = compile('*=a [a]');
    expect([...code.children[0].freeVars]).toEqual(['a']);
    expect(code.freeVars.size).toBe(0);
  });

  it('should cache the derived sets', () => {
    const code = compile('a [b]');
    expect(code.freeVars).toBe(code.freeVars);
    expect(code.assignedVars).toBe(code.assignedVars);
  });
});

describe('Compiler - Listing', () => {
  it('should list instructions with labels and nested bodies', () => {
    const code = compile('*=a:lb[a]');
    expect(code.listing()).toBe(
      ['   0  *', '   1  =a', ':l', '   2  b', '   3  [#0]', '         0  a'].join('\n')
    );
  });

  it('should list a label at the end of the stream', () => {
    expect(compile('a:e').listing()).toBe('   0  a\n:e');
  });
});
