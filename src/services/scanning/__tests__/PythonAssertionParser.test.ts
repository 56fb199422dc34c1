import { describe, it, expect } from 'vitest';
import { PythonAssertionParser } from '../PythonAssertionParser.js';
import { ParseError } from '../../../utils/errors.js';

const parser = new PythonAssertionParser();

describe('PythonAssertionParser', () => {
  it('renders a simple assertion', () => {
    expect(parser.extract('assert x > 0\n', 'mod.py')).toEqual(['assert x > 0']);
  });

  it('collects assertions in document order, including nested ones', () => {
    const source = [
      'assert first',
      '',
      'def check(value):',
      '    if value:',
      '        assert value > 1, "too small"',
      '    return value',
      '',
      'class Box:',
      '    def open(self):',
      '        assert self.closed',
      '',
      'assert last',
      '',
    ].join('\n');

    expect(parser.extract(source, 'mod.py')).toEqual([
      'assert first',
      'assert value > 1, "too small"',
      'assert self.closed',
      'assert last',
    ]);
  });

  it('joins a multi-line assertion onto one line', () => {
    const source = 'assert (a and\n        b), "msg"\n';
    expect(parser.extract(source, 'mod.py')).toEqual(['assert (a and b), "msg"']);
  });

  it('drops comments inside an assertion', () => {
    const source = 'assert (x  # first half\n    or y)\n';
    expect(parser.extract(source, 'mod.py')).toEqual(['assert (x or y)']);
  });

  it('keeps whitespace inside string literals', () => {
    expect(parser.extract('assert s == "a   b"\n', 'mod.py')).toEqual(['assert s == "a   b"']);
  });

  it('returns nothing for a module without assertions', () => {
    expect(parser.extract('value = 1\nprint(value)\n', 'mod.py')).toEqual([]);
  });

  it('renders the same statement identically every time', () => {
    const source = 'def f(items):\n    assert len(items)  ==  3, (\n        "three"\n    )\n';
    const first = parser.extract(source, 'mod.py');
    const second = parser.extract(source, 'mod.py');
    expect(first).toEqual(second);
    expect(first).toEqual(['assert len(items) == 3, ("three")']);
    expect(parser.extract(`${first[0]}\n`, 'mod.py')).toEqual(first);
  });

  it('drops whitespace just inside brackets', () => {
    expect(parser.extract('assert [\n    1, 2,\n] == y\n', 'mod.py')).toEqual([
      'assert [1, 2,] == y',
    ]);
    expect(parser.extract('assert { "k" : v } == d\n', 'mod.py')).toEqual([
      'assert {"k" : v} == d',
    ]);
    expect(parser.extract('assert s == "( x )"\n', 'mod.py')).toEqual(['assert s == "( x )"']);
  });

  it('raises ParseError for invalid syntax', () => {
    let caught: unknown;
    try {
      parser.extract('def broken(:\n    pass\n', 'broken.py');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ParseError);
    expect(caught).toMatchObject({ file: 'broken.py' });
  });

  it('rejects a print statement', () => {
    expect(() => parser.extract('print "hello"\nassert legacy\n', 'legacy.py')).toThrow(
      ParseError
    );
  });

  it('rejects an exception handler that binds its name with a comma', () => {
    const source = 'try:\n    run()\nexcept ValueError, e:\n    assert e\n';
    expect(() => parser.extract(source, 'legacy.py')).toThrow(ParseError);
  });

  it('accepts tuple handlers and `as` bindings', () => {
    const source = [
      'try:',
      '    run()',
      'except (KeyError, ValueError) as e:',
      '    assert e',
      'except OSError:',
      '    pass',
      '',
    ].join('\n');
    expect(parser.extract(source, 'mod.py')).toEqual(['assert e']);
  });
});
