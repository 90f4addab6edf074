import { describe, expect, it } from 'vitest'
import { parseDirectives, parseFaceCorners, parseFloats } from '../directives'
import type { Directive } from '../directives'
import { MalformedDirectiveError } from '../errors'

function directive(command: string, rest: string): Directive {
  return { command, rest, location: { file: 'test.obj', line: 7 } }
}

describe('parseDirectives', () => {
  it('should split lines into command and rest', () => {
    const source = [
      '# exported by hand',
      '',
      'mtllib  crate.mtl',
      'v 1 2 3',
      '   usemtl   Wood Dark  ',
      'f 1/1/1 2/2/2 3/3/3'
    ].join('\n')

    expect(parseDirectives(source, 'crate.obj')).toEqual([
      { command: 'mtllib', rest: 'crate.mtl', location: { file: 'crate.obj', line: 3 } },
      { command: 'v', rest: '1 2 3', location: { file: 'crate.obj', line: 4 } },
      { command: 'usemtl', rest: 'Wood Dark', location: { file: 'crate.obj', line: 5 } },
      { command: 'f', rest: '1/1/1 2/2/2 3/3/3', location: { file: 'crate.obj', line: 6 } }
    ])
  })

  it('should handle CRLF line endings', () => {
    const directives = parseDirectives('v 0 0 0\r\nvn 0 1 0\r\n', 'a.obj')

    expect(directives.map((d) => [d.command, d.rest])).toEqual([['v', '0 0 0'], ['vn', '0 1 0']])
  })

  it('should keep lines containing line or paragraph separators', () => {
    const directives = parseDirectives('usemtl a\u2028b\nf 1/1/1 2/2/2 3/3/3\nusemtl c\u2029', 'a.obj')

    expect(directives.map((d) => [d.command, d.rest])).toEqual([
      ['usemtl', 'a\u2028b'],
      ['f', '1/1/1 2/2/2 3/3/3'],
      ['usemtl', 'c']
    ])
  })

  it('should return a command with an empty rest', () => {
    expect(parseDirectives('usemtl', 'a.obj')[0].rest).toBe('')
  })
})

describe('parseFloats', () => {
  it('should parse the requested number of fields', () => {
    expect(parseFloats(directive('v', '1.5 -2 3e-2'), 3)).toEqual([1.5, -2, 0.03])
  })

  it('should ignore extra fields', () => {
    expect(parseFloats(directive('vt', '0.5 0.25 0'), 2)).toEqual([0.5, 0.25])
  })

  it('should reject missing fields', () => {
    expect(() => parseFloats(directive('v', '1 2'), 3)).toThrow(
      'test.obj:7: "v" expects 3 numbers, got 2'
    )
  })

  it('should reject non-numeric fields', () => {
    expect(() => parseFloats(directive('vn', '0 up 0'), 3)).toThrow(MalformedDirectiveError)
    expect(() => parseFloats(directive('vn', '0 up 0'), 3)).toThrow('"up" is not a number in "vn"')
  })
})

describe('parseFaceCorners', () => {
  it('should parse position/uv/normal triples', () => {
    expect(parseFaceCorners(directive('f', '1/2/3 4/5/6 7/8/9'))).toEqual([
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 9]
    ])
  })

  it('should accept polygons with more than three corners', () => {
    expect(parseFaceCorners(directive('f', '1/1/1 2/2/2 3/3/3 4/4/4'))).toHaveLength(4)
  })

  it('should keep signed indices for range checking', () => {
    expect(parseFaceCorners(directive('f', '-1/1/1 2/2/2 3/3/3'))[0]).toEqual([-1, 1, 1])
  })

  it('should reject faces with fewer than three corners', () => {
    expect(() => parseFaceCorners(directive('f', '1/1/1 2/2/2'))).toThrow(
      'Face needs at least 3 corners, got 2'
    )
  })

  it('should reject corners that are not full triples', () => {
    expect(() => parseFaceCorners(directive('f', '1//1 2//2 3//3'))).toThrow(
      'Face corner "1//1" is not a position/uv/normal index triple'
    )
    expect(() => parseFaceCorners(directive('f', '1 2 3'))).toThrow(MalformedDirectiveError)
    expect(() => parseFaceCorners(directive('f', '1/a/1 2/2/2 3/3/3'))).toThrow(MalformedDirectiveError)
  })
})
