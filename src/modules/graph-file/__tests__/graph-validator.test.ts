/**
 * Unit tests for graph-validator.ts
 */

import { describe, it, expect } from 'vitest'
import {
  ValidationError,
  assertValidGraph,
  findDanglingReferences,
  validateGraph,
} from '../graph-validator.js'

describe('validateGraph', () => {
  it('accepts a well-formed graph and fills in defaults', () => {
    const result = validateGraph({
      version: '1',
      targets: {
        fetch: { description: 'Download sources' },
        compile: { name: 'Compile', depends_on: ['fetch'], attribs: { cmd: 'tsc' } },
      },
    })

    expect(result.valid).toBe(true)
    expect(result.errors).toEqual([])
    expect(result.warnings).toEqual([])
    expect(result.graph).toEqual({
      version: '1',
      targets: {
        fetch: { description: 'Download sources', depends_on: [] },
        compile: { name: 'Compile', depends_on: ['fetch'], attribs: { cmd: 'tsc' } },
      },
    })
  })

  it('accepts version "1.0"', () => {
    expect(validateGraph({ version: '1.0', targets: { a: {} } }).valid).toBe(true)
  })

  it('reports a missing version before anything else', () => {
    const result = validateGraph({ targets: { a: { depends_on: ['ghost'] } } })
    expect(result.valid).toBe(false)
    expect(result.errors).toEqual(['Graph version is missing. This toolkit supports: 1, 1.0'])
  })

  it('reports an unsupported version with its path', () => {
    const result = validateGraph({ version: '3', targets: { a: {} } })
    expect(result.errors).toEqual([
      "Graph version '3' is not supported. This toolkit supports: 1, 1.0 (at version)",
    ])
  })

  it('rejects a graph without targets', () => {
    const result = validateGraph({ version: '1', targets: {} })
    expect(result.valid).toBe(false)
    expect(result.errors).toEqual(['Graph must define at least one target (at targets)'])
  })

  it('rejects unknown target fields', () => {
    const result = validateGraph({ version: '1', targets: { a: { cmd: 'make' } } })
    expect(result.valid).toBe(false)
    expect(result.errors).toEqual(["Unrecognized key(s) in object: 'cmd' (at targets.a)"])
  })

  it('rejects a document that is not a mapping', () => {
    const result = validateGraph(['a', 'b'])
    expect(result.valid).toBe(false)
    expect(result.errors).toHaveLength(1)
    expect(result.graph).toBeUndefined()
  })

  it('reports dependencies on unknown targets', () => {
    const result = validateGraph({
      version: '1',
      targets: { a: {}, b: { depends_on: ['a', 'ghost'] } },
    })
    expect(result.valid).toBe(false)
    expect(result.errors).toEqual(['Target "b" references unknown dependency "ghost"'])
    expect(result.graph).toBeUndefined()
  })

  it('warns about repeated dependencies without failing', () => {
    const result = validateGraph({
      version: '1',
      targets: { a: {}, b: { depends_on: ['a', 'a'] } },
    })
    expect(result.valid).toBe(true)
    expect(result.warnings).toEqual(['Target "b" lists dependency "a" more than once'])
  })

  it('does not look for cycles', () => {
    const result = validateGraph({
      version: '1',
      targets: { a: { depends_on: ['b'] }, b: { depends_on: ['a'] } },
    })
    expect(result.valid).toBe(true)
  })
})

describe('findDanglingReferences', () => {
  it('returns one message per missing target', () => {
    expect(
      findDanglingReferences({
        a: { depends_on: ['x'] },
        b: { depends_on: ['a', 'y'] },
      }),
    ).toEqual([
      'Target "a" references unknown dependency "x"',
      'Target "b" references unknown dependency "y"',
    ])
  })
})

describe('assertValidGraph', () => {
  it('returns the typed graph when valid', () => {
    expect(assertValidGraph({ version: '1', targets: { a: {} } })).toEqual({
      version: '1',
      targets: { a: { depends_on: [] } },
    })
  })

  it('throws ValidationError with the errors and warnings of an invalid graph', () => {
    let caught: unknown
    try {
      assertValidGraph({
        version: '1',
        targets: { a: {}, b: { depends_on: ['a', 'a', 'ghost'] } },
      })
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(ValidationError)
    if (!(caught instanceof ValidationError)) return
    expect(caught.errors).toEqual(['Target "b" references unknown dependency "ghost"'])
    expect(caught.warnings).toEqual(['Target "b" lists dependency "a" more than once'])
    expect(caught.message).toBe(
      'Graph validation failed:\nTarget "b" references unknown dependency "ghost"',
    )
  })
})

describe('ValidationError', () => {
  it('joins the errors into its message', () => {
    const err = new ValidationError(['first', 'second'], ['careful'])
    expect(err.message).toBe('Graph validation failed:\nfirst\nsecond')
    expect(err.warnings).toEqual(['careful'])
    expect(err.name).toBe('ValidationError')
  })
})
