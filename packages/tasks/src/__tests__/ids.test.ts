import { describe, expect, it } from 'vitest'
import { generateId } from '../ids'

describe('generateId', () => {
  it('should produce timestamp-sequence-randomHex', () => {
    expect(generateId()).toMatch(/^\d+-[0-9a-z]+-[0-9a-f]{4}$/)
  })

  it('should not repeat within a burst of calls', () => {
    const ids = Array.from({ length: 5000 }, () => generateId())

    expect(new Set(ids).size).toBe(5000)
  })
})
