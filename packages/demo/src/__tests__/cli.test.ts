import { describe, expect, it } from 'vitest'
import { parseCommand } from '../cli'

describe('parseCommand', () => {
  it('should default to the stepped work', () => {
    expect(parseCommand([])).toEqual({ command: 'work', steps: 10, stepMs: 250 })
  })

  it('should read work options', () => {
    expect(parseCommand(['work', '--steps', '3', '--step-ms', '0', '--cancel-after', '100'])).toEqual({
      command: 'work',
      steps: 3,
      stepMs: 0,
      cancelAfter: 100,
    })
  })

  it('should collect listing paths', () => {
    expect(parseCommand(['list', '/srv', '/srv/media'])).toEqual({
      command: 'list',
      paths: ['/srv', '/srv/media'],
    })
  })

  it('should read the prime limit', () => {
    expect(parseCommand(['primes', '--limit', '1000'])).toEqual({
      command: 'primes',
      limit: 1000,
    })
  })

  it('should reject a listing without paths', () => {
    expect(() => parseCommand(['list'])).toThrow()
  })

  it('should reject unknown commands', () => {
    expect(() => parseCommand(['fly'])).toThrow()
  })

  it('should reject unknown options', () => {
    expect(() => parseCommand(['work', '--speed', '2'])).toThrow()
  })

  it('should reject a non-numeric limit', () => {
    expect(() => parseCommand(['primes', '--limit', 'lots'])).toThrow()
  })

  it('should reject a zero step count', () => {
    expect(() => parseCommand(['work', '--steps', '0'])).toThrow()
  })
})
