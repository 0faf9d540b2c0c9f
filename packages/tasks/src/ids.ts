let sequence = 0

/**
 * Generate lightweight id: timestamp-sequence-randomHex
 * Example: "1704234567890-1a-a3f5"
 * The sequence keeps ids unique within a process, even within one millisecond.
 */
export function generateId(): string {
  const timestamp = Date.now()
  sequence += 1
  const randomHex = Math.floor(Math.random() * 0xffff)
    .toString(16)
    .padStart(4, '0')
  return `${timestamp}-${sequence.toString(36)}-${randomHex}`
}
