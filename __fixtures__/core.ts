import { vi } from 'vitest'

const inputs = new Map<string, string>()

/** Values returned by `getInput`; unset inputs read as an empty string. */
export function setInputs(values: Record<string, string>): void {
  inputs.clear()
  for (const [name, value] of Object.entries(values)) {
    inputs.set(name, value)
  }
}

export const debug = vi.fn()
export const error = vi.fn()
export const info = vi.fn()
export const getInput = vi.fn((name: string) => inputs.get(name) ?? '')
export const setOutput = vi.fn()
export const setFailed = vi.fn()
export const warning = vi.fn()
