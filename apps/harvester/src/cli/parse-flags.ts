export type Flags = Record<string, string | boolean>

export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const inline = token.indexOf('=')
    if (inline !== -1) {
      flags[token.slice(2, inline)] = token.slice(inline + 1)
      continue
    }

    const key = token.slice(2)
    const next = argv[i + 1]
    if (next !== undefined && !next.startsWith('--')) {
      flags[key] = next
      i++
    } else {
      flags[key] = true
    }
  }

  return flags
}

export interface FlagSpec {
  /** Flags that must be followed by a value */
  values: readonly string[]
  /** Flags that stand alone */
  switches?: readonly string[]
}

/**
 * First problem with the parsed flags: a flag the command does not know, or
 * a value flag given without a value.
 */
export function findFlagError(flags: Flags, spec: FlagSpec): string | undefined {
  for (const [name, value] of Object.entries(flags)) {
    if (spec.switches?.includes(name)) continue
    if (!spec.values.includes(name)) {
      return `Unknown flag: --${name}`
    }
    if (typeof value !== 'string' || value.length === 0) {
      return `--${name} expects a value`
    }
  }
  return undefined
}

export function asString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

export type PositiveIntFlag =
  | { ok: true; value: number | undefined }
  | { ok: false; error: string }

/**
 * Absent flags are fine; present ones must be positive integers.
 */
export function asPositiveInt(name: string, value: string | boolean | undefined): PositiveIntFlag {
  if (value === undefined) {
    return { ok: true, value: undefined }
  }
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return { ok: false, error: `--${name} expects a positive integer` }
  }
  const parsed = Number.parseInt(value, 10)
  if (parsed < 1) {
    return { ok: false, error: `--${name} expects a positive integer` }
  }
  return { ok: true, value: parsed }
}
