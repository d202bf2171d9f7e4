export function formatHex(bytes: Uint8Array, separator = ''): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0').toUpperCase()).join(separator)
}

/** Parses hex text; whitespace and `_` / `|` markers are ignored. */
export function parseHex(text: string): Uint8Array {
  const clean = text.replace(/[\s_|]/g, '')
  if (clean.length % 2 !== 0 || /[^0-9a-fA-F]/.test(clean)) {
    throw new Error(`Invalid hex string: ${text}`)
  }
  const bytes = new Uint8Array(clean.length / 2)
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16)
  }
  return bytes
}

/** Decodes the 16-bit manufacturer field into its three letter flag id. */
export function manufacturerFlag(code: number): string {
  return String.fromCharCode(
    ((code >> 10) & 0x1f) + 64,
    ((code >> 5) & 0x1f) + 64,
    (code & 0x1f) + 64,
  )
}

export function manufacturerCode(flag: string): number {
  if (!/^[A-Z]{3}$/.test(flag)) throw new Error(`Invalid manufacturer flag: ${flag}`)
  return ((flag.charCodeAt(0) - 64) << 10) | ((flag.charCodeAt(1) - 64) << 5) | (flag.charCodeAt(2) - 64)
}
