import { createHash } from "node:crypto"
import type { KeyMangler } from "../../ports/key-mangler"

/**
 * Replaces every code point above U+007F with `&#<decimal>;`. Lone surrogates
 * are escaped too, so the result always encodes cleanly.
 */
export function escapeNonAscii(key: string): string {
  let out = ""

  for (const char of key) {
    const codePoint = char.codePointAt(0) ?? 0
    out += codePoint > 0x7f ? `&#${codePoint};` : char
  }

  return out
}

/**
 * Default region key mangler: 40-character lowercase SHA-1 hex digest of the
 * escaped key.
 */
export const sha1MangleKey: KeyMangler = (key) =>
  createHash("sha1").update(escapeNonAscii(key), "utf8").digest("hex")
