/**
 * src/shared/security/pbkdf2/secure-buffer.ts
 *
 * WHY:
 * - Secret bytes and derived keys must be zeroed on every exit path,
 *   not whenever the GC gets to them.
 *
 * HOW TO USE:
 * - const bytes = encodeSecret(secret)
 * - return withWiped([bytes], () => derive(bytes, ...))
 *
 * RULES:
 * - Allocate with Buffer.alloc (never the shared pool) so a wipe only touches
 *   memory we own.
 */

type Wipeable = Uint8Array | null | undefined;

export function wipe(...buffers: Wipeable[]): void {
  for (const buf of buffers) {
    if (buf) buf.fill(0);
  }
}

/** UTF-8 bytes of `secret` in an unpooled buffer owned by the caller. */
export function encodeSecret(secret: string): Buffer {
  const out = Buffer.alloc(Buffer.byteLength(secret, 'utf8'));
  out.write(secret, 'utf8');
  return out;
}

export function withWiped<T>(buffers: Wipeable[], fn: () => T): T {
  try {
    return fn();
  } finally {
    wipe(...buffers);
  }
}

export async function withWipedAsync<T>(buffers: Wipeable[], fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } finally {
    wipe(...buffers);
  }
}
