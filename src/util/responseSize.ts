// src/util/responseSize.ts
//
// UTF-8 byte sizes used for inbound payload limits and outbound response caps.

export function utf8ByteLength(value: string): number {
  return Buffer.byteLength(value, 'utf8');
}

export function exceedsByteLimit(value: string, maxBytes: number): boolean {
  if (!Number.isFinite(maxBytes) || maxBytes <= 0) return false;
  return utf8ByteLength(value) > Math.floor(maxBytes);
}
