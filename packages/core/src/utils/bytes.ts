const textEncoder = new TextEncoder();

export function utf8ToBytes(input: string): Uint8Array {
  return textEncoder.encode(input);
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}
