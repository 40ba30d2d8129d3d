/**
 * CRC-32 (IEEE 802.3)
 *
 * Reflected polynomial 0xEDB88320, initial value and final xor 0xFFFFFFFF.
 * Same checksum as zlib's crc32.
 */

const CRC32_POLYNOMIAL = 0xedb88320;

const CRC32_TABLE = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? CRC32_POLYNOMIAL ^ (c >>> 1) : c >>> 1;
  }
  CRC32_TABLE[n] = c;
}

/**
 * Compute the CRC-32 checksum of a byte sequence.
 *
 * @param bytes - Input bytes
 * @returns Unsigned 32-bit checksum (0 for empty input)
 */
export function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = CRC32_TABLE[(crc ^ byte) & 0xff]! ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}
