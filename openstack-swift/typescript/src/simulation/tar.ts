/**
 * Minimal ustar reader and writer for simulated archive extraction
 */

const BLOCK_SIZE = 512;

export interface TarEntry {
  name: string;
  data: Uint8Array;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function readString(block: Uint8Array, start: number, length: number): string {
  const field = block.subarray(start, start + length);
  const end = field.indexOf(0);
  return decoder.decode(end < 0 ? field : field.subarray(0, end));
}

/**
 * Reads the regular files of a tar archive. Directories, links and other
 * entry types are skipped.
 *
 * @throws {Error} If a header is truncated or has an unreadable size
 */
export function readTar(archive: Uint8Array): TarEntry[] {
  const entries: TarEntry[] = [];
  let offset = 0;

  while (offset + BLOCK_SIZE <= archive.length) {
    const header = archive.subarray(offset, offset + BLOCK_SIZE);
    if (header.every((byte) => byte === 0)) {
      break;
    }

    const name = readString(header, 0, 100);
    const prefix = readString(header, 345, 155);
    const sizeField = readString(header, 124, 12).trim();
    const size = sizeField === '' ? 0 : Number.parseInt(sizeField, 8);
    if (Number.isNaN(size)) {
      throw new Error(`bad size field in tar header of ${name}`);
    }
    const type = header[156] ?? 0;

    offset += BLOCK_SIZE;
    if (offset + size > archive.length) {
      throw new Error(`tar entry ${name} is truncated`);
    }
    // '0' or NUL: regular file
    if (type === 0x30 || type === 0) {
      entries.push({
        name: prefix === '' ? name : `${prefix}/${name}`,
        data: archive.slice(offset, offset + size),
      });
    }
    offset += Math.ceil(size / BLOCK_SIZE) * BLOCK_SIZE;
  }

  return entries;
}

function writeOctal(block: Uint8Array, start: number, length: number, value: number): void {
  const text = value.toString(8).padStart(length - 1, '0');
  block.set(encoder.encode(text), start);
}

/**
 * Writes regular files into a ustar archive. Names may be at most 100
 * bytes long.
 */
export function writeTar(entries: readonly TarEntry[]): Uint8Array {
  const blocks: Uint8Array[] = [];

  for (const entry of entries) {
    const header = new Uint8Array(BLOCK_SIZE);
    const name = encoder.encode(entry.name);
    if (name.length > 100) {
      throw new Error(`tar entry name too long: ${entry.name}`);
    }
    header.set(name, 0);
    writeOctal(header, 100, 8, 0o644);
    writeOctal(header, 108, 8, 0);
    writeOctal(header, 116, 8, 0);
    writeOctal(header, 124, 12, entry.data.length);
    writeOctal(header, 136, 12, 0);
    header[156] = 0x30;
    header.set(encoder.encode('ustar'), 257);
    header.set(encoder.encode('00'), 263);

    // checksum is computed with its own field filled with spaces
    header.fill(0x20, 148, 156);
    const checksum = header.reduce((sum, byte) => sum + byte, 0);
    header.set(encoder.encode(`${checksum.toString(8).padStart(6, '0')}\0 `), 148);

    blocks.push(header);
    const padded = new Uint8Array(Math.ceil(entry.data.length / BLOCK_SIZE) * BLOCK_SIZE);
    padded.set(entry.data);
    blocks.push(padded);
  }
  blocks.push(new Uint8Array(BLOCK_SIZE * 2));

  const result = new Uint8Array(blocks.reduce((total, block) => total + block.length, 0));
  let offset = 0;
  for (const block of blocks) {
    result.set(block, offset);
    offset += block.length;
  }
  return result;
}
