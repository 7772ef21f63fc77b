/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Buffer utilities for reading/writing little-endian DIF data
 */

import { CapacityExceededError, MalformedInputError } from '@csxdif/data';
import type { Vec3 } from '@csxdif/geometry';

/** Strings carry a one-byte length prefix */
export const MAX_STRING_BYTES = 0xff;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Writer for building binary buffers
 */
export class BufferWriter {
  private chunks: Uint8Array[] = [];
  private currentChunk: Uint8Array;
  private view: DataView;
  private offset: number = 0;
  private totalSize: number = 0;

  constructor(initialSize: number = 64 * 1024) {
    this.currentChunk = new Uint8Array(initialSize);
    this.view = new DataView(this.currentChunk.buffer);
  }

  private ensureCapacity(bytes: number): void {
    if (this.offset + bytes > this.currentChunk.length) {
      // Save current chunk and create new one
      this.chunks.push(this.currentChunk.subarray(0, this.offset));
      this.totalSize += this.offset;

      const newSize = Math.max(bytes, this.currentChunk.length);
      this.currentChunk = new Uint8Array(newSize);
      this.view = new DataView(this.currentChunk.buffer);
      this.offset = 0;
    }
  }

  writeUint8(value: number): void {
    this.ensureCapacity(1);
    this.currentChunk[this.offset++] = value;
  }

  writeUint16(value: number): void {
    this.ensureCapacity(2);
    this.view.setUint16(this.offset, value, true);
    this.offset += 2;
  }

  writeUint32(value: number): void {
    this.ensureCapacity(4);
    this.view.setUint32(this.offset, value, true);
    this.offset += 4;
  }

  writeInt32(value: number): void {
    this.ensureCapacity(4);
    this.view.setInt32(this.offset, value, true);
    this.offset += 4;
  }

  writeFloat32(value: number): void {
    this.ensureCapacity(4);
    this.view.setFloat32(this.offset, value, true);
    this.offset += 4;
  }

  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.currentChunk.set(data, this.offset);
    this.offset += data.length;
  }

  writePoint(point: Vec3): void {
    this.writeFloat32(point.x);
    this.writeFloat32(point.y);
    this.writeFloat32(point.z);
  }

  writeString(str: string): void {
    const bytes = encoder.encode(str);
    if (bytes.length > MAX_STRING_BYTES) {
      throw new CapacityExceededError(
        `String of ${bytes.length} bytes exceeds the ${MAX_STRING_BYTES}-byte limit: "${str.slice(0, 32)}..."`
      );
    }
    this.writeUint8(bytes.length);
    this.writeBytes(bytes);
  }

  /** u32 count followed by one entry per item */
  writeArray<T>(items: readonly T[], writeItem: (item: T) => void): void {
    this.writeUint32(items.length);
    for (const item of items) {
      writeItem(item);
    }
  }

  /** Get current position */
  get position(): number {
    return this.totalSize + this.offset;
  }

  /** Build final buffer */
  build(): Uint8Array {
    // Include current chunk
    this.chunks.push(this.currentChunk.subarray(0, this.offset));
    this.totalSize += this.offset;

    // Concatenate all chunks
    const result = new Uint8Array(this.totalSize);
    let pos = 0;
    for (const chunk of this.chunks) {
      result.set(chunk, pos);
      pos += chunk.length;
    }

    return result;
  }
}

/**
 * Reader for parsing binary buffers
 */
export class BufferReader {
  private view: DataView;
  private bytes: Uint8Array;
  private offset: number = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  private require(bytes: number): void {
    if (this.offset + bytes > this.bytes.length) {
      throw new MalformedInputError(
        'Unexpected end of DIF data',
        `needed ${bytes} bytes at offset ${this.offset}, ${this.remaining} left`
      );
    }
  }

  readUint8(): number {
    this.require(1);
    return this.view.getUint8(this.offset++);
  }

  readUint16(): number {
    this.require(2);
    const value = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return value;
  }

  readUint32(): number {
    this.require(4);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readInt32(): number {
    this.require(4);
    const value = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readFloat32(): number {
    this.require(4);
    const value = this.view.getFloat32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readBytes(length: number): Uint8Array {
    this.require(length);
    const slice = this.bytes.slice(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  readPoint(): Vec3 {
    const x = this.readFloat32();
    const y = this.readFloat32();
    const z = this.readFloat32();
    return { x, y, z };
  }

  readString(): string {
    const length = this.readUint8();
    return decoder.decode(this.readBytes(length));
  }

  /** Counterpart of BufferWriter.writeArray */
  readArray<T>(readItem: () => T): T[] {
    const count = this.readUint32();
    // Each entry takes at least one byte
    if (count > this.remaining) {
      throw new MalformedInputError('Corrupt DIF array length', `${count} entries with ${this.remaining} bytes left`);
    }
    const items: T[] = [];
    for (let i = 0; i < count; i++) {
      items.push(readItem());
    }
    return items;
  }
}
