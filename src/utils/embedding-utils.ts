/**
 * Vector serialization for SQLite BLOB storage.
 * Used by the index store and the embedding cache.
 */

import type { SparseVector } from '../core/types.js';
import { IndexStoreError } from './errors.js';

/**
 * Serialize a dense embedding to a Buffer.
 *
 * Uses Float32Array (4 bytes per dimension), so a 3072-dimension
 * embedding uses 12KB of storage.
 */
export function serializeEmbedding(embedding: readonly number[]): Buffer {
  return Buffer.from(new Float32Array(embedding).buffer);
}

/**
 * Deserialize a dense embedding from a SQLite Buffer.
 *
 * @throws IndexStoreError CORRUPT_VECTOR when the byte length is not a multiple of 4
 */
export function deserializeEmbedding(buffer: Buffer): number[] {
  if (buffer.length % Float32Array.BYTES_PER_ELEMENT !== 0) {
    throw new IndexStoreError(
      `Embedding blob has ${buffer.length} bytes, not a multiple of 4`,
      'CORRUPT_VECTOR',
    );
  }
  // Copy first: the Buffer may not be 4-byte aligned within its pool
  const bytes = new Uint8Array(buffer);
  const float32 = new Float32Array(
    bytes.buffer,
    bytes.byteOffset,
    bytes.length / Float32Array.BYTES_PER_ELEMENT,
  );
  return Array.from(float32);
}

/**
 * Round a dense vector to float32 precision, the precision it is stored at.
 */
export function toFloat32Precision(embedding: readonly number[]): number[] {
  return Array.from(new Float32Array(embedding));
}

/**
 * Serialize a sparse vector to a pair of Buffers (uint32 indices, float32 values).
 */
export function serializeSparse(vector: SparseVector): { indices: Buffer; values: Buffer } {
  return {
    indices: Buffer.from(new Uint32Array(vector.indices).buffer),
    values: Buffer.from(new Float32Array(vector.values).buffer),
  };
}

/**
 * Deserialize a sparse vector stored by serializeSparse.
 *
 * @throws IndexStoreError CORRUPT_VECTOR when the two blobs disagree in length
 */
export function deserializeSparse(indices: Buffer, values: Buffer): SparseVector {
  if (indices.length !== values.length || indices.length % 4 !== 0) {
    throw new IndexStoreError(
      `Sparse blobs have mismatched sizes (${indices.length} / ${values.length} bytes)`,
      'CORRUPT_VECTOR',
    );
  }
  const idx = new Uint8Array(indices);
  const val = new Uint8Array(values);
  return {
    indices: Array.from(new Uint32Array(idx.buffer, idx.byteOffset, idx.length / 4)),
    values: Array.from(new Float32Array(val.buffer, val.byteOffset, val.length / 4)),
  };
}
