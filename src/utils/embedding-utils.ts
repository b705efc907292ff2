/**
 * Embedding serialization for SQLite BLOB storage.
 */

/**
 * Serialize an embedding to a Buffer (Float32, 4 bytes per dimension).
 */
export function serializeEmbedding(embedding: number[]): Buffer {
  return Buffer.from(new Float32Array(embedding).buffer);
}

/**
 * Deserialize an embedding from a SQLite Buffer, honouring the byte offset of
 * pooled buffers.
 */
export function deserializeEmbedding(buffer: Buffer): number[] {
  const float32 = new Float32Array(
    buffer.buffer,
    buffer.byteOffset,
    buffer.length / Float32Array.BYTES_PER_ELEMENT,
  );
  return Array.from(float32);
}
