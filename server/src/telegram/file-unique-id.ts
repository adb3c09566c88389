/**
 * Bot API `file_unique_id` computed from MTProto media, so that files seen on
 * the user session can be matched with the ones the bot received.
 *
 * Layout: int32 type + int64 media id (little endian), zero bytes run-length
 * encoded as `0x00 <count>`, then base64url without padding.
 */

export enum FileUniqueType {
  Web = 0,
  Photo = 1,
  Document = 2,
}

export function rleEncode(data: Uint8Array): Buffer {
  const out: number[] = [];
  let zeros = 0;

  for (const byte of data) {
    if (byte === 0) {
      zeros++;
      continue;
    }
    if (zeros) {
      out.push(0, zeros);
      zeros = 0;
    }
    out.push(byte);
  }
  if (zeros) {
    out.push(0, zeros);
  }

  return Buffer.from(out);
}

export function encodeFileUniqueId(type: FileUniqueType, mediaId: bigint): string {
  const raw = Buffer.alloc(12);
  raw.writeInt32LE(type, 0);
  raw.writeBigInt64LE(BigInt.asIntN(64, mediaId), 4);
  return rleEncode(raw).toString("base64url");
}

/**
 * Documents, videos, audio and voice notes are all documents on MTProto;
 * photos are keyed by their photo id with the same type.
 */
export function mediaUniqueId(mediaId: bigint): string {
  return encodeFileUniqueId(FileUniqueType.Document, mediaId);
}
