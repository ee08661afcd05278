/**
 * Part arithmetic tests
 */

import { describe, it, expect } from 'vitest';

import {
  computePartCount,
  expectedPartLength,
  findMissingParts,
  md5Hex,
  multipartEtag,
  normalizeChecksum,
  partByteRange,
  sameEtag,
  samePartSnapshot,
  sha256Hex,
} from '@/services/transfer.parts.js';
import type { PartRecord } from '@/types/index.js';

function part(overrides: Partial<PartRecord>): PartRecord {
  return {
    transferId: 'tr-1',
    partIndex: 1,
    byteStart: 0,
    byteEnd: 3,
    size: 4,
    checksum: 'a'.repeat(64),
    status: 'stored',
    storageToken: '"etag-1"',
    updatedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

describe('transfer parts', () => {
  describe('computePartCount()', () => {
    it('should round up to cover the whole file', () => {
      expect(computePartCount(15_000_000, 5_000_000)).toBe(3);
      expect(computePartCount(15_000_001, 5_000_000)).toBe(4);
      expect(computePartCount(1, 5_000_000)).toBe(1);
    });
  });

  describe('expectedPartLength() and partByteRange()', () => {
    const transfer = { totalSize: 10, partSize: 4, partCount: 3 };

    it('should give every part but the last the full part size', () => {
      expect(expectedPartLength(transfer, 1)).toBe(4);
      expect(expectedPartLength(transfer, 2)).toBe(4);
      expect(expectedPartLength(transfer, 3)).toBe(2);
    });

    it('should give a full last part when the size divides evenly', () => {
      const even = { totalSize: 15_000_000, partSize: 5_000_000, partCount: 3 };

      expect(expectedPartLength(even, 3)).toBe(5_000_000);
      expect(partByteRange(even, 3)).toEqual({
        byteStart: 10_000_000,
        byteEnd: 14_999_999,
      });
    });

    it('should produce contiguous inclusive ranges', () => {
      expect(partByteRange(transfer, 1)).toEqual({ byteStart: 0, byteEnd: 3 });
      expect(partByteRange(transfer, 2)).toEqual({ byteStart: 4, byteEnd: 7 });
      expect(partByteRange(transfer, 3)).toEqual({ byteStart: 8, byteEnd: 9 });
    });
  });

  describe('findMissingParts()', () => {
    it('should ignore pending records', () => {
      const parts = [
        part({ partIndex: 1 }),
        part({ partIndex: 2, status: 'pending', storageToken: null }),
      ];

      expect(findMissingParts(parts, 3)).toEqual([2, 3]);
    });

    it('should return an empty list when every index is stored', () => {
      const parts = [part({ partIndex: 2 }), part({ partIndex: 1 })];

      expect(findMissingParts(parts, 2)).toEqual([]);
    });
  });

  describe('samePartSnapshot()', () => {
    it('should match listings that differ only in order', () => {
      const a = [part({ partIndex: 1 }), part({ partIndex: 2 })];
      const b = [part({ partIndex: 2 }), part({ partIndex: 1 })];

      expect(samePartSnapshot(a, b)).toBe(true);
    });

    it('should detect a changed token', () => {
      const a = [part({ partIndex: 1 })];
      const b = [part({ partIndex: 1, storageToken: '"etag-2"' })];

      expect(samePartSnapshot(a, b)).toBe(false);
    });

    it('should detect an added part', () => {
      const a = [part({ partIndex: 1 })];
      const b = [part({ partIndex: 1 }), part({ partIndex: 2 })];

      expect(samePartSnapshot(a, b)).toBe(false);
    });
  });

  describe('checksums', () => {
    it('should hash bytes to lowercase hex SHA-256', () => {
      expect(sha256Hex(new TextEncoder().encode('abc'))).toBe(
        'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
      );
    });

    it('should normalize case and surrounding whitespace', () => {
      const digest = 'BA7816BF8F01CFEA414140DE5DAE2223B00361A396177A9CB410FF61F20015AD';

      expect(normalizeChecksum(` ${digest} `)).toBe(digest.toLowerCase());
    });

    it('should reject anything that is not 64 hex characters', () => {
      expect(normalizeChecksum('abc')).toBeNull();
      expect(normalizeChecksum('z'.repeat(64))).toBeNull();
      expect(normalizeChecksum('')).toBeNull();
    });
  });

  describe('ETags', () => {
    const encode = (text: string) => new TextEncoder().encode(text);

    it('should hash a single body to MD5 hex', () => {
      expect(md5Hex(encode('a'))).toBe('0cc175b9c0f1b6a831c399e269772661');
    });

    it('should derive the multipart ETag from the part ETags', () => {
      expect(
        multipartEtag([
          '"0cc175b9c0f1b6a831c399e269772661"',
          '"92eb5ffee6ae2fec3ad71c777531578f"',
        ])
      ).toBe('"96e024ba2074fe77e8e965ba43a704be-2"');
    });

    it('should give up on tokens that are not plain MD5s', () => {
      expect(multipartEtag(['"0cc175b9c0f1b6a831c399e269772661"', '"opaque-kms"'])).toBeNull();
    });

    it('should compare ETags without quotes or case', () => {
      expect(sameEtag('"ABC123-2"', 'abc123-2')).toBe(true);
      expect(sameEtag('"abc123-2"', '"abc123-3"')).toBe(false);
    });
  });
});
