import { describe, it, expect } from 'vitest';
import {
  elementSegment,
  logicalPath,
  parsePath,
  simpleDataSegment,
  symbolicSegment,
  variablePath,
} from '../src/cip/path-builder.js';
import { EipPathError } from '../src/errors.js';
import { concatUint8Arrays } from '../src/utils/utils.js';

const ascii = (text: string): number[] => Array.from(text, ch => ch.charCodeAt(0));

describe('Address path builder', () => {
  describe('symbolicSegment', () => {
    it('should pad an odd-length name to an even segment', () => {
      expect(Array.from(symbolicSegment('Counter'))).toEqual([0x91, 0x07, ...ascii('Counter'), 0x00]);
    });

    it('should not pad an even-length name', () => {
      expect(Array.from(symbolicSegment('Ab'))).toEqual([0x91, 0x02, 0x41, 0x62]);
    });

    it('should count UTF-8 bytes in the length byte', () => {
      const segment = symbolicSegment('Ж');

      expect(Array.from(segment)).toEqual([0x91, 0x02, 0xd0, 0x96]);
    });

    it('should accept a 255-byte name and reject 256 bytes', () => {
      expect(symbolicSegment('x'.repeat(255)).length).toBe(258);
      expect(() => symbolicSegment('x'.repeat(256))).toThrow(EipPathError);
    });

    it('should reject an empty name', () => {
      expect(() => symbolicSegment('')).toThrow(EipPathError);
    });
  });

  describe('logicalPath', () => {
    it('should use the 8-bit form for small ids', () => {
      expect(Array.from(logicalPath(0x6b, 1))).toEqual([0x20, 0x6b, 0x24, 0x01]);
    });

    it('should use the padded 16-bit form above 255', () => {
      expect(Array.from(logicalPath(0x6c, 0x1234))).toEqual([0x20, 0x6c, 0x25, 0x00, 0x34, 0x12]);
    });

    it('should append the attribute segment when given', () => {
      expect(Array.from(logicalPath(0x01, 1, 7))).toEqual([0x20, 0x01, 0x24, 0x01, 0x30, 0x07]);
    });
  });

  describe('elementSegment', () => {
    it('should pick the smallest form for the index', () => {
      expect(Array.from(elementSegment(3))).toEqual([0x28, 0x03]);
      expect(Array.from(elementSegment(0x1234))).toEqual([0x29, 0x00, 0x34, 0x12]);
      expect(Array.from(elementSegment(0x12345))).toEqual([0x2a, 0x00, 0x45, 0x23, 0x01, 0x00]);
    });

    it('should reject negative indices', () => {
      expect(() => elementSegment(-1)).toThrow(EipPathError);
    });
  });

  describe('simpleDataSegment', () => {
    it('should encode offset as u32 and size as u16', () => {
      expect(Array.from(simpleDataSegment(494, 400))).toEqual([
        0x80, 0x03, 0xee, 0x01, 0x00, 0x00, 0x90, 0x01,
      ]);
    });

    it('should reject a size above 65535', () => {
      expect(() => simpleDataSegment(0, 0x10000)).toThrow(EipPathError);
    });
  });

  describe('variablePath', () => {
    it('should split members into symbolic segments', () => {
      expect(Array.from(variablePath('Motor.Speed'))).toEqual([
        0x91, 0x05, ...ascii('Motor'), 0x00, 0x91, 0x05, ...ascii('Speed'), 0x00,
      ]);
    });

    it('should turn indices into element segments', () => {
      expect(Array.from(variablePath('Grid[1,2]'))).toEqual([
        0x91, 0x04, ...ascii('Grid'), 0x28, 0x01, 0x28, 0x02,
      ]);
    });

    it('should reject a non-numeric index', () => {
      expect(() => variablePath('Grid[x]')).toThrow(EipPathError);
    });
  });

  describe('parsePath', () => {
    it('should read back a symbolic path with a data segment', () => {
      const path = concatUint8Arrays([variablePath('Counter'), simpleDataSegment(400, 100)]);

      expect(parsePath(path)).toEqual([
        { type: 'symbolic', name: 'Counter' },
        { type: 'data', offset: 400, size: 100 },
      ]);
    });

    it('should read back logical segments', () => {
      expect(parsePath(logicalPath(0x6c, 0x1234))).toEqual([
        { type: 'class', value: 0x6c },
        { type: 'instance', value: 0x1234 },
      ]);
    });

    it('should throw EipPathError on an unknown segment', () => {
      expect(() => parsePath(Uint8Array.from([0x99, 0x00]))).toThrow(EipPathError);
    });

    it('should throw EipPathError on a truncated segment', () => {
      expect(() => parsePath(Uint8Array.from([0x91, 0x05, 0x41]))).toThrow(EipPathError);
    });
  });
});
