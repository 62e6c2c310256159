import { describe, it, expect } from 'vitest';
import {
  encodeTagName,
  encodeTagNameServerInfo,
  parseTagName,
  parseTagNameServerInfo,
} from '../src/object-model/tag-name-server.js';
import {
  encodeVariableObject,
  parseVariableObject,
} from '../src/object-model/variable-object.js';
import {
  encodeVariableTypeObject,
  parseVariableTypeObject,
} from '../src/object-model/variable-type-object.js';
import { CipDataType } from '../src/constants/constants.js';
import { EipFrameDecodeError } from '../src/errors.js';

describe('Object model attributes', () => {
  describe('Tag Name Server', () => {
    it('should read revision and instance count from instance 0', () => {
      expect(parseTagNameServerInfo(Uint8Array.from([0x01, 0x00, 0x03, 0x00]))).toEqual({
        revision: 1,
        instanceCount: 3,
      });
    });

    it('should read the name length at byte 4 and the name from byte 5', () => {
      const data = Uint8Array.from([0, 0, 0, 0, 0x05, 0x53, 0x70, 0x65, 0x65, 0x64]);

      expect(parseTagName(data)).toBe('Speed');
    });

    it('should throw when the name overruns the reply', () => {
      expect(() => parseTagName(Uint8Array.from([0, 0, 0, 0, 0x09, 0x41]))).toThrow(
        EipFrameDecodeError
      );
    });

    it('should reject a name that is not valid UTF-8', () => {
      const data = Uint8Array.from([0, 0, 0, 0, 0x03, 0x41, 0xff, 0x42]);

      expect(() => parseTagName(data)).toThrow(EipFrameDecodeError);
      expect(() => parseTagName(data)).toThrow('Tag name is not valid UTF-8: 41ff42');
    });

    it('should encode what it parses', () => {
      expect(parseTagName(encodeTagName('_SystemTime'))).toBe('_SystemTime');
      expect(encodeTagNameServerInfo({ revision: 1, instanceCount: 2 })).toEqual(
        Uint8Array.from([1, 0, 2, 0])
      );
    });
  });

  describe('Variable Object', () => {
    it('should parse a one-dimensional DINT array', () => {
      const data = Uint8Array.from([
        0x14, 0x00, 0x00, 0x00, // size 20
        0xa3, 0xc4, 0x01, 0x00, // ARRAY of DINT, 1 dimension
        0x05, 0x00, 0x00, 0x00, // extent 5
        0, 0, 0, 0, 0, 0, 0, 0, // reserved
        0x00, 0x00, 0x00, 0x00, // bit number + pad
        0x00, 0x00, 0x00, 0x00, // variable type instance
        0x01, 0x00, 0x00, 0x00, // start 1
      ]);

      expect(parseVariableObject(data)).toEqual({
        size: 20,
        dataType: CipDataType.ARRAY,
        arrayDataType: CipDataType.DINT,
        extents: [5],
        bitNumber: 0,
        variableTypeInstanceId: 0,
        starts: [1],
      });
    });

    it('should place the type instance after the bit number', () => {
      const bytes = encodeVariableObject({
        size: 8,
        dataType: CipDataType.STRUCT,
        arrayDataType: 0,
        extents: [],
        bitNumber: 0,
        variableTypeInstanceId: 0x0102,
        starts: [],
      });

      expect(bytes.length).toBe(24);
      expect(Array.from(bytes.subarray(20, 24))).toEqual([0x02, 0x01, 0x00, 0x00]);
    });

    it('should throw on a truncated reply', () => {
      expect(() => parseVariableObject(Uint8Array.from([0x14, 0, 0, 0, 0xa3, 0xc4, 0x02, 0]))).toThrow(
        EipFrameDecodeError
      );
    });
  });

  describe('Variable Type Object', () => {
    it('should pad one byte after an even-length name', () => {
      const bytes = encodeVariableTypeObject({
        sizeInMemory: 4,
        dataType: CipDataType.DINT,
        arrayDataType: 0,
        extents: [],
        numberOfMembers: 0,
        crc: 0,
        name: 'AB',
        nextInstanceId: 7,
        nestingInstanceId: 0,
        starts: [],
      });

      // 8 + 9 + 2 + 1 = 20: next instance
      expect(Array.from(bytes.subarray(20, 24))).toEqual([0x07, 0x00, 0x00, 0x00]);
      expect(bytes.length).toBe(28);
    });

    it('should read back a structure type with its chain links', () => {
      const attributes = {
        sizeInMemory: 6,
        dataType: CipDataType.STRUCT,
        arrayDataType: 0,
        extents: [],
        numberOfMembers: 2,
        crc: 0xbeef,
        name: 'POINT',
        nextInstanceId: 0,
        nestingInstanceId: 3,
        starts: [],
      };

      expect(parseVariableTypeObject(encodeVariableTypeObject(attributes))).toEqual(attributes);
    });

    it('should reject a type name that is not valid UTF-8', () => {
      const bytes = encodeVariableTypeObject({
        sizeInMemory: 4,
        dataType: CipDataType.DINT,
        arrayDataType: 0,
        extents: [],
        numberOfMembers: 0,
        crc: 0,
        name: 'AB',
        nextInstanceId: 0,
        nestingInstanceId: 0,
        starts: [],
      });
      // name length at 16, name from 17
      bytes[17] = 0xc3;

      expect(() => parseVariableTypeObject(bytes)).toThrow(EipFrameDecodeError);
    });

    it('should throw when the reply ends before the name length', () => {
      expect(() => parseVariableTypeObject(new Uint8Array(10))).toThrow(EipFrameDecodeError);
    });
  });
});
