import { describe, it, expect } from 'vitest';
import { buildGetAttributeAllRequest } from '../src/services/get-attribute-all.js';
import {
  encodeIdentityItem,
  parseIdentityItem,
} from '../src/services/list-identity.js';
import {
  CAPABILITY_CIP_OVER_TCP,
  encodeServiceItem,
  parseServiceItem,
} from '../src/services/list-services.js';
import {
  buildReadTagRequest,
  buildReadTagResponse,
  parseReadTagResponse,
} from '../src/services/read-tag.js';
import { buildWriteTagRequest, parseWriteTagRequest } from '../src/services/write-tag.js';
import { EipFrameDecodeError, EipReplyTooShortError } from '../src/errors.js';
import type { IdentityItem } from '../src/types/eip-types.js';

describe('CIP services', () => {
  describe('Read Tag', () => {
    it('should request one element', () => {
      const request = buildReadTagRequest(Uint8Array.from([0x91, 0x02, 0x41, 0x42]));

      expect(request.service).toBe(0x4c);
      expect(request.data).toEqual(Uint8Array.from([0x01, 0x00]));
    });

    it('should strip type code and additional info from the reply', () => {
      const response = parseReadTagResponse(
        Uint8Array.from([0xa0, 0x02, 0x34, 0x12, 0x0a, 0x0b])
      );

      expect(response.dataType).toBe(0xa0);
      expect(response.additionalInfo).toEqual(Uint8Array.from([0x34, 0x12]));
      expect(response.data).toEqual(Uint8Array.from([0x0a, 0x0b]));
    });

    it('should throw EipReplyTooShortError when additional info is cut off', () => {
      expect(() => parseReadTagResponse(Uint8Array.from([0xa0, 0x02, 0x34]))).toThrow(
        EipReplyTooShortError
      );
    });

    it('should build the reply layout it parses', () => {
      expect(
        buildReadTagResponse({
          dataType: 0xc3,
          additionalInfo: new Uint8Array(0),
          data: Uint8Array.from([0x2a, 0x00]),
        })
      ).toEqual(Uint8Array.from([0xc3, 0x00, 0x2a, 0x00]));
    });
  });

  describe('Write Tag', () => {
    it('should write header, count and data', () => {
      const request = buildWriteTagRequest(
        Uint8Array.from([0x91, 0x02, 0x41, 0x42]),
        { dataType: 0xa0, additionalInfo: Uint8Array.from([0xef, 0xbe]) },
        Uint8Array.from([1, 2, 3])
      );

      expect(request.service).toBe(0x4d);
      expect(request.data).toEqual(Uint8Array.from([0xa0, 0x02, 0xef, 0xbe, 0x01, 0x00, 1, 2, 3]));
    });

    it('should parse the request data back', () => {
      const parsed = parseWriteTagRequest(Uint8Array.from([0xc4, 0x00, 0x01, 0x00, 9, 0, 0, 0]));

      expect(parsed.dataType).toBe(0xc4);
      expect(parsed.count).toBe(1);
      expect(parsed.data).toEqual(Uint8Array.from([9, 0, 0, 0]));
    });

    it('should reject request data without a count', () => {
      expect(() => parseWriteTagRequest(Uint8Array.from([0xc4, 0x00, 0x01]))).toThrow(
        EipFrameDecodeError
      );
    });
  });

  describe('Get Attribute All', () => {
    it('should address class and instance with a logical path', () => {
      const request = buildGetAttributeAllRequest(0x6a, 0);

      expect(request.service).toBe(0x01);
      expect(request.path).toEqual(Uint8Array.from([0x20, 0x6a, 0x24, 0x00]));
      expect(request.data.length).toBe(0);
    });
  });

  describe('List Identity', () => {
    const identity: IdentityItem = {
      protocolVersion: 1,
      socketAddress: { family: 2, port: 44818, address: '192.168.250.1' },
      vendorId: 0x002f,
      deviceType: 0x000c,
      productCode: 0x0650,
      revision: { major: 2, minor: 11 },
      status: 0x0034,
      serialNumber: 0x12345678,
      productName: 'TEST-PLC',
      state: 3,
    };

    it('should write the socket address in network byte order', () => {
      const bytes = encodeIdentityItem(identity);

      expect(Array.from(bytes.subarray(2, 10))).toEqual([0x00, 0x02, 0xaf, 0x12, 192, 168, 250, 1]);
    });

    it('should read back every field', () => {
      expect(parseIdentityItem(encodeIdentityItem(identity))).toEqual(identity);
    });

    it('should reject a truncated item', () => {
      expect(() => parseIdentityItem(new Uint8Array(20))).toThrow(EipFrameDecodeError);
    });
  });

  describe('List Services', () => {
    it('should pad the name to 16 bytes and trim it on parse', () => {
      const item = encodeServiceItem({
        typeId: 0x0100,
        protocolVersion: 1,
        capabilityFlags: CAPABILITY_CIP_OVER_TCP,
        name: 'Communications',
      });

      expect(item.data.length).toBe(20);
      expect(Array.from(item.data.subarray(0, 4))).toEqual([0x01, 0x00, 0x20, 0x00]);
      expect(parseServiceItem(item).name).toBe('Communications');
    });
  });
});
