import { describe, it, expect } from 'vitest';
import {
  decodeCommandSpecificData,
  decodeEncapsulation,
  encodeCommandSpecificData,
  encodeEncapsulation,
  extractFrame,
} from '../src/framers/encapsulation.js';
import { EipFrameDecodeError, EipFrameTooShortError } from '../src/errors.js';
import { SenderContextCounter } from '../src/utils/utils.js';

const CONTEXT = Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8]);

describe('Encapsulation codec', () => {
  describe('encodeEncapsulation', () => {
    it('should write the 24-byte header little-endian with the payload length', () => {
      const frame = encodeEncapsulation({
        command: 0x65,
        sessionHandle: 0,
        status: 0,
        senderContext: CONTEXT,
        options: 0,
        payload: Uint8Array.from([0x01, 0x00, 0x00, 0x00]),
      });

      expect(frame).toEqual(
        Uint8Array.from([
          0x65, 0x00, 0x04, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 1, 2, 3, 4, 5, 6,
          7, 8, 0x00, 0x00, 0x00, 0x00, 0x01, 0x00, 0x00, 0x00,
        ])
      );
    });

    it('should place session handle and status at offsets 4 and 8', () => {
      const frame = encodeEncapsulation({
        command: 0x6f,
        sessionHandle: 0x12345678,
        status: 0x64,
        senderContext: CONTEXT,
        options: 0,
        payload: new Uint8Array(0),
      });

      expect(Array.from(frame.subarray(4, 12))).toEqual([
        0x78, 0x56, 0x34, 0x12, 0x64, 0x00, 0x00, 0x00,
      ]);
    });

    it('should reject a sender context that is not 8 bytes', () => {
      expect(() =>
        encodeEncapsulation({
          command: 0x65,
          sessionHandle: 0,
          status: 0,
          senderContext: new Uint8Array(4),
          options: 0,
          payload: new Uint8Array(0),
        })
      ).toThrow(RangeError);
    });
  });

  describe('decodeEncapsulation', () => {
    it('should read back every header field', () => {
      const frame = encodeEncapsulation({
        command: 0x6f,
        sessionHandle: 0x00010002,
        status: 3,
        senderContext: CONTEXT,
        options: 0,
        payload: Uint8Array.from([0xaa, 0xbb]),
      });

      const message = decodeEncapsulation(frame);

      expect(message.command).toBe(0x6f);
      expect(message.sessionHandle).toBe(0x00010002);
      expect(message.status).toBe(3);
      expect(message.senderContext).toEqual(CONTEXT);
      expect(message.options).toBe(0);
      expect(message.payload).toEqual(Uint8Array.from([0xaa, 0xbb]));
    });

    it('should throw EipFrameTooShortError under 24 bytes', () => {
      expect(() => decodeEncapsulation(new Uint8Array(23))).toThrow(EipFrameTooShortError);
    });

    it('should take every byte after the header as payload', () => {
      const frame = new Uint8Array(30);
      frame[2] = 0x02; // объявлено 2 байта, пришло 6

      expect(decodeEncapsulation(frame).payload.length).toBe(6);
    });
  });

  describe('extractFrame', () => {
    it('should split one complete frame from a stream buffer', () => {
      const frame = encodeEncapsulation({
        command: 0x65,
        sessionHandle: 1,
        status: 0,
        senderContext: CONTEXT,
        options: 0,
        payload: Uint8Array.from([1, 0, 0, 0]),
      });
      const buffer = new Uint8Array(frame.length + 3);
      buffer.set(frame);
      buffer.set([9, 9, 9], frame.length);

      const result = extractFrame(buffer);

      expect(result?.frame).toEqual(frame);
      expect(result?.rest).toEqual(Uint8Array.from([9, 9, 9]));
    });

    it('should return null while the frame is incomplete', () => {
      const frame = encodeEncapsulation({
        command: 0x65,
        sessionHandle: 1,
        status: 0,
        senderContext: CONTEXT,
        options: 0,
        payload: Uint8Array.from([1, 0, 0, 0]),
      });

      expect(extractFrame(frame.subarray(0, 20))).toBeNull();
      expect(extractFrame(frame.subarray(0, 26))).toBeNull();
    });
  });

  describe('command specific data', () => {
    it('should encode interface handle, timeout and packet', () => {
      const bytes = encodeCommandSpecificData({
        interfaceHandle: 0,
        timeout: 8,
        packet: Uint8Array.from([0xaa]),
      });

      expect(bytes).toEqual(Uint8Array.from([0, 0, 0, 0, 0x08, 0x00, 0xaa]));
    });

    it('should decode the packet after the 6-byte prefix', () => {
      const decoded = decodeCommandSpecificData(Uint8Array.from([0, 0, 0, 0, 0x0a, 0x00, 1, 2]));

      expect(decoded.interfaceHandle).toBe(0);
      expect(decoded.timeout).toBe(10);
      expect(decoded.packet).toEqual(Uint8Array.from([1, 2]));
    });

    it('should throw EipFrameDecodeError under 6 bytes', () => {
      expect(() => decodeCommandSpecificData(new Uint8Array(5))).toThrow(EipFrameDecodeError);
    });
  });

  describe('SenderContextCounter', () => {
    it('should put the request number in the low 4 bytes', () => {
      const counter = new SenderContextCounter();
      counter.next();
      const second = counter.next();

      expect(second).toEqual(Uint8Array.from([2, 0, 0, 0, 0, 0, 0, 0]));
      expect(counter.current).toBe(2);
    });
  });
});
