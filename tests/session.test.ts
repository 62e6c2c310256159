import { describe, it, expect } from 'vitest';
import { EipSession } from '../src/session.js';
import { CipService, EncapsulationCommand, PacketItemType } from '../src/constants/constants.js';
import { encodeCipReply } from '../src/cip/cip-message.js';
import { encodeCommonPacketFormat } from '../src/framers/common-packet-format.js';
import {
  decodeEncapsulation,
  encodeCommandSpecificData,
  encodeEncapsulation,
} from '../src/framers/encapsulation.js';
import {
  CipStatusError,
  EipEncapsulationStatusError,
  EipMissingItemError,
  EipSenderContextMismatchError,
  EipSessionError,
  EipTimeoutError,
  EipUnexpectedCommandError,
} from '../src/errors.js';
import type { EipTransport, EncapsulationMessage } from '../src/types/eip-types.js';
import { Diagnostics } from '../src/utils/diagnostics.js';

type Responder = (request: EncapsulationMessage) => EncapsulationMessage | null;

/** Транспорт, отвечающий функцией-обработчиком */
class ScriptedTransport implements EipTransport {
  isOpen = false;
  connects = 0;
  disconnects = 0;
  flushes = 0;
  readonly sent: EncapsulationMessage[] = [];
  private pending: Uint8Array[] = [];

  constructor(private readonly responder: Responder) {}

  async connect(): Promise<void> {
    this.connects++;
    this.isOpen = true;
  }

  async disconnect(): Promise<void> {
    this.disconnects++;
    this.isOpen = false;
  }

  async send(frame: Uint8Array): Promise<void> {
    const request = decodeEncapsulation(frame);
    this.sent.push(request);
    const reply = this.responder(request);
    if (reply) this.pending.push(encodeEncapsulation(reply));
  }

  async receiveFrame(): Promise<Uint8Array> {
    const frame = this.pending.shift();
    if (!frame) throw new EipTimeoutError();
    return frame;
  }

  async flush(): Promise<void> {
    this.flushes++;
    this.pending = [];
  }

  /** Кладёт кадр в очередь приёма вне порядка запросов */
  deliver(message: EncapsulationMessage): void {
    this.pending.push(encodeEncapsulation(message));
  }
}

const HANDLE = 0x00020001;

/** Отвечает на Register Session, остальное отдаёт onOther */
const controller =
  (onOther: Responder = () => null): Responder =>
  request =>
    request.command === EncapsulationCommand.REGISTER_SESSION
      ? { ...request, sessionHandle: HANDLE }
      : onOther(request);

const rrReply = (request: EncapsulationMessage, cip: Uint8Array): EncapsulationMessage => ({
  ...request,
  payload: encodeCommandSpecificData({
    interfaceHandle: 0,
    timeout: 0,
    packet: encodeCommonPacketFormat([{ typeId: PacketItemType.UNCONNECTED_MESSAGE, data: cip }]),
  }),
});

const counterReply = (value: number): Uint8Array =>
  encodeCipReply({
    service: 0xcc,
    reserved: 0,
    generalStatus: 0,
    extendedStatus: new Uint8Array(0),
    data: Uint8Array.from([0xc3, 0x00, value, 0x00]),
  });

const readTagRequest = {
  service: CipService.READ_TAG,
  path: Uint8Array.from([0x91, 0x02, 0x41, 0x42]),
  data: Uint8Array.from([0x01, 0x00]),
};

describe('EipSession', () => {
  describe('open', () => {
    it('should register with options 01 00 00 00 and keep the returned handle', async () => {
      const transport = new ScriptedTransport(controller());
      const session = new EipSession(transport);

      expect(await session.open()).toBe(HANDLE);
      expect(session.handle).toBe(HANDLE);
      expect(session.isOpen).toBe(true);
      expect(transport.sent[0].command).toBe(EncapsulationCommand.REGISTER_SESSION);
      expect(transport.sent[0].sessionHandle).toBe(0);
      expect(transport.sent[0].payload).toEqual(Uint8Array.from([0x01, 0x00, 0x00, 0x00]));
    });

    it('should fail on a zero handle and disconnect the transport', async () => {
      const transport = new ScriptedTransport(request => ({ ...request, sessionHandle: 0 }));
      const session = new EipSession(transport);

      await expect(session.open()).rejects.toThrow(EipSessionError);
      expect(transport.disconnects).toBe(1);
      expect(session.handle).toBe(0);
    });

    it('should reject a reply with a different sender context and flush the transport', async () => {
      const transport = new ScriptedTransport(request => ({
        ...request,
        sessionHandle: HANDLE,
        senderContext: new Uint8Array(8).fill(0xee),
      }));

      await expect(new EipSession(transport).open()).rejects.toThrow(
        EipSenderContextMismatchError
      );
      expect(transport.flushes).toBe(1);
    });

    it('should keep the registration error when disconnect fails too', async () => {
      const transport = new ScriptedTransport(request => ({ ...request, sessionHandle: 0 }));
      transport.disconnect = async () => {
        throw new EipTimeoutError('socket stuck');
      };

      await expect(new EipSession(transport).open()).rejects.toThrow(EipSessionError);
    });

    it('should reject a reply to a different command', async () => {
      const transport = new ScriptedTransport(request => ({
        ...request,
        command: EncapsulationCommand.LIST_IDENTITY,
        sessionHandle: HANDLE,
      }));

      await expect(new EipSession(transport).open()).rejects.toThrow(EipUnexpectedCommandError);
    });

    it('should raise the encapsulation status of the reply', async () => {
      const transport = new ScriptedTransport(request => ({ ...request, status: 0x69 }));

      await expect(new EipSession(transport).open()).rejects.toThrow(EipEncapsulationStatusError);
    });

    it('should raise EipTimeoutError when no reply arrives', async () => {
      const transport = new ScriptedTransport(() => null);

      await expect(new EipSession(transport, { timeout: 10 }).open()).rejects.toThrow(
        EipTimeoutError
      );
    });
  });

  describe('sendRrData', () => {
    it('should wrap the request in the session and return the CIP reply', async () => {
      const transport = new ScriptedTransport(
        controller(request =>
          rrReply(
            request,
            encodeCipReply({
              service: 0xcc,
              reserved: 0,
              generalStatus: 0,
              extendedStatus: new Uint8Array(0),
              data: Uint8Array.from([0xc3, 0x00, 0x2a, 0x00]),
            })
          )
        )
      );
      const session = new EipSession(transport, { operationTimeout: 8 });
      await session.open();

      const response = await session.readTag(readTagRequest.path);

      const sent = transport.sent[1];
      expect(sent.command).toBe(EncapsulationCommand.SEND_RR_DATA);
      expect(sent.sessionHandle).toBe(HANDLE);
      expect(Array.from(sent.payload.subarray(0, 6))).toEqual([0, 0, 0, 0, 0x08, 0x00]);
      expect(response.dataType).toBe(0xc3);
      expect(response.data).toEqual(Uint8Array.from([0x2a, 0x00]));
    });

    it('should skip a late reply to a request that timed out', async () => {
      let calls = 0;
      const transport = new ScriptedTransport(
        controller(request => {
          calls++;
          return calls === 1 ? null : rrReply(request, counterReply(calls));
        })
      );
      const session = new EipSession(transport);
      await session.open();

      await expect(session.readTag(readTagRequest.path)).rejects.toThrow(EipTimeoutError);
      transport.deliver(rrReply(transport.sent[1], counterReply(1)));

      expect((await session.readTag(readTagRequest.path)).data).toEqual(Uint8Array.from([2, 0]));
      expect((await session.readTag(readTagRequest.path)).data).toEqual(Uint8Array.from([3, 0]));
    });

    it('should reject a second copy of a late reply', async () => {
      let calls = 0;
      const transport = new ScriptedTransport(
        controller(request => {
          calls++;
          return calls === 1 ? null : rrReply(request, counterReply(calls));
        })
      );
      const session = new EipSession(transport);
      await session.open();
      await expect(session.readTag(readTagRequest.path)).rejects.toThrow(EipTimeoutError);
      const late = rrReply(transport.sent[1], counterReply(1));
      transport.deliver(late);
      transport.deliver(late);

      await expect(session.readTag(readTagRequest.path)).rejects.toThrow(
        EipSenderContextMismatchError
      );
    });

    it('should need a registered session', async () => {
      const session = new EipSession(new ScriptedTransport(controller()));

      await expect(session.sendRrData(readTagRequest)).rejects.toThrow(EipSessionError);
    });

    it('should require the unconnected data item at index 1', async () => {
      const transport = new ScriptedTransport(
        controller(request => ({
          ...request,
          payload: encodeCommandSpecificData({
            interfaceHandle: 0,
            timeout: 0,
            packet: encodeCommonPacketFormat([{ typeId: 0x00b1, data: Uint8Array.from([0xcc]) }]),
          }),
        }))
      );
      const session = new EipSession(transport);
      await session.open();

      await expect(session.sendRrData(readTagRequest)).rejects.toThrow(EipMissingItemError);
    });

    it('should count a CIP error status apart from failed exchanges', async () => {
      const diagnostics = new Diagnostics();
      const transport = new ScriptedTransport(
        controller(request =>
          rrReply(
            request,
            encodeCipReply({
              service: 0xcc,
              reserved: 0,
              generalStatus: 0x05,
              extendedStatus: new Uint8Array(0),
              data: new Uint8Array(0),
            })
          )
        )
      );
      const session = new EipSession(transport, { diagnostics });
      await session.open();

      await expect(session.execute(readTagRequest)).rejects.toThrow(CipStatusError);

      const stats = diagnostics.getStats();
      expect(stats.totalRequests).toBe(2);
      expect(stats.successfulResponses).toBe(2);
      expect(stats.errorResponses).toBe(0);
      expect(stats.cipStatusErrors).toBe(1);
      expect(stats.statusCodeCounts).toEqual({ 5: 1 });
      expect(stats.serviceCallCounts).toEqual({ [CipService.READ_TAG]: 1 });
    });
  });

  describe('close', () => {
    it('should send Unregister Session without waiting and disconnect', async () => {
      const transport = new ScriptedTransport(controller());
      const session = new EipSession(transport);
      await session.open();

      await session.close();

      expect(transport.sent.map(message => message.command)).toEqual([
        EncapsulationCommand.REGISTER_SESSION,
        EncapsulationCommand.UNREGISTER_SESSION,
      ]);
      expect(transport.sent[1].sessionHandle).toBe(HANDLE);
      expect(transport.disconnects).toBe(1);
      expect(session.handle).toBe(0);
    });

    it('should disconnect even when unregistering fails', async () => {
      const transport = new ScriptedTransport(controller());
      const session = new EipSession(transport);
      await session.open();
      transport.send = async () => {
        throw new EipTimeoutError('write stalled');
      };

      await expect(session.close()).rejects.toThrow(EipTimeoutError);
      expect(transport.disconnects).toBe(1);
      expect(session.handle).toBe(0);
    });
  });

  describe('list commands', () => {
    it('should connect the transport without registering a session', async () => {
      const transport = new ScriptedTransport(request => ({
        ...request,
        payload: encodeCommonPacketFormat([], { nullAddress: false }),
      }));
      const session = new EipSession(transport);

      expect(await session.listIdentity()).toEqual([]);
      expect(transport.connects).toBe(1);
      expect(transport.sent[0].command).toBe(EncapsulationCommand.LIST_IDENTITY);
      expect(session.handle).toBe(0);
    });
  });
});
