import { describe, it, expect, afterEach } from 'vitest';
import * as net from 'net';
import { NodeTcpTransport } from '../src/transport/node-transports/node-tcp-transport.js';
import { ControllerEmulator } from '../src/controller-emulator/controller-emulator.js';
import { EipSession } from '../src/session.js';
import { variablePath } from '../src/cip/path-builder.js';
import { CipDataType, EncapsulationCommand } from '../src/constants/constants.js';
import {
  decodeEncapsulation,
  encodeEncapsulation,
  extractFrame,
} from '../src/framers/encapsulation.js';
import { EipConnectionClosedError, EipIoError, EipTimeoutError } from '../src/errors.js';
import { concatUint8Arrays } from '../src/utils/utils.js';

interface LocalServer {
  port: number;
  close(): Promise<void>;
}

async function startServer(onConnection: (socket: net.Socket) => void): Promise<LocalServer> {
  const sockets = new Set<net.Socket>();
  const server = net.createServer(socket => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    socket.on('error', () => undefined);
    onConnection(socket);
  });
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server has no TCP address');
  }
  return {
    port: address.port,
    close: () =>
      new Promise<void>(resolve => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      }),
  };
}

/** Отвечает через эмулятор; delayFor задаёт задержку ответа на n-й SendRRData */
function emulatorConnection(
  emulator: ControllerEmulator,
  delayFor: (index: number) => number
): (socket: net.Socket) => void {
  return socket => {
    emulator.connect();
    let buffer: Uint8Array = new Uint8Array(0);
    let rrIndex = 0;
    socket.on('data', (data: Buffer) => {
      buffer = concatUint8Arrays([buffer, new Uint8Array(data)]);
      for (let extracted = extractFrame(buffer); extracted; extracted = extractFrame(buffer)) {
        buffer = extracted.rest;
        const request = extracted.frame;
        const reply = emulator.handleFrame(request);
        if (!reply) continue;
        const delay =
          decodeEncapsulation(request).command === EncapsulationCommand.SEND_RR_DATA
            ? delayFor(rrIndex++)
            : 0;
        if (delay > 0) setTimeout(() => socket.write(reply), delay);
        else socket.write(reply);
      }
    });
  };
}

const replyFrame = (sessionHandle: number): Uint8Array =>
  encodeEncapsulation({
    command: EncapsulationCommand.REGISTER_SESSION,
    sessionHandle,
    status: 0,
    senderContext: new Uint8Array(8),
    options: 0,
    payload: Uint8Array.from([0x01, 0x00, 0x00, 0x00]),
  });

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

describe('NodeTcpTransport', () => {
  let server: LocalServer | null = null;
  let transport: NodeTcpTransport | null = null;

  async function connect(
    onConnection: (socket: net.Socket) => void,
    maxBufferSize?: number
  ): Promise<NodeTcpTransport> {
    server = await startServer(onConnection);
    transport = new NodeTcpTransport('127.0.0.1', { port: server.port, maxBufferSize });
    await transport.connect();
    return transport;
  }

  afterEach(async () => {
    await transport?.disconnect();
    await server?.close();
    transport = null;
    server = null;
  });

  it('should reassemble a frame split across TCP chunks', async () => {
    const frame = replyFrame(1);
    const client = await connect(socket => {
      socket.write(frame.subarray(0, 10));
      setTimeout(() => socket.write(frame.subarray(10)), 20);
    });

    expect(await client.receiveFrame(1000)).toEqual(frame);
  });

  it('should return two frames from one chunk one at a time', async () => {
    const client = await connect(socket => {
      socket.write(concatUint8Arrays([replyFrame(1), replyFrame(2)]));
    });

    expect(decodeEncapsulation(await client.receiveFrame(1000)).sessionHandle).toBe(1);
    expect(decodeEncapsulation(await client.receiveFrame(1000)).sessionHandle).toBe(2);
  });

  it('should raise EipTimeoutError when no frame arrives', async () => {
    const client = await connect(() => undefined);

    await expect(client.receiveFrame(30)).rejects.toThrow(EipTimeoutError);
    expect(client.isOpen).toBe(true);
  });

  it('should raise EipConnectionClosedError when the peer closes', async () => {
    const client = await connect(socket => socket.end());

    await expect(client.receiveFrame(1000)).rejects.toThrow(EipConnectionClosedError);
    expect(client.isOpen).toBe(false);
  });

  it('should close the connection when the read buffer overflows', async () => {
    const client = await connect(socket => socket.write(new Uint8Array(64).fill(0xff)), 16);

    const error = await client.receiveFrame(1000).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(EipIoError);
    expect(error).toHaveProperty('message', 'Read buffer overflow: more than 16 bytes pending');
  });

  it('should drop everything buffered on flush', async () => {
    const client = await connect(socket => socket.write(replyFrame(1)));
    await sleep(50);

    await client.flush();

    await expect(client.receiveFrame(30)).rejects.toThrow(EipTimeoutError);
  });

  it('should keep a session in step after a reply arrives too late', async () => {
    const emulator = new ControllerEmulator();
    emulator.addVariables([{ name: 'Counter', type: 'scalar', code: CipDataType.INT, value: 42 }]);
    const client = await connect(emulatorConnection(emulator, index => (index === 0 ? 150 : 0)));
    const session = new EipSession(client, { timeout: 50 });
    const path = variablePath('Counter');
    await session.open();

    await expect(session.readTag(path)).rejects.toThrow(EipTimeoutError);
    expect((await session.readTag(path)).data).toEqual(Uint8Array.from([0x2a, 0x00]));
    // the late reply is in the read buffer by now
    await sleep(150);
    expect((await session.readTag(path)).data).toEqual(Uint8Array.from([0x2a, 0x00]));

    await session.close();
  });
});
