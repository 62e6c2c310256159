// src/transport/emulator-transport.ts

import { EipNotConnectedError, EipTimeoutError } from '../errors.js';
import { defaultLogger } from '../logger.js';
import type { ControllerEmulatorLike, EipTransport } from '../types/eip-types.js';
import { toHex } from '../utils/utils.js';

const logger = defaultLogger.createLogger('EmulatorTransport');

/**
 * Транспорт без сети: кадры уходят в эмулятор контроллера в том же процессе.
 * Ответ эмулятора ставится в очередь и отдаётся следующим receiveFrame.
 */
class EmulatorTransport implements EipTransport {
  private emulator: ControllerEmulatorLike;
  private pending: Uint8Array[] = [];

  constructor(emulator: ControllerEmulatorLike) {
    this.emulator = emulator;
  }

  get isOpen(): boolean {
    return this.emulator.connected;
  }

  async connect(): Promise<void> {
    this.emulator.connect();
    this.pending = [];
  }

  async disconnect(): Promise<void> {
    this.emulator.disconnect();
    this.pending = [];
  }

  async flush(): Promise<void> {
    this.pending = [];
  }

  async send(frame: Uint8Array): Promise<void> {
    if (!this.isOpen) throw new EipNotConnectedError();
    logger.trace(`Sending ${frame.length} bytes: ${toHex(frame)}`);
    const reply = this.emulator.handleFrame(frame);
    if (reply) this.pending.push(reply);
  }

  /**
   * Ответ либо уже в очереди, либо его не будет: ожидания нет
   * @throws EipTimeoutError - если очередь пуста
   */
  async receiveFrame(timeout: number = 0): Promise<Uint8Array> {
    const frame = this.pending.shift();
    if (!frame) {
      throw new EipTimeoutError(`No reply within ${timeout} ms`);
    }
    logger.trace(`Received ${frame.length} bytes: ${toHex(frame)}`);
    return frame;
  }
}

export { EmulatorTransport };
