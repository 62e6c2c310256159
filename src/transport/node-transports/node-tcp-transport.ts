// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'net';
import { Mutex } from 'async-mutex';
import { EXPLICIT_MESSAGE_PORT } from '../../constants/constants.js';
import { extractFrame } from '../../framers/encapsulation.js';
import { concatUint8Arrays, allocUint8Array, toHex } from '../../utils/utils.js';
import { defaultLogger } from '../../logger.js';
import {
  EipConnectionClosedError,
  EipIoError,
  EipNotConnectedError,
  EipTimeoutError,
} from '../../errors.js';
import type { EipTransport, NodeTcpTransportOptions } from '../../types/eip-types.js';

const POLL_INTERVAL = 10;

const logger = defaultLogger.createLogger('NodeTcpTransport');

/**
 * TCP-транспорт для explicit messaging.
 * Поток байтов накапливается в буфере, receiveFrame отдаёт ровно один кадр инкапсуляции.
 * Переподключения нет: обрыв - терминальная ошибка текущей операции.
 */
class NodeTcpTransport implements EipTransport {
  public isOpen: boolean = false;
  private host: string;
  private port: number;
  private options: Required<Omit<NodeTcpTransportOptions, 'port'>>;
  private socket: net.Socket | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);

  private _isConnecting: boolean = false;
  private _closedError: EipIoError | null = null;
  private _operationMutex: Mutex = new Mutex();

  constructor(host: string, options: NodeTcpTransportOptions = {}) {
    this.host = host;
    this.port = options.port ?? EXPLICIT_MESSAGE_PORT;
    this.options = {
      connectTimeout: options.connectTimeout || 5000,
      readTimeout: options.readTimeout || 2000,
      maxBufferSize: options.maxBufferSize || 65536,
    };
  }

  public async connect(): Promise<void> {
    if (this._isConnecting || this.isOpen) return;
    this._isConnecting = true;
    this._closedError = null;
    this.readBuffer = allocUint8Array(0);

    return new Promise((resolve, reject) => {
      logger.info(`Connecting to ${this.host}:${this.port}...`);

      const socket = net.connect({ host: this.host, port: this.port }, () => {
        this.isOpen = true;
        this._isConnecting = false;
        socket.setNoDelay(true); // Отключаем задержки пакетов
        socket.setTimeout(0);
        logger.info(`Connected to ${this.host}:${this.port}`);
        resolve();
      });
      this.socket = socket;

      socket.on('data', (data: Buffer) => this._onData(data));

      socket.on('error', err => {
        if (this._isConnecting) {
          this._isConnecting = false;
          reject(new EipIoError(`Connection to ${this.host}:${this.port} failed: ${err.message}`));
        }
        this._onError(err);
      });

      socket.on('close', () => this._onClose());
      socket.setTimeout(this.options.connectTimeout);
      socket.on('timeout', () => {
        if (this._isConnecting) {
          this._isConnecting = false;
          socket.destroy();
          reject(new EipTimeoutError('TCP connection timeout'));
        }
      });
    });
  }

  private _onData(data: Buffer): void {
    const chunk = new Uint8Array(data);
    logger.trace(`Received ${chunk.length} bytes: ${toHex(chunk)}`);
    if (this.readBuffer.length + chunk.length > this.options.maxBufferSize) {
      this._closedError = new EipIoError(
        `Read buffer overflow: more than ${this.options.maxBufferSize} bytes pending`
      );
      this.socket?.destroy();
      return;
    }
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
  }

  private _onError(err: Error): void {
    logger.error(`Socket error: ${err.message}`);
    this._closedError ??= new EipConnectionClosedError(`Connection reset: ${err.message}`);
  }

  private _onClose(): void {
    const wasOpen = this.isOpen;
    this.isOpen = false;
    this.socket = null;
    this._closedError ??= new EipConnectionClosedError();
    if (wasOpen) {
      logger.warn(`Connection closed for ${this.host}:${this.port}`);
    }
  }

  public async send(frame: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!this.isOpen || !socket) throw new EipNotConnectedError();
    const release = await this._operationMutex.acquire();
    try {
      logger.trace(`Sending ${frame.length} bytes: ${toHex(frame)}`);
      await new Promise<void>((resolve, reject) => {
        socket.write(frame, err => {
          if (err) reject(new EipIoError(`Write failed: ${err.message}`));
          else resolve();
        });
      });
    } finally {
      release();
    }
  }

  /**
   * Ждёт один полный кадр инкапсуляции
   * @throws EipTimeoutError - если кадр не пришёл за timeout мс
   * @throws EipConnectionClosedError - если соединение закрылось
   */
  public async receiveFrame(timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    const start = Date.now();
    const release = await this._operationMutex.acquire();
    try {
      return await new Promise<Uint8Array>((resolve, reject) => {
        const check = (): void => {
          const extracted = extractFrame(this.readBuffer);
          if (extracted) {
            this.readBuffer = extracted.rest;
            resolve(extracted.frame);
            return;
          }
          if (this._closedError) {
            reject(this._closedError);
            return;
          }
          if (!this.isOpen) {
            reject(new EipNotConnectedError());
            return;
          }
          if (Date.now() - start > timeout) {
            reject(new EipTimeoutError(`No reply within ${timeout} ms`));
            return;
          }
          setTimeout(check, POLL_INTERVAL);
        };
        check();
      });
    } finally {
      release();
    }
  }

  public async flush(): Promise<void> {
    if (this.readBuffer.length > 0) {
      logger.debug(`Flushing ${this.readBuffer.length} buffered bytes`);
    }
    this.readBuffer = allocUint8Array(0);
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      this.isOpen = false;
      return;
    }
    if (!socket.destroyed) {
      await new Promise<void>(resolve => {
        socket.end(() => {
          socket.destroy();
          resolve();
        });
      });
    }
    this.isOpen = false;
    this.socket = null;
    this.readBuffer = allocUint8Array(0);
  }
}

export { NodeTcpTransport };
