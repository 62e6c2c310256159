// src/session.ts

import { Mutex } from 'async-mutex';
import {
  EncapsulationCommand,
  PacketItemType,
  REGISTER_SESSION_DATA,
} from './constants/constants.js';
import { assertCipSuccess, decodeCipReply, encodeCipRequest } from './cip/cip-message.js';
import {
  decodeCommonPacketFormat,
  encodeCommonPacketFormat,
} from './framers/common-packet-format.js';
import {
  decodeCommandSpecificData,
  decodeEncapsulation,
  encodeCommandSpecificData,
  encodeEncapsulation,
} from './framers/encapsulation.js';
import {
  CipStatusError,
  EipEncapsulationStatusError,
  EipFrameDecodeError,
  EipMissingItemError,
  EipSenderContextMismatchError,
  EipSessionError,
  EipTimeoutError,
  EipUnexpectedCommandError,
} from './errors.js';
import { defaultLogger } from './logger.js';
import { buildGetAttributeAllRequest } from './services/get-attribute-all.js';
import { parseIdentityItem } from './services/list-identity.js';
import { parseServiceItem } from './services/list-services.js';
import { buildReadTagRequest, parseReadTagResponse } from './services/read-tag.js';
import { buildWriteTagRequest } from './services/write-tag.js';
import type {
  AttributeReader,
  CipReply,
  CipRequest,
  EipTransport,
  EncapsulationMessage,
  IdentityItem,
  PacketItem,
  ReadTagResponse,
  ServiceItem,
  TagDataHeader,
  TagService,
} from './types/eip-types.js';
import type { Diagnostics } from './utils/diagnostics.js';
import { arraysEqual, SenderContextCounter, toHex } from './utils/utils.js';

const logger = defaultLogger.createLogger('EipSession');

/** Сколько sender context запросов с истёкшим ожиданием помнить */
const MAX_ABANDONED_CONTEXTS = 16;

export interface EipSessionOptions {
  /** Ожидание ответного кадра, мс */
  timeout?: number;
  /** Таймаут операции в command specific data, секунды */
  operationTimeout?: number;
  diagnostics?: Diagnostics | null;
}

/**
 * Сессия EtherNet/IP поверх одного транспорта.
 * Все обмены сериализуются мьютексом: в каждый момент не больше одного запроса.
 */
export class EipSession implements TagService, AttributeReader {
  private readonly transport: EipTransport;
  private readonly timeout: number;
  private readonly operationTimeout: number;
  private readonly diagnostics: Diagnostics | null;
  private readonly contexts = new SenderContextCounter();
  private readonly mutex = new Mutex();
  /** Sender context запросов, ответ на которые не дождались (hex) */
  private readonly abandoned = new Set<string>();
  private sessionHandle: number = 0;

  constructor(transport: EipTransport, options: EipSessionOptions = {}) {
    this.transport = transport;
    this.timeout = options.timeout ?? 2000;
    this.operationTimeout = options.operationTimeout ?? 8;
    this.diagnostics = options.diagnostics ?? null;
  }

  /** Handle, выданный контроллером при регистрации (0 - сессии нет) */
  get handle(): number {
    return this.sessionHandle;
  }

  get isOpen(): boolean {
    return this.sessionHandle !== 0 && this.transport.isOpen;
  }

  /**
   * Подключает транспорт и регистрирует сессию
   * @returns session handle
   * @throws EipSessionError - если контроллер вернул нулевой handle
   */
  async open(): Promise<number> {
    if (this.isOpen) return this.sessionHandle;

    if (!this.transport.isOpen) {
      await this.transport.connect();
    }
    try {
      const reply = await this.exchange(
        EncapsulationCommand.REGISTER_SESSION,
        REGISTER_SESSION_DATA
      );
      if (reply.sessionHandle === 0) {
        throw new EipSessionError('Controller returned a zero session handle');
      }
      this.sessionHandle = reply.sessionHandle;
      logger.info('Session registered', { session: this.sessionHandle });
      return this.sessionHandle;
    } catch (err: unknown) {
      try {
        await this.transport.disconnect();
      } catch (disconnectErr: unknown) {
        logger.warn('Failed to disconnect after a failed registration', {
          reason: disconnectErr instanceof Error ? disconnectErr.message : String(disconnectErr),
        });
      }
      throw err;
    }
  }

  /**
   * Снимает регистрацию сессии и всегда отключает транспорт
   */
  async close(): Promise<void> {
    const handle = this.sessionHandle;
    try {
      if (handle !== 0 && this.transport.isOpen) {
        // Контроллер не отвечает на Unregister Session
        await this.post(EncapsulationCommand.UNREGISTER_SESSION, new Uint8Array(0));
        logger.info('Session unregistered', { session: handle });
      }
    } finally {
      this.sessionHandle = 0;
      await this.transport.disconnect();
    }
  }

  /**
   * SendRRData: CIP -> CPF -> command specific data -> инкапсуляция.
   * Ненулевой general status не проверяется.
   */
  async sendRrData(request: CipRequest): Promise<CipReply> {
    this.assertSession();

    const packet = encodeCommonPacketFormat([
      { typeId: PacketItemType.UNCONNECTED_MESSAGE, data: encodeCipRequest(request) },
    ]);
    const payload = encodeCommandSpecificData({
      interfaceHandle: 0,
      timeout: this.operationTimeout,
      packet,
    });

    const reply = await this.exchange(EncapsulationCommand.SEND_RR_DATA, payload, request.service);
    const items = decodeCommonPacketFormat(decodeCommandSpecificData(reply.payload).packet);
    const dataItem = items[1];
    if (!dataItem || dataItem.typeId !== PacketItemType.UNCONNECTED_MESSAGE) {
      throw new EipMissingItemError(PacketItemType.UNCONNECTED_MESSAGE, items.length);
    }
    return decodeCipReply(dataItem.data);
  }

  /**
   * SendRRData с проверкой general status
   * @throws CipStatusError
   */
  async execute(request: CipRequest): Promise<CipReply> {
    const reply = await this.sendRrData(request);
    try {
      return assertCipSuccess(reply, request.service);
    } catch (err: unknown) {
      if (err instanceof CipStatusError) this.diagnostics?.recordCipStatus(err);
      throw err;
    }
  }

  async readTag(path: Uint8Array): Promise<ReadTagResponse> {
    const reply = await this.execute(buildReadTagRequest(path));
    return parseReadTagResponse(reply.data);
  }

  async writeTag(path: Uint8Array, header: TagDataHeader, data: Uint8Array): Promise<void> {
    await this.execute(buildWriteTagRequest(path, header, data));
  }

  async getAttributeAll(classId: number, instanceId: number): Promise<Uint8Array> {
    const reply = await this.execute(buildGetAttributeAllRequest(classId, instanceId));
    return reply.data;
  }

  /**
   * List Identity: не требует регистрации сессии
   */
  async listIdentity(): Promise<IdentityItem[]> {
    const items = await this.listCommand(EncapsulationCommand.LIST_IDENTITY);
    return items
      .filter(item => item.typeId === PacketItemType.CIP_IDENTITY)
      .map(item => parseIdentityItem(item.data));
  }

  async listServices(): Promise<ServiceItem[]> {
    const items = await this.listCommand(EncapsulationCommand.LIST_SERVICES);
    return items
      .filter(item => item.typeId === PacketItemType.LIST_SERVICES_RESPONSE)
      .map(item => parseServiceItem(item));
  }

  async listInterfaces(): Promise<PacketItem[]> {
    return this.listCommand(EncapsulationCommand.LIST_INTERFACES);
  }

  private async listCommand(command: EncapsulationCommand): Promise<PacketItem[]> {
    if (!this.transport.isOpen) {
      await this.transport.connect();
    }
    const reply = await this.exchange(command, new Uint8Array(0));
    return reply.payload.length === 0 ? [] : decodeCommonPacketFormat(reply.payload);
  }

  private assertSession(): void {
    if (this.sessionHandle === 0) {
      throw new EipSessionError('Session is not registered');
    }
  }

  private buildFrame(command: number, payload: Uint8Array, senderContext: Uint8Array): Uint8Array {
    return encodeEncapsulation({
      command,
      sessionHandle: this.sessionHandle,
      status: 0,
      senderContext,
      options: 0,
      payload,
    });
  }

  /**
   * Отправка без ожидания ответа
   */
  private async post(command: number, payload: Uint8Array): Promise<void> {
    const release = await this.mutex.acquire();
    try {
      const frame = this.buildFrame(command, payload, this.contexts.next());
      this.diagnostics?.recordRequest(frame.length);
      await this.transport.send(frame);
    } finally {
      release();
    }
  }

  /**
   * Один обмен запрос/ответ. Ответ должен повторять команду и sender context.
   * Опоздавший ответ на запрос с истёкшим таймаутом пропускается.
   * @throws EipEncapsulationStatusError - при ненулевом статусе в заголовке
   */
  private async exchange(
    command: number,
    payload: Uint8Array,
    service?: number
  ): Promise<EncapsulationMessage> {
    const release = await this.mutex.acquire();
    const startTime = Date.now();
    const senderContext = this.contexts.next();
    try {
      const frame = this.buildFrame(command, payload, senderContext);
      this.diagnostics?.recordRequest(frame.length, service);

      await this.transport.send(frame);
      const { reply, size } = await this.receiveReply(senderContext, startTime);

      if (reply.command !== command) {
        throw new EipUnexpectedCommandError(reply.command, command);
      }
      if (reply.status !== 0) {
        throw new EipEncapsulationStatusError(command, reply.status);
      }

      const responseTime = Date.now() - startTime;
      this.diagnostics?.recordSuccess(responseTime, size);
      logger.debug('Exchange complete', {
        session: this.sessionHandle,
        command,
        service,
        responseTime,
      });
      return reply;
    } catch (err: unknown) {
      if (err instanceof EipTimeoutError) {
        this.abandon(senderContext);
      } else if (err instanceof EipFrameDecodeError) {
        await this.flushTransport();
      }
      if (err instanceof Error) {
        this.diagnostics?.recordError(err, Date.now() - startTime);
        logger.error(err.message, { session: this.sessionHandle, command, service });
      }
      throw err;
    } finally {
      release();
    }
  }

  /**
   * Читает кадры до ответа с нужным sender context в пределах timeout.
   * Кадры с контекстом брошенного запроса отбрасываются, любой другой - ошибка.
   * @throws EipSenderContextMismatchError
   */
  private async receiveReply(
    senderContext: Uint8Array,
    startTime: number
  ): Promise<{ reply: EncapsulationMessage; size: number }> {
    for (;;) {
      const remaining = Math.max(this.timeout - (Date.now() - startTime), 0);
      const raw = await this.transport.receiveFrame(remaining);
      const reply = decodeEncapsulation(raw);
      if (arraysEqual(reply.senderContext, senderContext)) {
        return { reply, size: raw.length };
      }
      if (!this.abandoned.delete(toHex(reply.senderContext))) {
        throw new EipSenderContextMismatchError(reply.senderContext, senderContext);
      }
      logger.warn('Discarded a late reply', {
        session: this.sessionHandle,
        command: reply.command,
      });
    }
  }

  private abandon(senderContext: Uint8Array): void {
    this.abandoned.add(toHex(senderContext));
    if (this.abandoned.size > MAX_ABANDONED_CONTEXTS) {
      const [oldest] = this.abandoned;
      this.abandoned.delete(oldest);
    }
  }

  /**
   * После ошибки разбора граница кадров в потоке недостоверна
   */
  private async flushTransport(): Promise<void> {
    if (!this.transport.flush) return;
    try {
      await this.transport.flush();
      logger.debug('Transport flushed after error', { session: this.sessionHandle });
    } catch (flushErr: unknown) {
      logger.warn('Failed to flush transport after error', {
        session: this.sessionHandle,
        reason: flushErr instanceof Error ? flushErr.message : String(flushErr),
      });
    }
  }
}
