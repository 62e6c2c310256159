// src/client.ts

import { Mutex } from 'async-mutex';
import { MAX_UNCONNECTED_MESSAGE_SIZE } from './constants/constants.js';
import { EipConfigError, EipNameNotFoundError } from './errors.js';
import { defaultLogger } from './logger.js';
import { VariableRegistry } from './registry/variable-registry.js';
import {
  DEFAULT_MAX_CHAIN_LENGTH,
  DEFAULT_MAX_NESTING_DEPTH,
  TypeResolver,
} from './resolver/type-resolver.js';
import { EipSession } from './session.js';
import { SegmentedTransfer } from './transfer/segmented-transfer.js';
import type {
  CipValue,
  DiagnosticsStats,
  EipClientOptions,
  EipTransport,
  IdentityItem,
  LogContext,
  LogLevel,
  ServiceItem,
  VariableEntry,
} from './types/eip-types.js';
import { Diagnostics } from './utils/diagnostics.js';

const MIN_MESSAGE_SIZE = 16;
const MAX_MESSAGE_SIZE = 65511;
const LOG_LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const logger = defaultLogger.createLogger('EipClient');

function positiveInteger(name: string, value: number | undefined, fallback: number): number {
  const resolved = value ?? fallback;
  if (!Number.isInteger(resolved) || resolved <= 0) {
    throw new EipConfigError(`${name} must be a positive integer, got ${resolved}`);
  }
  return resolved;
}

/**
 * Клиент переменных контроллера поверх EtherNet/IP.
 * Один клиент - одна сессия - один транспорт.
 */
class EipClient {
  private readonly session: EipSession;
  private readonly resolver: TypeResolver;
  private readonly transfer: SegmentedTransfer;
  private readonly diagnostics: Diagnostics | null;
  private readonly _discoveryMutex: Mutex = new Mutex();
  private registry: VariableRegistry | null = null;

  constructor(transport: EipTransport, options: EipClientOptions = {}) {
    const timeout = positiveInteger('timeout', options.timeout, 2000);
    const operationTimeout = positiveInteger('operationTimeout', options.operationTimeout, 8);
    if (operationTimeout > 0xffff) {
      throw new EipConfigError(`operationTimeout must fit in 16 bits, got ${operationTimeout}`);
    }
    const maxMessageSize = positiveInteger(
      'maxMessageSize',
      options.maxMessageSize,
      MAX_UNCONNECTED_MESSAGE_SIZE
    );
    if (maxMessageSize < MIN_MESSAGE_SIZE || maxMessageSize > MAX_MESSAGE_SIZE) {
      throw new EipConfigError(
        `maxMessageSize must be between ${MIN_MESSAGE_SIZE} and ${MAX_MESSAGE_SIZE}, got ${maxMessageSize}`
      );
    }
    const maxChainLength = positiveInteger(
      'maxChainLength',
      options.maxChainLength,
      DEFAULT_MAX_CHAIN_LENGTH
    );
    const maxNestingDepth = positiveInteger(
      'maxNestingDepth',
      options.maxNestingDepth,
      DEFAULT_MAX_NESTING_DEPTH
    );
    if (options.logLevel !== undefined && !LOG_LEVELS.includes(options.logLevel)) {
      throw new EipConfigError(`Unknown log level: ${String(options.logLevel)}`);
    }

    this.diagnostics = options.diagnostics ? new Diagnostics('EipClient') : null;
    this.session = new EipSession(transport, {
      timeout,
      operationTimeout,
      diagnostics: this.diagnostics,
    });
    this.resolver = new TypeResolver(this.session, { maxChainLength, maxNestingDepth });
    this.transfer = new SegmentedTransfer(this.session, { maxMessageSize });

    if (options.logLevel) this.enableLogger(options.logLevel);
  }

  /**
   * Enables the library logger
   * @param level - Logging level
   */
  enableLogger(level: LogLevel = 'info'): void {
    defaultLogger.setLevel(level);
  }

  /**
   * Disables the library logger (sets the highest level - error)
   */
  disableLogger(): void {
    defaultLogger.setLevel('error');
  }

  setLoggerContext(context: LogContext): void {
    defaultLogger.addGlobalContext(context);
  }

  get isConnected(): boolean {
    return this.session.isOpen;
  }

  /** Последний снимок переменных, null до первого discover() */
  get variables(): VariableRegistry | null {
    return this.registry;
  }

  /**
   * Подключает транспорт и регистрирует сессию
   * @returns session handle
   */
  async connect(): Promise<number> {
    const handle = await this.session.open();
    defaultLogger.addGlobalContext({ session: handle });
    logger.info('Connected', { session: handle });
    return handle;
  }

  /**
   * Обходит объектную модель контроллера и строит новый снимок переменных
   */
  async discover(): Promise<VariableRegistry> {
    return this._discoveryMutex.runExclusive(async () => {
      const result = await this.resolver.discover();
      this.registry = VariableRegistry.fromDiscovery(result);
      return this.registry;
    });
  }

  /**
   * Снимок переменных; при первом обращении запускает discover()
   */
  private async ensureRegistry(): Promise<VariableRegistry> {
    if (this.registry) return this.registry;
    return this._discoveryMutex.runExclusive(async () => {
      if (this.registry) return this.registry;
      this.registry = VariableRegistry.fromDiscovery(await this.resolver.discover());
      return this.registry;
    });
  }

  /**
   * @throws EipNameNotFoundError - если переменной нет в снимке
   * @throws EipUnresolvedTypeError - если её тип не разрешён
   */
  async readVariable(name: string): Promise<CipValue> {
    const entry = (await this.ensureRegistry()).get(name);
    const startTime = Date.now();
    const value = await this.transfer.readValue(name, entry.type);
    logger.debug('Variable read', {
      variable: name,
      size: entry.type.size,
      responseTime: Date.now() - startTime,
    });
    return value;
  }

  async writeVariable(name: string, value: CipValue): Promise<void> {
    const entry = (await this.ensureRegistry()).get(name);
    const startTime = Date.now();
    await this.transfer.writeValue(name, entry.type, value);
    logger.debug('Variable written', {
      variable: name,
      size: entry.type.size,
      responseTime: Date.now() - startTime,
    });
  }

  /**
   * Заново разрешает тип одной переменной и подменяет её запись в снимке
   */
  async refreshVariable(name: string): Promise<VariableEntry> {
    const registry = await this.ensureRegistry();
    let instanceId = registry.instanceIdOf(name);
    if (instanceId === null) {
      const index = (await this.resolver.listVariableNames()).indexOf(name);
      if (index === -1) throw new EipNameNotFoundError(name);
      instanceId = index + 1;
    }

    const entry: VariableEntry = {
      name,
      instanceId,
      type: await this.resolver.resolveVariable(instanceId),
    };
    this.registry = registry.withEntry(entry);
    logger.info('Variable refreshed', { variable: name });
    return entry;
  }

  async listIdentity(): Promise<IdentityItem[]> {
    return this.session.listIdentity();
  }

  async listServices(): Promise<ServiceItem[]> {
    return this.session.listServices();
  }

  /**
   * Снимает регистрацию сессии и закрывает транспорт
   */
  async close(): Promise<void> {
    await this.session.close();
    logger.info('Closed');
  }

  /**
   * @returns null, если диагностика выключена в опциях
   */
  getDiagnostics(): DiagnosticsStats | null {
    return this.diagnostics?.getStats() ?? null;
  }

  resetDiagnostics(): void {
    this.diagnostics?.reset();
  }
}

export { EipClient };
