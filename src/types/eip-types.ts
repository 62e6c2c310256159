// src/types/eip-types.ts

// !=============================================================================
// ! Кадры инкапсуляции и Common Packet Format
// !=============================================================================

/** Сообщение инкапсуляции. Поле length не хранится: оно всегда равно payload.length */
export interface EncapsulationMessage {
  command: number;
  sessionHandle: number;
  status: number;
  /** 8 байт, контроллер возвращает их без изменений */
  senderContext: Uint8Array;
  options: number;
  payload: Uint8Array;
}

/** Command specific data для SendRRData */
export interface CommandSpecificData {
  interfaceHandle: number;
  /** Таймаут операции в секундах */
  timeout: number;
  packet: Uint8Array;
}

/** Элемент CPF (data and address item) */
export interface PacketItem {
  typeId: number;
  data: Uint8Array;
}

// !=============================================================================
// ! CIP
// !=============================================================================

export interface CipRequest {
  service: number;
  /** Путь, всегда чётной длины */
  path: Uint8Array;
  data: Uint8Array;
}

export interface CipReply {
  service: number;
  reserved: number;
  generalStatus: number;
  extendedStatus: Uint8Array;
  data: Uint8Array;
}

/** Заголовок типа в данных Read Tag / Write Tag */
export interface TagDataHeader {
  dataType: number;
  /** Дополнительная информация (например CRC структуры) */
  additionalInfo: Uint8Array;
}

export interface ReadTagResponse extends TagDataHeader {
  data: Uint8Array;
}

// !=============================================================================
// ! Дескрипторы типов
// !=============================================================================

interface DescriptorBase {
  /** Instance id объекта в модели контроллера (0, если его нет) */
  instanceId: number;
  /** Объявленный размер в байтах */
  size: number;
}

export interface ScalarDescriptor extends DescriptorBase {
  kind: 'scalar';
  code: number;
  width: number;
}

export interface StringDescriptor extends DescriptorBase {
  kind: 'string';
  maxSize: number;
}

export interface ArrayDimension {
  extent: number;
  start: number;
}

export interface ArrayDescriptor extends DescriptorBase {
  kind: 'array';
  elementType: CipTypeDescriptor;
  dimensions: ArrayDimension[];
}

export interface StructureMember {
  name: string;
  type: CipTypeDescriptor;
}

export interface StructureDescriptor extends DescriptorBase {
  kind: 'structure';
  typeName: string;
  crc: number;
  members: StructureMember[];
}

export interface AbbreviatedStructureDescriptor extends DescriptorBase {
  kind: 'abbreviated-structure';
}

export type CipTypeDescriptor =
  | ScalarDescriptor
  | StringDescriptor
  | ArrayDescriptor
  | StructureDescriptor
  | AbbreviatedStructureDescriptor;

export type CipTypeKind = CipTypeDescriptor['kind'];

/** Запись реестра переменных */
export interface VariableEntry {
  name: string;
  instanceId: number;
  type: CipTypeDescriptor;
}

/** Переменная, тип которой не удалось разрешить */
export interface UnresolvedVariable {
  name: string;
  instanceId: number;
  dataType: number;
  reason: string;
}

// !=============================================================================
// ! Значения переменных
// !=============================================================================

export type CipScalarValue = boolean | number | bigint;

/** Структуры передаются как сырые байты объявленного размера */
export type CipValue = CipScalarValue | string | Uint8Array | CipValue[];

// !=============================================================================
// ! Интерфейсы сервисов
// !=============================================================================

/** Чтение и запись тегов, используется SegmentedTransfer */
export interface TagService {
  readTag(path: Uint8Array): Promise<ReadTagResponse>;
  writeTag(path: Uint8Array, header: TagDataHeader, data: Uint8Array): Promise<void>;
}

/** Get Attribute All по логическому пути, возвращает reply data */
export interface AttributeReader {
  getAttributeAll(classId: number, instanceId: number): Promise<Uint8Array>;
}

// !=============================================================================
// ! List Identity / List Services
// !=============================================================================

export interface SocketAddress {
  family: number;
  port: number;
  address: string;
}

export interface IdentityItem {
  protocolVersion: number;
  socketAddress: SocketAddress;
  vendorId: number;
  deviceType: number;
  productCode: number;
  revision: { major: number; minor: number };
  status: number;
  serialNumber: number;
  productName: string;
  state: number;
}

export interface ServiceItem {
  typeId: number;
  protocolVersion: number;
  capabilityFlags: number;
  name: string;
}

// !=============================================================================
// ! Транспорт
// !=============================================================================

/** Транспорт, доставляющий ровно один кадр инкапсуляции за вызов receiveFrame */
export interface EipTransport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  send(frame: Uint8Array): Promise<void>;
  receiveFrame(timeout?: number): Promise<Uint8Array>;
  /** Сбрасывает всё, что принято, но ещё не прочитано */
  flush?(): Promise<void>;
}

export interface NodeTcpTransportOptions {
  port?: number;
  connectTimeout?: number;
  readTimeout?: number;
  maxBufferSize?: number;
}

export type TransportOptions =
  | ({ type: 'tcp'; host: string } & NodeTcpTransportOptions)
  | { type: 'emulator'; emulator: ControllerEmulatorLike };

/** Минимальный контракт эмулятора для EmulatorTransport */
export interface ControllerEmulatorLike {
  readonly connected: boolean;
  connect(): void;
  disconnect(): void;
  handleFrame(frame: Uint8Array): Uint8Array | null;
}

// !=============================================================================
// ! Опции клиента
// !=============================================================================

export interface EipClientOptions {
  /** Ожидание одного ответного кадра, мс */
  timeout?: number;
  /** Таймаут операции в command specific data, секунды */
  operationTimeout?: number;
  maxMessageSize?: number;
  maxChainLength?: number;
  maxNestingDepth?: number;
  diagnostics?: boolean;
  logLevel?: LogLevel;
}

export interface SegmentedTransferOptions {
  maxMessageSize?: number;
}

export interface TypeResolverOptions {
  maxChainLength?: number;
  maxNestingDepth?: number;
}

// !=============================================================================
// ! Логирование
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Контекст для логирования */
export interface LogContext {
  session?: number;
  command?: number;
  service?: number;
  variable?: string;
  offset?: number;
  size?: number;
  responseTime?: number;
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogField = keyof LogContext | 'timestamp' | 'level' | 'logger';

/** Интерфейс для экземпляра логгера */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Диагностика
// !=============================================================================

export interface DiagnosticsStats {
  uptimeSeconds: number;
  totalRequests: number;
  /** Полные ответы инкапсуляции, в том числе с ненулевым CIP status */
  successfulResponses: number;
  /** Обмены без годного ответа: таймаут, обрыв, ошибка разбора */
  errorResponses: number;
  timeouts: number;
  /** Ответы с ненулевым CIP general status (входят в successfulResponses) */
  cipStatusErrors: number;
  statusCodeCounts: Record<number, number>;
  serviceCallCounts: Record<number, number>;
  totalDataSent: number;
  totalDataReceived: number;
  minResponseTime: number | null;
  maxResponseTime: number | null;
  averageResponseTime: number | null;
  lastErrorMessage: string | null;
}

// !=============================================================================
// ! Эмулятор контроллера
// !=============================================================================

/** Тип структуры в эмуляторе: члены идут в порядке цепочки next instance */
export interface EmulatedStructureType {
  typeName: string;
  crc: number;
  members: EmulatedMember[];
}

/** Член структуры: элементарный тип или STRING (с size) либо вложенная структура */
export type EmulatedMember =
  | { name: string; code: number; size?: number }
  | { name: string; structure: EmulatedStructureType };

export type EmulatedVariableDefinition =
  | { name: string; type: 'scalar'; code: number; value?: CipValue }
  | { name: string; type: 'string'; size: number; value?: string }
  | {
      name: string;
      type: 'array';
      /** Элементарный тип элемента или STRING (тогда нужен elementSize) */
      elementCode: number;
      elementSize?: number;
      extents: number[];
      starts?: number[];
      value?: CipValue[];
    }
  | {
      name: string;
      type: 'structure-array';
      element: EmulatedStructureType;
      extents: number[];
      starts?: number[];
    }
  | { name: string; type: 'structure'; structure: EmulatedStructureType; value?: Uint8Array }
  | { name: string; type: 'abbreviated-structure'; size: number }
  /** Произвольный код типа (например UNION) без семантики значения */
  | { name: string; type: 'raw'; dataType: number; size: number };

/** Правило подмены ответа ошибкой CIP */
export interface EmulatorStatusRule {
  service: number;
  /** Имя переменной или класс объекта; если не задано - любая цель */
  target?: string | number;
  status: number;
  extendedStatus?: Uint8Array;
  /** Только для фрагмента с этим offset в simple data segment */
  offset?: number;
}

/** Запись истории запросов эмулятора */
export interface EmulatorRequestRecord {
  command: number;
  sessionHandle: number;
  request?: CipRequest;
}

export interface ControllerEmulatorOptions {
  identity?: Partial<IdentityItem>;
  /** Первый выдаваемый session handle */
  firstSessionHandle?: number;
  loggerEnabled?: boolean;
}
