// src/controller-emulator/controller-emulator.ts

import {
  CIP_REPLY_FLAG,
  CipClass,
  CipDataType,
  CipService,
  EncapsulationCommand,
  EXPLICIT_MESSAGE_PORT,
  PacketItemType,
} from '../constants/constants.js';
import { decodeCipRequest, encodeCipReply } from '../cip/cip-message.js';
import { decodeValue, ELEMENTARY_TYPES, encodeValue } from '../cip/data-types.js';
import { parsePath, type PathSegment } from '../cip/path-builder.js';
import {
  decodeCommonPacketFormat,
  encodeCommonPacketFormat,
} from '../framers/common-packet-format.js';
import {
  decodeCommandSpecificData,
  decodeEncapsulation,
  encodeCommandSpecificData,
  encodeEncapsulation,
} from '../framers/encapsulation.js';
import { EipError, EipNameNotFoundError } from '../errors.js';
import { defaultLogger } from '../logger.js';
import {
  encodeTagName,
  encodeTagNameServerInfo,
} from '../object-model/tag-name-server.js';
import {
  encodeVariableObject,
  type VariableObjectAttributes,
} from '../object-model/variable-object.js';
import {
  encodeVariableTypeObject,
  type VariableTypeObjectAttributes,
} from '../object-model/variable-type-object.js';
import { encodeIdentityItem } from '../services/list-identity.js';
import { CAPABILITY_CIP_OVER_TCP, encodeServiceItem } from '../services/list-services.js';
import { buildReadTagResponse } from '../services/read-tag.js';
import { parseWriteTagRequest } from '../services/write-tag.js';
import type {
  CipReply,
  CipRequest,
  CipTypeDescriptor,
  CipValue,
  ControllerEmulatorLike,
  ControllerEmulatorOptions,
  EmulatedMember,
  EmulatedStructureType,
  EmulatedVariableDefinition,
  EmulatorRequestRecord,
  EmulatorStatusRule,
  EncapsulationMessage,
  IdentityItem,
  LoggerInstance,
  StructureDescriptor,
  StructureMember,
  TagDataHeader,
} from '../types/eip-types.js';
import { arraysEqual, readUint16LE, uint16ToBytesLE } from '../utils/utils.js';

const STATUS_SUCCESS = 0x00;
const STATUS_INVALID_PARAMETER_VALUE = 0x03;
const STATUS_PATH_SEGMENT_ERROR = 0x04;
const STATUS_PATH_DESTINATION_UNKNOWN = 0x05;
const STATUS_SERVICE_NOT_SUPPORTED = 0x08;
const STATUS_NOT_ENOUGH_DATA = 0x13;
const STATUS_TOO_MUCH_DATA = 0x15;
const STATUS_OBJECT_DOES_NOT_EXIST = 0x16;
const STATUS_INVALID_PARAMETER = 0x20;

const ENCAP_INVALID_COMMAND = 0x0001;
const ENCAP_INCORRECT_DATA = 0x0003;
const ENCAP_INVALID_SESSION = 0x0064;

const DEFAULT_IDENTITY: IdentityItem = {
  protocolVersion: 1,
  socketAddress: { family: 2, port: EXPLICIT_MESSAGE_PORT, address: '127.0.0.1' },
  vendorId: 0x0001,
  deviceType: 0x000c,
  productCode: 0x0064,
  revision: { major: 1, minor: 0 },
  status: 0x0030,
  serialNumber: 0x00c0ffee,
  productName: 'Emulated Controller',
  state: 0x03,
};

interface EmulatedVariable {
  name: string;
  instanceId: number;
  attributes: VariableObjectAttributes;
  /** null для типов без семантики значения */
  descriptor: CipTypeDescriptor | null;
  /** Заголовок типа в Read Tag / ожидаемый в Write Tag */
  header: TagDataHeader;
  bytes: Uint8Array;
}

/** Ошибка обработки CIP-запроса, превращается в ответ с general status */
class EmulatorStatus extends EipError {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'EmulatorStatus';
    this.status = status;
  }
}

/**
 * Контроллер EtherNet/IP в памяти процесса.
 * Разбирает кадры инкапсуляции и отвечает так же, как контроллер:
 * сессии, List*, SendRRData с Get Attribute All / Read Tag / Write Tag.
 */
class ControllerEmulator implements ControllerEmulatorLike {
  public connected: boolean = false;
  private variables: EmulatedVariable[] = [];
  private typeObjects: Map<number, VariableTypeObjectAttributes> = new Map();
  private nextTypeInstance: number = 1;
  private sessions: Set<number> = new Set();
  private nextSessionHandle: number;
  private statusRules: EmulatorStatusRule[] = [];
  private history: EmulatorRequestRecord[] = [];
  private identity: IdentityItem;
  private logger: LoggerInstance;

  constructor(options: ControllerEmulatorOptions = {}) {
    this.identity = { ...DEFAULT_IDENTITY, ...options.identity };
    this.nextSessionHandle = options.firstSessionHandle ?? 0x00010001;
    this.logger = defaultLogger.createLogger('ControllerEmulator');
    this.logger.setLevel(options.loggerEnabled ? 'info' : 'error');
  }

  connect(): void {
    this.connected = true;
    this.logger.info('Connected');
  }

  disconnect(): void {
    this.connected = false;
    this.sessions.clear();
    this.logger.info('Disconnected');
  }

  // !===========================================================================
  // ! Переменные
  // !===========================================================================

  /**
   * Объявляет переменные. Экземпляры Tag Name Server / Variable Object
   * нумеруются в порядке объявления, начиная с 1.
   */
  addVariables(definitions: EmulatedVariableDefinition[]): void {
    for (const definition of definitions) {
      if (this.variables.some(v => v.name === definition.name)) {
        throw new EipError(`Variable already defined: ${definition.name}`);
      }
      const variable = this.buildVariable(definition, this.variables.length + 1);
      this.variables.push(variable);
      if ('value' in definition && definition.value !== undefined) {
        this.setValue(definition.name, definition.value);
      }
    }
  }

  setValue(name: string, value: CipValue): void {
    const variable = this.getVariable(name);
    if (!variable.descriptor) {
      throw new EipError(`Variable ${name} has no value semantics`);
    }
    const encoded = encodeValue(variable.descriptor, value);
    variable.bytes.fill(0);
    variable.bytes.set(encoded.subarray(0, variable.bytes.length));
  }

  getValue(name: string): CipValue {
    const variable = this.getVariable(name);
    if (!variable.descriptor) {
      throw new EipError(`Variable ${name} has no value semantics`);
    }
    return decodeValue(variable.descriptor, variable.bytes);
  }

  /** Копия сырых байтов значения */
  getBytes(name: string): Uint8Array {
    return this.getVariable(name).bytes.slice();
  }

  private getVariable(name: string): EmulatedVariable {
    const variable = this.variables.find(v => v.name === name);
    if (!variable) throw new EipNameNotFoundError(name);
    return variable;
  }

  private allocateTypeInstance(): number {
    return this.nextTypeInstance++;
  }

  private buildVariable(definition: EmulatedVariableDefinition, instanceId: number): EmulatedVariable {
    const noInfo = new Uint8Array(0);
    const base = { arrayDataType: 0, extents: [], starts: [], bitNumber: 0, variableTypeInstanceId: 0 };

    switch (definition.type) {
      case 'scalar': {
        const info = ELEMENTARY_TYPES[definition.code];
        if (!info) throw new EipError(`Not an elementary type: 0x${definition.code.toString(16)}`);
        return {
          name: definition.name,
          instanceId,
          attributes: { ...base, size: info.width, dataType: definition.code },
          descriptor: { kind: 'scalar', instanceId, size: info.width, code: definition.code, width: info.width },
          header: { dataType: definition.code, additionalInfo: noInfo },
          bytes: new Uint8Array(info.width),
        };
      }

      case 'string':
        return {
          name: definition.name,
          instanceId,
          attributes: { ...base, size: definition.size, dataType: CipDataType.STRING },
          descriptor: { kind: 'string', instanceId, size: definition.size, maxSize: definition.size },
          header: { dataType: CipDataType.STRING, additionalInfo: noInfo },
          bytes: new Uint8Array(definition.size),
        };

      case 'array': {
        const elementSize =
          definition.elementSize ?? ELEMENTARY_TYPES[definition.elementCode]?.width ?? 0;
        if (elementSize === 0) {
          throw new EipError(`Array ${definition.name} needs an element size`);
        }
        const count = definition.extents.reduce((total, extent) => total * extent, 1);
        const starts = definition.starts ?? definition.extents.map(() => 0);
        const element: CipTypeDescriptor =
          definition.elementCode === CipDataType.STRING
            ? { kind: 'string', instanceId: 0, size: elementSize, maxSize: elementSize }
            : {
                kind: 'scalar',
                instanceId: 0,
                size: elementSize,
                code: definition.elementCode,
                width: elementSize,
              };
        return {
          name: definition.name,
          instanceId,
          attributes: {
            ...base,
            size: elementSize * count,
            dataType: CipDataType.ARRAY,
            arrayDataType: definition.elementCode,
            extents: definition.extents,
            starts,
          },
          descriptor: {
            kind: 'array',
            instanceId,
            size: elementSize * count,
            elementType: element,
            dimensions: definition.extents.map((extent, i) => ({ extent, start: starts[i] })),
          },
          header: { dataType: definition.elementCode, additionalInfo: noInfo },
          bytes: new Uint8Array(elementSize * count),
        };
      }

      case 'structure-array': {
        const typeInstance = this.registerStructure(definition.element);
        const element = this.structureDescriptor(definition.element, typeInstance);
        const count = definition.extents.reduce((total, extent) => total * extent, 1);
        const starts = definition.starts ?? definition.extents.map(() => 0);
        return {
          name: definition.name,
          instanceId,
          attributes: {
            ...base,
            size: element.size * count,
            dataType: CipDataType.ARRAY,
            arrayDataType: CipDataType.STRUCT,
            extents: definition.extents,
            starts,
            variableTypeInstanceId: typeInstance,
          },
          descriptor: {
            kind: 'array',
            instanceId,
            size: element.size * count,
            elementType: element,
            dimensions: definition.extents.map((extent, i) => ({ extent, start: starts[i] })),
          },
          header: {
            dataType: CipDataType.ABBREVIATED_STRUCT,
            additionalInfo: uint16ToBytesLE(definition.element.crc),
          },
          bytes: new Uint8Array(element.size * count),
        };
      }

      case 'structure': {
        const typeInstance = this.registerStructure(definition.structure);
        const descriptor = this.structureDescriptor(definition.structure, typeInstance);
        return {
          name: definition.name,
          instanceId,
          attributes: {
            ...base,
            size: descriptor.size,
            dataType: CipDataType.STRUCT,
            variableTypeInstanceId: typeInstance,
          },
          descriptor,
          header: {
            dataType: CipDataType.ABBREVIATED_STRUCT,
            additionalInfo: uint16ToBytesLE(definition.structure.crc),
          },
          bytes: new Uint8Array(descriptor.size),
        };
      }

      case 'abbreviated-structure':
        return {
          name: definition.name,
          instanceId,
          attributes: { ...base, size: definition.size, dataType: CipDataType.ABBREVIATED_STRUCT },
          descriptor: null,
          header: { dataType: CipDataType.ABBREVIATED_STRUCT, additionalInfo: noInfo },
          bytes: new Uint8Array(definition.size),
        };

      case 'raw':
        return {
          name: definition.name,
          instanceId,
          attributes: { ...base, size: definition.size, dataType: definition.dataType },
          descriptor: null,
          header: { dataType: definition.dataType, additionalInfo: noInfo },
          bytes: new Uint8Array(definition.size),
        };
    }
  }

  private memberSize(member: EmulatedMember): number {
    if ('structure' in member) {
      return member.structure.members.reduce((total, m) => total + this.memberSize(m), 0);
    }
    return member.size ?? ELEMENTARY_TYPES[member.code]?.width ?? 0;
  }

  private structureDescriptor(type: EmulatedStructureType, instanceId: number): StructureDescriptor {
    const members: StructureMember[] = type.members.map(member => {
      if ('structure' in member) {
        return { name: member.name, type: this.structureDescriptor(member.structure, 0) };
      }
      const size = this.memberSize(member);
      const memberType: CipTypeDescriptor =
        member.code === CipDataType.STRING
          ? { kind: 'string', instanceId: 0, size, maxSize: size }
          : { kind: 'scalar', instanceId: 0, size, code: member.code, width: size };
      return { name: member.name, type: memberType };
    });
    return {
      kind: 'structure',
      instanceId,
      size: type.members.reduce((total, m) => total + this.memberSize(m), 0),
      typeName: type.typeName,
      crc: type.crc,
      members,
    };
  }

  /**
   * Регистрирует Variable Type Object структуры и цепочку её членов
   * @returns instance id объекта структуры
   */
  private registerStructure(type: EmulatedStructureType): number {
    const instanceId = this.allocateTypeInstance();
    const firstMember = this.registerMembers(type.members);
    this.typeObjects.set(instanceId, {
      sizeInMemory: type.members.reduce((total, m) => total + this.memberSize(m), 0),
      dataType: CipDataType.STRUCT,
      arrayDataType: 0,
      extents: [],
      numberOfMembers: type.members.length,
      crc: type.crc,
      name: type.typeName,
      nextInstanceId: 0,
      nestingInstanceId: firstMember,
      starts: [],
    });
    return instanceId;
  }

  /**
   * @returns instance id первого члена (0 для пустой структуры)
   */
  private registerMembers(members: EmulatedMember[]): number {
    const ids = members.map(() => this.allocateTypeInstance());
    members.forEach((member, i) => {
      const nested = 'structure' in member ? member.structure : null;
      this.typeObjects.set(ids[i], {
        sizeInMemory: this.memberSize(member),
        dataType: nested ? CipDataType.STRUCT : 'code' in member ? member.code : 0,
        arrayDataType: 0,
        extents: [],
        numberOfMembers: nested ? nested.members.length : 0,
        crc: nested ? nested.crc : 0,
        name: member.name,
        nextInstanceId: ids[i + 1] ?? 0,
        nestingInstanceId: nested ? this.registerMembers(nested.members) : 0,
        starts: [],
      });
    });
    return ids[0] ?? 0;
  }

  // !===========================================================================
  // ! Подмена ответов и история
  // !===========================================================================

  injectStatus(rule: EmulatorStatusRule): void {
    this.statusRules.push(rule);
  }

  clearStatusRules(): void {
    this.statusRules = [];
  }

  getHistory(): EmulatorRequestRecord[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history = [];
  }

  /** Только CIP-запросы из истории, в порядке поступления */
  getCipRequests(): CipRequest[] {
    return this.history.flatMap(record => (record.request ? [record.request] : []));
  }

  get activeSessions(): number[] {
    return [...this.sessions];
  }

  // !===========================================================================
  // ! Обработка кадров
  // !===========================================================================

  /**
   * Обрабатывает один кадр инкапсуляции
   * @returns ответный кадр или null, если ответа нет
   */
  handleFrame(frame: Uint8Array): Uint8Array | null {
    if (!this.connected) {
      this.logger.warn('Received frame but emulator not connected');
      return null;
    }

    let message: EncapsulationMessage;
    try {
      message = decodeEncapsulation(frame);
    } catch (err: unknown) {
      this.logger.error(`Malformed frame dropped: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }

    const record: EmulatorRequestRecord = {
      command: message.command,
      sessionHandle: message.sessionHandle,
    };
    this.history.push(record);
    this.logger.info('Request received', { command: message.command, session: message.sessionHandle });

    switch (message.command) {
      case EncapsulationCommand.REGISTER_SESSION: {
        const handle = this.nextSessionHandle++;
        this.sessions.add(handle);
        return this.reply(message, { sessionHandle: handle, payload: message.payload });
      }

      case EncapsulationCommand.UNREGISTER_SESSION:
        this.sessions.delete(message.sessionHandle);
        return null;

      case EncapsulationCommand.LIST_IDENTITY:
        return this.reply(message, {
          payload: encodeCommonPacketFormat(
            [{ typeId: PacketItemType.CIP_IDENTITY, data: encodeIdentityItem(this.identity) }],
            { nullAddress: false }
          ),
        });

      case EncapsulationCommand.LIST_SERVICES:
        return this.reply(message, {
          payload: encodeCommonPacketFormat(
            [
              encodeServiceItem({
                typeId: PacketItemType.LIST_SERVICES_RESPONSE,
                protocolVersion: 1,
                capabilityFlags: CAPABILITY_CIP_OVER_TCP,
                name: 'Communications',
              }),
            ],
            { nullAddress: false }
          ),
        });

      case EncapsulationCommand.LIST_INTERFACES:
        return this.reply(message, { payload: encodeCommonPacketFormat([]) });

      case EncapsulationCommand.SEND_RR_DATA:
        return this.handleSendRrData(message, record);

      default:
        return this.reply(message, { status: ENCAP_INVALID_COMMAND, payload: new Uint8Array(0) });
    }
  }

  private reply(
    request: EncapsulationMessage,
    fields: { payload: Uint8Array; status?: number; sessionHandle?: number }
  ): Uint8Array {
    return encodeEncapsulation({
      command: request.command,
      sessionHandle: fields.sessionHandle ?? request.sessionHandle,
      status: fields.status ?? 0,
      senderContext: request.senderContext,
      options: 0,
      payload: fields.payload,
    });
  }

  private handleSendRrData(message: EncapsulationMessage, record: EmulatorRequestRecord): Uint8Array {
    if (!this.sessions.has(message.sessionHandle)) {
      return this.reply(message, { status: ENCAP_INVALID_SESSION, payload: new Uint8Array(0) });
    }

    let request: CipRequest;
    try {
      const items = decodeCommonPacketFormat(decodeCommandSpecificData(message.payload).packet);
      const dataItem = items.find(item => item.typeId === PacketItemType.UNCONNECTED_MESSAGE);
      if (!dataItem) {
        return this.reply(message, { status: ENCAP_INCORRECT_DATA, payload: new Uint8Array(0) });
      }
      request = decodeCipRequest(dataItem.data);
    } catch (err: unknown) {
      this.logger.warn(`Bad SendRRData payload: ${err instanceof Error ? err.message : String(err)}`);
      return this.reply(message, { status: ENCAP_INCORRECT_DATA, payload: new Uint8Array(0) });
    }
    record.request = request;

    const cipReply = encodeCipReply(this.handleCip(request));
    return this.reply(message, {
      payload: encodeCommandSpecificData({
        interfaceHandle: 0,
        timeout: 0,
        packet: encodeCommonPacketFormat([
          { typeId: PacketItemType.UNCONNECTED_MESSAGE, data: cipReply },
        ]),
      }),
    });
  }

  private handleCip(request: CipRequest): CipReply {
    const service = request.service | CIP_REPLY_FLAG;
    try {
      let segments: PathSegment[];
      try {
        segments = parsePath(request.path);
      } catch (err: unknown) {
        throw new EmulatorStatus(
          STATUS_PATH_SEGMENT_ERROR,
          err instanceof Error ? err.message : String(err)
        );
      }

      let data: Uint8Array;
      switch (request.service) {
        case CipService.GET_ATTRIBUTE_ALL:
          data = this.handleGetAttributeAll(request, segments);
          break;
        case CipService.READ_TAG:
          data = this.handleReadTag(request, segments);
          break;
        case CipService.WRITE_TAG:
          data = this.handleWriteTag(request, segments);
          break;
        default:
          throw new EmulatorStatus(
            STATUS_SERVICE_NOT_SUPPORTED,
            `Service 0x${request.service.toString(16)} not supported`
          );
      }
      return { service, reserved: 0, generalStatus: STATUS_SUCCESS, extendedStatus: new Uint8Array(0), data };
    } catch (err: unknown) {
      if (!(err instanceof EmulatorStatus)) throw err;
      this.logger.warn(err.message, { service: request.service });
      return {
        service,
        reserved: 0,
        generalStatus: err.status,
        extendedStatus: err instanceof InjectedStatus ? err.extendedStatus : new Uint8Array(0),
        data: new Uint8Array(0),
      };
    }
  }

  private applyStatusRules(service: number, target: string | number, offset?: number): void {
    const rule = this.statusRules.find(
      r =>
        r.service === service &&
        (r.target === undefined || r.target === target) &&
        (r.offset === undefined || r.offset === offset)
    );
    if (rule) {
      throw new InjectedStatus(rule);
    }
  }

  private handleGetAttributeAll(request: CipRequest, segments: PathSegment[]): Uint8Array {
    const [classSegment, instanceSegment] = segments;
    if (
      segments.length !== 2 ||
      classSegment.type !== 'class' ||
      instanceSegment.type !== 'instance'
    ) {
      throw new EmulatorStatus(STATUS_PATH_SEGMENT_ERROR, 'Get Attribute All needs class/instance');
    }
    const classId = classSegment.value;
    const instanceId = instanceSegment.value;
    this.applyStatusRules(request.service, classId);

    switch (classId) {
      case CipClass.TAG_NAME_SERVER: {
        if (instanceId === 0) {
          return encodeTagNameServerInfo({ revision: 1, instanceCount: this.variables.length });
        }
        return encodeTagName(this.variableByInstance(instanceId).name);
      }
      case CipClass.VARIABLE_OBJECT:
        return encodeVariableObject(this.variableByInstance(instanceId).attributes);
      case CipClass.VARIABLE_TYPE_OBJECT: {
        const attributes = this.typeObjects.get(instanceId);
        if (!attributes) {
          throw new EmulatorStatus(STATUS_OBJECT_DOES_NOT_EXIST, `No type instance ${instanceId}`);
        }
        return encodeVariableTypeObject(attributes);
      }
      default:
        throw new EmulatorStatus(STATUS_PATH_DESTINATION_UNKNOWN, `Unknown class 0x${classId.toString(16)}`);
    }
  }

  private variableByInstance(instanceId: number): EmulatedVariable {
    const variable = this.variables[instanceId - 1];
    if (!variable) {
      throw new EmulatorStatus(STATUS_OBJECT_DOES_NOT_EXIST, `No variable instance ${instanceId}`);
    }
    return variable;
  }

  /**
   * Цель Read Tag / Write Tag: один символьный сегмент и, возможно, simple data segment
   */
  private tagTarget(segments: PathSegment[]): {
    variable: EmulatedVariable;
    range: { offset: number; size: number } | null;
  } {
    const [symbol, extra] = segments;
    if (!symbol || symbol.type !== 'symbolic' || segments.length > 2) {
      throw new EmulatorStatus(STATUS_PATH_DESTINATION_UNKNOWN, 'Unsupported tag path');
    }
    const variable = this.variables.find(v => v.name === symbol.name);
    if (!variable) {
      throw new EmulatorStatus(STATUS_PATH_DESTINATION_UNKNOWN, `Unknown tag ${symbol.name}`);
    }
    if (!extra) return { variable, range: null };
    if (extra.type !== 'data') {
      throw new EmulatorStatus(STATUS_PATH_DESTINATION_UNKNOWN, 'Member and element paths are not supported');
    }
    return { variable, range: { offset: extra.offset, size: extra.size } };
  }

  private handleReadTag(request: CipRequest, segments: PathSegment[]): Uint8Array {
    const { variable, range } = this.tagTarget(segments);
    this.applyStatusRules(request.service, variable.name, range?.offset);

    const isString = variable.header.dataType === CipDataType.STRING && variable.descriptor?.kind === 'string';
    let value: Uint8Array;
    if (range) {
      if (range.offset > variable.bytes.length) {
        throw new EmulatorStatus(STATUS_INVALID_PARAMETER_VALUE, `Offset ${range.offset} beyond value`);
      }
      value = variable.bytes.slice(range.offset, range.offset + range.size);
    } else if (isString) {
      const end = variable.bytes.indexOf(0);
      value = variable.bytes.slice(0, end === -1 ? variable.bytes.length : end);
    } else {
      value = variable.bytes.slice();
    }

    const data = isString ? new Uint8Array([...uint16ToBytesLE(value.length), ...value]) : value;
    return buildReadTagResponse({
      dataType: variable.header.dataType,
      additionalInfo: variable.header.additionalInfo,
      data,
    });
  }

  private handleWriteTag(request: CipRequest, segments: PathSegment[]): Uint8Array {
    const { variable, range } = this.tagTarget(segments);
    this.applyStatusRules(request.service, variable.name, range?.offset);

    let write: ReturnType<typeof parseWriteTagRequest>;
    try {
      write = parseWriteTagRequest(request.data);
    } catch (err: unknown) {
      throw new EmulatorStatus(STATUS_NOT_ENOUGH_DATA, err instanceof Error ? err.message : String(err));
    }
    if (
      write.dataType !== variable.header.dataType ||
      !arraysEqual(write.additionalInfo, variable.header.additionalInfo)
    ) {
      throw new EmulatorStatus(STATUS_INVALID_PARAMETER, `Type mismatch writing ${variable.name}`);
    }

    const offset = range?.offset ?? 0;
    let payload = write.data;
    if (variable.header.dataType === CipDataType.STRING && variable.descriptor?.kind === 'string') {
      if (payload.length < 2 || readUint16LE(payload, 0) !== payload.length - 2) {
        throw new EmulatorStatus(STATUS_NOT_ENOUGH_DATA, 'String length prefix mismatch');
      }
      payload = payload.subarray(2);
    } else if (range ? payload.length !== range.size : payload.length !== variable.bytes.length) {
      throw new EmulatorStatus(
        payload.length < (range?.size ?? variable.bytes.length) ? STATUS_NOT_ENOUGH_DATA : STATUS_TOO_MUCH_DATA,
        `Write of ${payload.length} bytes does not match the requested size`
      );
    }

    if (offset + payload.length > variable.bytes.length) {
      throw new EmulatorStatus(STATUS_TOO_MUCH_DATA, `Write past the end of ${variable.name}`);
    }
    variable.bytes.set(payload, offset);
    if (variable.descriptor?.kind === 'string') {
      variable.bytes.fill(0, offset + payload.length);
    }
    return new Uint8Array(0);
  }
}

/** Ошибка, подставленная правилом injectStatus */
class InjectedStatus extends EmulatorStatus {
  readonly extendedStatus: Uint8Array;

  constructor(rule: EmulatorStatusRule) {
    super(rule.status, `Injected status 0x${rule.status.toString(16)}`);
    this.name = 'InjectedStatus';
    this.extendedStatus = rule.extendedStatus ?? new Uint8Array(0);
  }
}

export { ControllerEmulator };
