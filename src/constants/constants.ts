// src/constants/constants.ts

/** Стандартный TCP-порт для explicit messaging */
export const EXPLICIT_MESSAGE_PORT = 44818;

/** Размер заголовка инкапсуляции в байтах */
export const ENCAPSULATION_HEADER_SIZE = 24;

/** Максимальная длина UCMM-сообщения */
export const MAX_UNCONNECTED_MESSAGE_SIZE = 502;

/** Служебные байты, которые вычитаются из потолка при чтении по частям */
export const SEGMENT_READ_OVERHEAD = 8;

/** 400 = 50 * 8, кратно самому широкому элементарному типу */
export const SEGMENT_WRITE_CHUNK_SIZE = 400;

/** Опции регистрации сессии: protocol version 1, options 0 */
export const REGISTER_SESSION_DATA = Uint8Array.from([0x01, 0x00, 0x00, 0x00]);

/** Переменные с этим префиксом считаются системными */
export const SYSTEM_VARIABLE_PREFIX = '_';

/**
 * Encapsulation command codes
 */
export enum EncapsulationCommand {
  NOP = 0x0000,
  LIST_SERVICES = 0x0004,
  LIST_IDENTITY = 0x0063,
  LIST_INTERFACES = 0x0064,
  REGISTER_SESSION = 0x0065,
  UNREGISTER_SESSION = 0x0066,
  SEND_RR_DATA = 0x006f,
}

export const ENCAPSULATION_COMMAND_NAMES: Record<number, string> = {
  [EncapsulationCommand.NOP]: 'NOP',
  [EncapsulationCommand.LIST_SERVICES]: 'LIST_SERVICES',
  [EncapsulationCommand.LIST_IDENTITY]: 'LIST_IDENTITY',
  [EncapsulationCommand.LIST_INTERFACES]: 'LIST_INTERFACES',
  [EncapsulationCommand.REGISTER_SESSION]: 'REGISTER_SESSION',
  [EncapsulationCommand.UNREGISTER_SESSION]: 'UNREGISTER_SESSION',
  [EncapsulationCommand.SEND_RR_DATA]: 'SEND_RR_DATA',
};

/**
 * Encapsulation header status codes
 */
export const ENCAPSULATION_STATUS_MESSAGES: Record<number, string> = {
  0x0000: 'Success',
  0x0001: 'Invalid or unsupported command',
  0x0002: 'Insufficient memory in target device',
  0x0003: 'Incorrect data used in request',
  0x0064: 'Invalid session handle used in request',
  0x0065: 'Invalid command length used in request',
  0x0069: 'Unsupported protocol version used in request',
};

/**
 * Common Packet Format item type ids
 */
export enum PacketItemType {
  NULL_ADDRESS = 0x0000,
  CIP_IDENTITY = 0x000c,
  CONNECTED_TRANSPORT_PACKET = 0x00b1,
  UNCONNECTED_MESSAGE = 0x00b2,
  LIST_SERVICES_RESPONSE = 0x0100,
  SOCKADDR_INFO_ORIGINATOR_TO_TARGET = 0x8000,
  SOCKADDR_INFO_TARGET_TO_ORIGINATOR = 0x8001,
  SEQUENCED_ADDRESS = 0x8002,
}

/**
 * CIP service codes
 */
export enum CipService {
  GET_ATTRIBUTE_ALL = 0x01,
  GET_ATTRIBUTE_SINGLE = 0x0e,
  READ_TAG = 0x4c,
  WRITE_TAG = 0x4d,
  READ_MODIFY_WRITE_TAG = 0x4e,
  READ_TAG_FRAGMENTED = 0x52,
  WRITE_TAG_FRAGMENTED = 0x53,
  GET_INSTANCE_LIST = 0x5f,
}

export const CIP_SERVICE_NAMES: Record<number, string> = {
  [CipService.GET_ATTRIBUTE_ALL]: 'GET_ATTRIBUTE_ALL',
  [CipService.GET_ATTRIBUTE_SINGLE]: 'GET_ATTRIBUTE_SINGLE',
  [CipService.READ_TAG]: 'READ_TAG',
  [CipService.WRITE_TAG]: 'WRITE_TAG',
  [CipService.READ_MODIFY_WRITE_TAG]: 'READ_MODIFY_WRITE_TAG',
  [CipService.READ_TAG_FRAGMENTED]: 'READ_TAG_FRAGMENTED',
  [CipService.WRITE_TAG_FRAGMENTED]: 'WRITE_TAG_FRAGMENTED',
  [CipService.GET_INSTANCE_LIST]: 'GET_INSTANCE_LIST',
};

/** Бит ответа в коде сервиса */
export const CIP_REPLY_FLAG = 0x80;

/**
 * CIP general status codes
 */
export const CIP_GENERAL_STATUS_MESSAGES: Record<number, string> = {
  0x00: 'Success',
  0x01: 'Connection failure',
  0x02: 'Resource unavailable',
  0x03: 'Invalid parameter value',
  0x04: 'Path segment error',
  0x05: 'Path destination unknown',
  0x06: 'Partial transfer',
  0x08: 'Service not supported',
  0x09: 'Invalid attribute value',
  0x0a: 'Attribute list error',
  0x0c: 'Object state conflict',
  0x0e: 'Attribute not settable',
  0x10: 'Device state conflict',
  0x11: 'Reply data too large',
  0x13: 'Not enough data',
  0x14: 'Attribute not supported',
  0x15: 'Too much data',
  0x16: 'Object does not exist',
  0x1e: 'Embedded service error',
  0x1f: 'Vendor specific error',
  0x20: 'Invalid parameter',
  0x26: 'Path size invalid',
};

/**
 * Path segment markers
 */
export const PATH_SEGMENT = {
  SYMBOLIC: 0x91,
  CLASS_8: 0x20,
  CLASS_16: 0x21,
  INSTANCE_8: 0x24,
  INSTANCE_16: 0x25,
  ATTRIBUTE_8: 0x30,
  ATTRIBUTE_16: 0x31,
  ELEMENT_8: 0x28,
  ELEMENT_16: 0x29,
  ELEMENT_32: 0x2a,
  SIMPLE_DATA: 0x80,
} as const;

/** Длина simple data segment в словах: offset(4) + size(2) */
export const SIMPLE_DATA_SEGMENT_WORDS = 3;

/**
 * Object classes used for variable discovery
 */
export enum CipClass {
  IDENTITY = 0x01,
  TAG_NAME_SERVER = 0x6a,
  VARIABLE_OBJECT = 0x6b,
  VARIABLE_TYPE_OBJECT = 0x6c,
}

/**
 * CIP data type codes
 */
export enum CipDataType {
  BOOL = 0xc1,
  SINT = 0xc2,
  INT = 0xc3,
  DINT = 0xc4,
  LINT = 0xc5,
  USINT = 0xc6,
  UINT = 0xc7,
  UDINT = 0xc8,
  ULINT = 0xc9,
  REAL = 0xca,
  LREAL = 0xcb,
  STRING = 0xd0,
  BYTE = 0xd1,
  WORD = 0xd2,
  DWORD = 0xd3,
  LWORD = 0xd4,
  TIME = 0xdb,
  ABBREVIATED_STRUCT = 0xa0,
  STRUCT = 0xa2,
  ARRAY = 0xa3,
  UINT_BCD = 0x04,
  UDINT_BCD = 0x05,
  ULINT_BCD = 0x06,
  ENUM = 0x07,
  DATE_NSEC = 0x08,
  TIME_NSEC = 0x09,
  DATE_AND_TIME_NSEC = 0x0a,
  TIME_OF_DAY_NSEC = 0x0b,
  UNION = 0x0c,
}
